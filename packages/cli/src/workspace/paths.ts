import { isAbsolute, join } from 'node:path';
import type { Workspace } from '../types.js';

/**
 * Constructs a Workspace object from a root path.
 */
export function resolveWorkspace(root: string): Workspace {
    return {
        root,
        outputs: join(root, 'outputs'),
        config: {
            ledgerConfigPath: join(root, 'config', 'ledger.yaml'),
        },
    };
}

/**
 * Relative output paths land in the workspace's outputs directory;
 * absolute ones are kept.
 */
export function resolveOutputPath(workspace: Workspace | null, path: string): string {
    if (!workspace || isAbsolute(path)) {
        return path;
    }
    return join(workspace.outputs, path);
}
