import { readFileSync, existsSync } from 'node:fs';
import { parse } from 'yaml';
import { LedgerConfigSchema, type LedgerConfig } from '@ducat-ledger/shared';
import { Ledger } from '@ducat-ledger/core';
import type { Workspace } from '../types.js';
import { detectWorkspaceRoot } from './detect.js';
import { resolveWorkspace } from './paths.js';

/**
 * Config used when no workspace is found.
 */
export function defaultLedgerConfig(): LedgerConfig {
    return LedgerConfigSchema.parse({});
}

/**
 * Loads the ledger configuration (config/ledger.yaml).
 * An empty file yields the defaults.
 */
export function loadLedgerConfig(workspace: Workspace): LedgerConfig {
    const path = workspace.config.ledgerConfigPath;
    if (!existsSync(path)) {
        throw new Error(`Ledger config not found: ${path}`);
    }
    const content = readFileSync(path, 'utf-8');
    const data: unknown = parse(content);
    return LedgerConfigSchema.parse(data ?? {});
}

/**
 * Fresh ledger with the configured chart of accounts, in file order.
 */
export function buildLedger(config: LedgerConfig): Ledger {
    const ledger = new Ledger(config.name);
    for (const account of config.accounts) {
        ledger.createAccount(account.name, account.type);
    }
    return ledger;
}

export interface OpenedWorkspace {
    workspace: Workspace | null;
    config: LedgerConfig;
}

/**
 * Resolve the workspace (explicit root, else detected from cwd) and its
 * config. Without a workspace the defaults apply.
 */
export function openWorkspace(explicitRoot?: string): OpenedWorkspace {
    const root = explicitRoot ?? detectWorkspaceRoot();
    if (!root) {
        return { workspace: null, config: defaultLedgerConfig() };
    }
    const workspace = resolveWorkspace(root);
    return { workspace, config: loadLedgerConfig(workspace) };
}
