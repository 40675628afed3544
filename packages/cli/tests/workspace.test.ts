import { describe, it, expect, vi } from 'vitest';
import { detectWorkspaceRoot } from '../src/workspace/detect.js';
import { resolveWorkspace, resolveOutputPath } from '../src/workspace/paths.js';
import * as fs from 'node:fs';
import * as path from 'node:path';

// Mocking fs to avoid actual disk I/O in simple unit tests
vi.mock('node:fs');

describe('Workspace Detection', () => {
    it('should detect workspace root when config/ledger.yaml exists', () => {
        const mockCwd = '/Users/test/books';
        vi.spyOn(process, 'cwd').mockReturnValue(mockCwd);

        vi.spyOn(fs, 'existsSync').mockImplementation((p: fs.PathLike) => {
            return p.toString() === path.join(mockCwd, 'config', 'ledger.yaml');
        });

        expect(detectWorkspaceRoot()).toBe(mockCwd);
    });

    it('should walk up to a parent workspace', () => {
        vi.spyOn(fs, 'existsSync').mockImplementation((p: fs.PathLike) => {
            return p.toString() === path.join('/Users/test', 'config', 'ledger.yaml');
        });

        expect(detectWorkspaceRoot('/Users/test/books/1397')).toBe('/Users/test');
    });

    it('should return null if no workspace is found in parents', () => {
        vi.spyOn(process, 'cwd').mockReturnValue('/');
        vi.spyOn(fs, 'existsSync').mockReturnValue(false);

        expect(detectWorkspaceRoot()).toBeNull();
    });
});

describe('Path Resolution', () => {
    const root = '/work';
    const workspace = resolveWorkspace(root);

    it('should resolve standard paths correctly', () => {
        expect(workspace.root).toBe(root);
        expect(workspace.outputs).toBe(path.join(root, 'outputs'));
        expect(workspace.config.ledgerConfigPath).toBe(path.join(root, 'config', 'ledger.yaml'));
    });

    it('should place relative output paths in the outputs directory', () => {
        expect(resolveOutputPath(workspace, 'ledger.json')).toBe(path.join(root, 'outputs', 'ledger.json'));
        expect(resolveOutputPath(workspace, '/tmp/ledger.json')).toBe('/tmp/ledger.json');
        expect(resolveOutputPath(null, 'ledger.json')).toBe('ledger.json');
    });
});
