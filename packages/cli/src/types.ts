/**
 * Ducat Ledger CLI - Core Types
 */

export interface ImportOptions {
    verbose: boolean;
    exportPath?: string;
    xlsxPath?: string;
    workspace?: string;
}

export interface ValidateOptions {
    verbose: boolean;
    workspace?: string;
}

export interface DemoOptions {
    out?: string;
    verbose: boolean;
}

export interface WorkspaceConfig {
    ledgerConfigPath: string;
}

export interface Workspace {
    root: string;
    outputs: string;
    config: WorkspaceConfig;
}
