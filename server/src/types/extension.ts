/** Relative, forward-slash path -> full UTF-8 text content. */
export type FileMap = Record<string, string>;

export type WriteMode = 'replace' | 'merge';

export interface WorkspaceHandle {
    sessionId: string;
    /** Session directory; everything the workspace owns lives below it. */
    root: string;
    /** Live extension files, mirroring the mapping exactly (plus template icons). */
    extensionDir: string;
    /** Scratch directory handed to the external generation process. */
    stagingDir: string;
}

export interface ExtensionRef {
    id: string;
    name: string;
    description: string;
}

export interface ExtensionSummary extends ExtensionRef {
    fileList: string[];
}
