import fs from 'node:fs';
import path from 'node:path';
import { TextDecoder } from 'node:util';
import { Inject, Service } from 'typedi';
import { Settings, SettingsToken } from '../../config';
import { InvalidFilePath, InvalidSessionId, WorkspaceIOError } from '../../errors';
import { FileMap, WorkspaceHandle, WriteMode } from '../../types/extension';
import { createLogger } from '../../utils/logger';

export const TEMPLATE_ICONS = ['icon16.png', 'icon48.png', 'icon128.png'] as const;

const EXTENSION_DIRNAME = 'extension';
const STAGING_DIRNAME = 'staging';
const ICON_MARKER = '.icons-copied';
const IMAGES_DIRNAME = 'images';

const TEMPLATE_PATHS = new Set<string>([
    ...TEMPLATE_ICONS,
    ...TEMPLATE_ICONS.map((icon) => `${IMAGES_DIRNAME}/${icon}`),
]);

/**
 * Owns the on-disk copy of each session's extension. Reads are served from an
 * in-memory snapshot that is swapped only after the directory swap completed,
 * so a reader sees either the previous or the next file set.
 */
@Service()
export class WorkspaceStore {
    private readonly logger = createLogger('WorkspaceStore');
    private readonly snapshots = new Map<string, FileMap>();

    constructor(@Inject(SettingsToken) private readonly settings: Settings) {
        ensureDirectory(settings.dataRoot);
    }

    initialize(sessionId: string): WorkspaceHandle {
        const handle = this.resolveHandle(sessionId);
        try {
            ensureDirectory(handle.extensionDir);
            const marker = path.join(handle.root, ICON_MARKER);
            if (!fs.existsSync(marker)) {
                this.copyTemplateIcons(handle.extensionDir);
                fs.writeFileSync(marker, new Date().toISOString(), 'utf-8');
            }
        } catch (error) {
            throw new WorkspaceIOError(
                `Failed to initialize workspace for session ${sessionId}`,
                { cause: error },
            );
        }

        if (!this.snapshots.has(sessionId)) {
            this.snapshots.set(sessionId, readTextFiles(handle.extensionDir));
        }
        return handle;
    }

    read(handle: WorkspaceHandle): FileMap {
        const snapshot =
            this.snapshots.get(handle.sessionId) ??
            readTextFiles(handle.extensionDir);
        this.snapshots.set(handle.sessionId, snapshot);
        return { ...snapshot };
    }

    listFiles(handle: WorkspaceHandle): string[] {
        return Object.keys(this.read(handle)).sort(comparePaths);
    }

    write(handle: WorkspaceHandle, files: FileMap, mode: WriteMode): FileMap {
        const incoming = normalizeFileMap(files);
        const current = this.read(handle);
        const next: FileMap =
            mode === 'replace' ? incoming : { ...current, ...incoming };

        const tempDir = `${handle.extensionDir}.next-${process.pid}-${Date.now()}`;
        const retiredDir = `${handle.extensionDir}.old-${process.pid}-${Date.now()}`;
        try {
            removeDirectory(tempDir);
            ensureDirectory(tempDir);
            for (const [relativePath, content] of Object.entries(next)) {
                const target = path.join(tempDir, relativePath);
                ensureDirectory(path.dirname(target));
                fs.writeFileSync(target, content, 'utf-8');
            }
            this.carryTemplateAssets(handle.extensionDir, tempDir);

            if (fs.existsSync(handle.extensionDir)) {
                fs.renameSync(handle.extensionDir, retiredDir);
            }
            fs.renameSync(tempDir, handle.extensionDir);
            removeDirectory(retiredDir);
        } catch (error) {
            removeDirectory(tempDir);
            if (!fs.existsSync(handle.extensionDir) && fs.existsSync(retiredDir)) {
                fs.renameSync(retiredDir, handle.extensionDir);
            }
            throw new WorkspaceIOError(
                `Failed to write workspace for session ${handle.sessionId}`,
                { cause: error },
            );
        }

        this.snapshots.set(handle.sessionId, next);
        this.logger.info('Workspace written', {
            sessionId: handle.sessionId,
            mode,
            files: Object.keys(next).length,
        });
        return { ...next };
    }

    /**
     * Fresh staging directory for one generation run: a copy of the live
     * extension for fix/improve, template icons only for build.
     */
    prepareStaging(handle: WorkspaceHandle, seed: 'current' | 'empty'): string {
        try {
            removeDirectory(handle.stagingDir);
            ensureDirectory(handle.stagingDir);
            if (seed === 'current') {
                fs.cpSync(handle.extensionDir, handle.stagingDir, {
                    recursive: true,
                });
            } else {
                this.copyTemplateIcons(handle.stagingDir);
            }
        } catch (error) {
            throw new WorkspaceIOError(
                `Failed to prepare staging directory for session ${handle.sessionId}`,
                { cause: error },
            );
        }
        return handle.stagingDir;
    }

    /** Text files in the staging directory, template assets excluded. */
    readStaging(handle: WorkspaceHandle): FileMap {
        if (!fs.existsSync(handle.stagingDir)) {
            return {};
        }
        return readTextFiles(handle.stagingDir, (relativePath) =>
            this.logger.warn('Skipping non-text generated file', {
                sessionId: handle.sessionId,
                path: relativePath,
            }),
        );
    }

    clearStaging(handle: WorkspaceHandle): void {
        removeDirectory(handle.stagingDir);
    }

    exists(sessionId: string): boolean {
        return fs.existsSync(this.resolveHandle(sessionId).extensionDir);
    }

    discard(sessionId: string): void {
        const handle = this.resolveHandle(sessionId);
        this.snapshots.delete(sessionId);
        removeDirectory(handle.extensionDir);
        removeDirectory(handle.stagingDir);
        removeDirectory(path.join(handle.root, ICON_MARKER));
    }

    resolveHandle(sessionId: string): WorkspaceHandle {
        const root = path.join(this.settings.dataRoot, sessionDirectoryName(sessionId));
        return {
            sessionId,
            root,
            extensionDir: path.join(root, EXTENSION_DIRNAME),
            stagingDir: path.join(root, STAGING_DIRNAME),
        };
    }

    private copyTemplateIcons(targetDir: string): void {
        ensureDirectory(targetDir);
        for (const icon of TEMPLATE_ICONS) {
            const source = path.join(this.settings.templateDir, icon);
            if (!fs.existsSync(source)) {
                this.logger.warn('Template icon missing', { icon, source });
                continue;
            }
            fs.copyFileSync(source, path.join(targetDir, icon));
        }
    }

    // Icons live beside the mapping, never inside it; an images/ folder created
    // by the generator gets its own copy.
    private carryTemplateAssets(fromDir: string, toDir: string): void {
        for (const icon of TEMPLATE_ICONS) {
            const existing = path.join(fromDir, icon);
            if (fs.existsSync(existing)) {
                fs.copyFileSync(existing, path.join(toDir, icon));
            }
        }

        const imagesDir = path.join(toDir, IMAGES_DIRNAME);
        if (fs.existsSync(imagesDir)) {
            for (const icon of TEMPLATE_ICONS) {
                const source = path.join(toDir, icon);
                const target = path.join(imagesDir, icon);
                if (fs.existsSync(source) && !fs.existsSync(target)) {
                    fs.copyFileSync(source, target);
                }
            }
        }
    }
}

export function isTemplateAsset(relativePath: string): boolean {
    return TEMPLATE_PATHS.has(relativePath);
}

/**
 * Normalises a relative path to forward slashes. Absolute paths and parent
 * segments are rejected.
 */
export function normalizeRelativePath(value: string): string {
    const unified = value.replace(/\\/g, '/').trim();
    if (!unified || unified.startsWith('/') || /^[a-zA-Z]:/.test(unified)) {
        throw new InvalidFilePath(value);
    }
    const segments = unified.split('/').filter((segment) => segment && segment !== '.');
    if (segments.length === 0 || segments.some((segment) => segment === '..')) {
        throw new InvalidFilePath(value);
    }
    return segments.join('/');
}

export function normalizeFileMap(files: FileMap): FileMap {
    const normalized: FileMap = {};
    for (const [relativePath, content] of Object.entries(files)) {
        const key = normalizeRelativePath(relativePath);
        if (isTemplateAsset(key)) {
            continue;
        }
        normalized[key] = content;
    }
    return normalized;
}

const SESSION_ID_PATTERN = /^[a-zA-Z0-9_-]{1,128}$/;

export function isValidSessionId(value: string): boolean {
    return SESSION_ID_PATTERN.test(value);
}

/** The id itself; ids that would need rewriting are rejected so no two sessions share a directory. */
export function sessionDirectoryName(sessionId: string): string {
    if (!isValidSessionId(sessionId)) {
        throw new InvalidSessionId(sessionId);
    }
    return sessionId;
}

function comparePaths(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

function ensureDirectory(dir: string): void {
    if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
    }
}

function removeDirectory(dir: string): void {
    if (fs.existsSync(dir)) {
        fs.rmSync(dir, { recursive: true, force: true });
    }
}

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

function decodeUtf8(buffer: Buffer): string | undefined {
    try {
        return utf8Decoder.decode(buffer);
    } catch {
        return undefined;
    }
}

function readTextFiles(
    rootDir: string,
    onSkipped?: (relativePath: string) => void,
): FileMap {
    const files: FileMap = {};
    if (!fs.existsSync(rootDir)) {
        return files;
    }

    const walk = (dir: string): void => {
        for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
            const absolute = path.join(dir, entry.name);
            if (entry.isDirectory()) {
                walk(absolute);
                continue;
            }
            if (!entry.isFile()) {
                continue;
            }
            const relativePath = path
                .relative(rootDir, absolute)
                .split(path.sep)
                .join('/');
            if (isTemplateAsset(relativePath)) {
                continue;
            }
            const text = decodeUtf8(fs.readFileSync(absolute));
            if (text === undefined) {
                onSkipped?.(relativePath);
                continue;
            }
            files[relativePath] = text;
        }
    };

    walk(rootDir);
    return files;
}
