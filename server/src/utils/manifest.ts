import { FileMap } from '../types/extension';

export const MANIFEST_FILE = 'manifest.json';
export const DEFAULT_EXTENSION_NAME = 'Chrome Extension';
export const DEFAULT_EXTENSION_DESCRIPTION = 'A Chrome extension';
export const DEFAULT_POPUP = 'popup.html';

export interface ExtensionMetadata {
    name: string;
    description: string;
}

/** Parsed manifest.json, or undefined when missing or not a JSON object. */
export function parseManifest(files: FileMap): Record<string, unknown> | undefined {
    const raw = files[MANIFEST_FILE];
    if (!raw) {
        return undefined;
    }
    try {
        const parsed: unknown = JSON.parse(raw);
        return isRecord(parsed) ? parsed : undefined;
    } catch {
        return undefined;
    }
}

export function readExtensionMetadata(files: FileMap): ExtensionMetadata {
    const manifest = parseManifest(files);
    return {
        name: nonEmptyString(manifest?.name) ?? DEFAULT_EXTENSION_NAME,
        description: nonEmptyString(manifest?.description) ?? DEFAULT_EXTENSION_DESCRIPTION,
    };
}

/** Popup page declared by the manifest's action, relative to the extension root. */
export function resolvePopupPath(files: FileMap): string {
    const manifest = parseManifest(files);
    for (const key of ['action', 'browser_action']) {
        const section = manifest?.[key];
        const popup = isRecord(section) ? nonEmptyString(section.default_popup) : undefined;
        if (popup) {
            return popup.replace(/^\.?\//, '');
        }
    }
    return DEFAULT_POPUP;
}

function nonEmptyString(value: unknown): string | undefined {
    return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
