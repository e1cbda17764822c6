import { Token } from 'typedi';
import { BrowserEventCategory } from '../../types/browser';

/** Receives passively captured runtime events from a launched context. */
export interface DriverEventSink {
    record(category: BrowserEventCategory, payload: Record<string, unknown>): void;
    /** The context went away without `close()` being called. */
    disconnected(reason: string): void;
}

export interface LaunchRequest {
    /** Directory holding the one extension the context may load. */
    extensionPath: string;
    userDataDir: string;
    headless: boolean;
    executablePath?: string;
    sink: DriverEventSink;
}

export interface BrowserContextHandle {
    /** URLs of registered background/service workers. */
    serviceWorkerUrls(): string[];
    /** Opens the URL in the tracked tab. */
    navigate(url: string): Promise<void>;
    /** Dispatches a mouse click at viewport coordinates in the tracked tab. */
    click(x: number, y: number): Promise<void>;
    press(key: string): Promise<void>;
    evaluate(script: string): Promise<unknown>;
    close(): Promise<void>;
}

export interface BrowserDriver {
    launch(request: LaunchRequest): Promise<BrowserContextHandle>;
}

export const BrowserDriverToken = new Token<BrowserDriver>('browser-driver');
