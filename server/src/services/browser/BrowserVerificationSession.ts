import fs from 'node:fs';
import path from 'node:path';
import {
    BrowserLaunchFailure,
    InvalidBrowserTransition,
    ScriptEvaluationFailure,
    describeError,
} from '../../errors';
import {
    BrowserEvent,
    BrowserSessionInfo,
    BrowserSessionStatus,
    LogAnalysis,
    ProbeKind,
} from '../../types/browser';
import { FileMap } from '../../types/extension';
import { createLogger } from '../../utils/logger';
import { resolvePopupPath } from '../../utils/manifest';
import { BrowserContextHandle, BrowserDriver, DriverEventSink } from './BrowserDriver';
import { BrowserEventLog } from './BrowserEventLog';
import { RetryPolicy } from './RetryPolicy';
import { analyzeLog } from './logAnalysis';

/** Probes the `test` probe runs, in order. */
export const TEST_SEQUENCE: readonly Exclude<ProbeKind, 'test'>[] = [
    'popup',
    'click',
    'keyboard',
    'navigate',
];

const CLICK_POINT = { x: 40, y: 40 } as const;

// Clicks the first interactive element of the tracked page and describes it.
const CLICK_FIRST_CONTROL = `(() => {
    const el = document.querySelector('button, [role="button"], input[type="button"], input[type="submit"], a[href]');
    if (!el) return null;
    el.click();
    return el.tagName.toLowerCase() + (el.id ? '#' + el.id : '');
})()`;
const PROBE_KEY = 'Enter';

export interface ExtensionSnapshot {
    /** Directory the browser loads; must not change while the session lives. */
    directory: string;
    files: FileMap;
}

export interface ProbeOptions {
    /** Page the navigate probe opens instead of the configured probe URL. */
    url?: string;
}

export interface BrowserSessionOptions {
    id: string;
    driver: BrowserDriver;
    retry: RetryPolicy;
    /** Directory for the throwaway browser profile. */
    userDataDir: string;
    /** Where the log and its analysis are written on close. */
    logDir: string;
    probeUrl: string;
    headless: boolean;
    executablePath?: string;
    now?: () => Date;
}

/**
 * One persistent browser context with exactly one extension loaded.
 * unstarted -> loading -> ready -> closed; failed is reachable from loading
 * and ready. Callers serialize operations on a session.
 */
export class BrowserVerificationSession {
    readonly id: string;

    private readonly logger = createLogger('BrowserVerificationSession');
    private readonly log: BrowserEventLog;
    private currentStatus: BrowserSessionStatus = 'unstarted';
    private context?: BrowserContextHandle;
    private extensionRuntimeId?: string;
    private popupPath = 'popup.html';
    private failure?: string;

    constructor(private readonly options: BrowserSessionOptions) {
        this.id = options.id;
        this.log = new BrowserEventLog(options.now);
    }

    get status(): BrowserSessionStatus {
        return this.currentStatus;
    }

    get isActive(): boolean {
        return this.currentStatus === 'loading' || this.currentStatus === 'ready';
    }

    info(): BrowserSessionInfo {
        return {
            id: this.id,
            status: this.currentStatus,
            extensionRuntimeId: this.extensionRuntimeId,
            eventCount: this.log.size,
            failure: this.failure,
        };
    }

    async start(snapshot: ExtensionSnapshot): Promise<void> {
        if (this.currentStatus !== 'unstarted') {
            throw new InvalidBrowserTransition('start', this.currentStatus);
        }
        this.transition('loading');
        this.popupPath = resolvePopupPath(snapshot.files);
        this.log.append('lifecycle', { event: 'loading', extensionPath: snapshot.directory });

        let context: BrowserContextHandle;
        try {
            context = await this.options.driver.launch({
                extensionPath: snapshot.directory,
                userDataDir: this.options.userDataDir,
                headless: this.options.headless,
                executablePath: this.options.executablePath,
                sink: this.createSink(),
            });
        } catch (error) {
            throw this.fail(`Browser context failed to start: ${describeError(error)}`, error);
        }

        if (!this.isLoading()) {
            // Closed while the launch was in flight.
            await context.close();
            throw new BrowserLaunchFailure(`Browser session ${this.id} was closed during start`);
        }
        this.context = context;

        const runtimeId = await this.options.retry.poll(
            () => findExtensionId(context.serviceWorkerUrls()),
            () => !this.isLoading(),
        );

        if (!this.isLoading()) {
            throw new BrowserLaunchFailure(
                this.failure ?? `Browser session ${this.id} stopped during start`,
            );
        }
        if (!runtimeId) {
            await this.releaseContext();
            throw this.fail(
                `Extension id not resolved after ${this.options.retry.settings.attempts} attempts; ` +
                'the extension registered no background service worker',
            );
        }

        this.extensionRuntimeId = runtimeId;
        this.log.append('lifecycle', { event: 'ready', extensionId: runtimeId });
        this.transition('ready');
    }

    /** Runs one scripted interaction and returns the events appended meanwhile. */
    async runProbe(kind: ProbeKind, probeOptions: ProbeOptions = {}): Promise<BrowserEvent[]> {
        if (this.currentStatus !== 'ready') {
            throw new InvalidBrowserTransition(`run the ${kind} probe`, this.currentStatus);
        }
        const from = this.log.size;
        const probes = kind === 'test' ? TEST_SEQUENCE : [kind];
        for (const probe of probes) {
            if (this.currentStatus !== 'ready') {
                break;
            }
            await this.executeProbe(probe, probeOptions);
        }
        return this.log.since(from);
    }

    /** Runs a caller's script in the tracked tab and returns its result. */
    async evaluate(script: string): Promise<unknown> {
        const context = this.context;
        if (this.currentStatus !== 'ready' || !context) {
            throw new InvalidBrowserTransition('evaluate a script', this.currentStatus);
        }
        this.log.append('lifecycle', { event: 'script-evaluated', length: script.length });
        try {
            return await context.evaluate(script);
        } catch (error) {
            const message = describeError(error);
            this.log.append('error', { source: 'script', message });
            throw new ScriptEvaluationFailure(`Script evaluation failed: ${message}`, { cause: error });
        }
    }

    collectLogs(): BrowserEvent[] {
        if (this.currentStatus === 'unstarted') {
            throw new InvalidBrowserTransition('collect logs', this.currentStatus);
        }
        return this.log.entries();
    }

    analyze(): LogAnalysis {
        return analyzeLog(this.collectLogs());
    }

    async close(): Promise<void> {
        if (this.currentStatus === 'closed') {
            return;
        }
        const wasStarted = this.currentStatus !== 'unstarted';
        this.transition('closed');
        if (!wasStarted) {
            return;
        }
        this.log.append('lifecycle', { event: 'closed' });
        await this.releaseContext();
        this.persistLog();
    }

    private async executeProbe(
        probe: Exclude<ProbeKind, 'test'>,
        probeOptions: ProbeOptions,
    ): Promise<void> {
        const context = this.context;
        if (!context) {
            return;
        }
        try {
            switch (probe) {
                case 'popup': {
                    const url = `chrome-extension://${this.extensionRuntimeId}/${this.popupPath}`;
                    await context.navigate(url);
                    this.log.append('lifecycle', { event: 'popup-opened', url });
                    break;
                }
                case 'click': {
                    const target = await context.evaluate(CLICK_FIRST_CONTROL);
                    if (typeof target === 'string') {
                        this.log.append('click', { target });
                    } else {
                        await context.click(CLICK_POINT.x, CLICK_POINT.y);
                        this.log.append('click', { ...CLICK_POINT });
                    }
                    break;
                }
                case 'keyboard':
                    await context.press(PROBE_KEY);
                    this.log.append('keyboard', { key: PROBE_KEY });
                    break;
                case 'navigate':
                    await context.navigate(probeOptions.url ?? this.options.probeUrl);
                    break;
            }
        } catch (error) {
            this.logger.warn('Probe failed', {
                sessionId: this.id,
                probe,
                error: describeError(error),
            });
            this.log.append('error', { probe, message: describeError(error) });
        }
    }

    private createSink(): DriverEventSink {
        return {
            record: (category, payload) => {
                if (this.isActive) {
                    this.log.append(category, payload);
                }
            },
            disconnected: (reason) => {
                if (!this.isActive) {
                    return;
                }
                this.log.append('lifecycle', { event: 'crashed', level: 'error', message: reason });
                this.context = undefined;
                this.failure = reason;
                this.transition('failed');
            },
        };
    }

    private fail(message: string, cause?: unknown): BrowserLaunchFailure {
        this.failure = message;
        this.log.append('lifecycle', { event: 'failed', level: 'error', message });
        this.transition('failed');
        return new BrowserLaunchFailure(message, { cause });
    }

    private async releaseContext(): Promise<void> {
        const context = this.context;
        this.context = undefined;
        if (!context) {
            return;
        }
        try {
            await context.close();
        } catch (error) {
            this.logger.warn('Failed to close browser context', {
                sessionId: this.id,
                error: describeError(error),
            });
        }
    }

    private persistLog(): void {
        const target = path.join(this.options.logDir, `browser-${this.id}.json`);
        try {
            fs.mkdirSync(this.options.logDir, { recursive: true });
            fs.writeFileSync(
                target,
                JSON.stringify(
                    {
                        id: this.id,
                        extensionId: this.extensionRuntimeId ?? null,
                        failure: this.failure ?? null,
                        analysis: analyzeLog(this.log.entries()),
                        events: this.log.entries(),
                    },
                    null,
                    2,
                ),
                'utf-8',
            );
        } catch (error) {
            this.logger.warn('Failed to persist browser log', {
                sessionId: this.id,
                target,
                error: describeError(error),
            });
        }
    }

    private isLoading(): boolean {
        return this.currentStatus === 'loading';
    }

    private transition(next: BrowserSessionStatus): void {
        this.logger.info('Browser session transition', {
            sessionId: this.id,
            from: this.currentStatus,
            to: next,
        });
        this.currentStatus = next;
    }
}

/** `chrome-extension://<id>/background.js` -> `<id>` */
export function findExtensionId(workerUrls: string[]): string | undefined {
    for (const url of workerUrls) {
        if (url.startsWith('chrome-extension://')) {
            const id = url.split('/')[2];
            if (id) {
                return id;
            }
        }
    }
    return undefined;
}
