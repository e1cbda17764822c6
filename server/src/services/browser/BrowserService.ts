import { randomUUID } from 'node:crypto';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { Inject, Service } from 'typedi';
import { Settings, SettingsToken } from '../../config';
import { InvalidBrowserTransition, WorkspaceIOError, describeError } from '../../errors';
import {
    BrowserEvent,
    BrowserSessionInfo,
    LogAnalysis,
    ProbeKind,
} from '../../types/browser';
import { KeyedLock } from '../../utils/KeyedLock';
import { createLogger } from '../../utils/logger';
import { SseService } from '../SseService';
import { WorkspaceStore } from '../workspace/WorkspaceStore';
import { BrowserDriver, BrowserDriverToken } from './BrowserDriver';
import { BrowserVerificationSession, ProbeOptions } from './BrowserVerificationSession';
import { RetryPolicy } from './RetryPolicy';

interface Entry {
    browser: BrowserVerificationSession;
    snapshotDir: string;
    userDataDir: string;
}

/**
 * Registry of the browser verification session of each chat session. The
 * latest session is kept after it closes so its log stays readable. Every
 * operation that touches the browser context runs under a per-session lock.
 */
@Service()
export class BrowserService {
    private readonly logger = createLogger('BrowserService');
    private readonly entries = new Map<string, Entry>();
    private readonly lock = new KeyedLock();
    private readonly retry: RetryPolicy;

    constructor(
        @Inject(SettingsToken) private readonly settings: Settings,
        @Inject(BrowserDriverToken) private readonly driver: BrowserDriver,
        private readonly workspaceStore: WorkspaceStore,
        private readonly sseService: SseService,
    ) {
        this.retry = new RetryPolicy(settings.browser.extensionId);
    }

    /** Closes the current session, if any, then starts one on a snapshot of the workspace. */
    start(sessionId: string): Promise<BrowserSessionInfo> {
        return this.lock.runExclusive(sessionId, async () => {
            await this.closeEntry(sessionId);

            const workspace = this.workspaceStore.initialize(sessionId);
            const files = this.workspaceStore.read(workspace);
            if (Object.keys(files).length === 0) {
                throw new InvalidBrowserTransition('start without an extension', 'unstarted');
            }

            const id = randomUUID();
            const snapshotDir = path.join(workspace.root, 'browser', id);
            let userDataDir: string;
            try {
                fs.mkdirSync(path.dirname(snapshotDir), { recursive: true });
                fs.cpSync(workspace.extensionDir, snapshotDir, { recursive: true });
                userDataDir = fs.mkdtempSync(path.join(os.tmpdir(), 'extension-browser-'));
            } catch (error) {
                throw new WorkspaceIOError(
                    `Failed to snapshot extension for browser session ${id}`,
                    { cause: error },
                );
            }

            const browser = new BrowserVerificationSession({
                id,
                driver: this.driver,
                retry: this.retry,
                userDataDir,
                logDir: path.join(workspace.root, 'logs'),
                probeUrl: this.settings.browser.probeUrl,
                headless: this.settings.browser.headless,
                executablePath: this.settings.browser.executablePath,
            });
            this.entries.set(sessionId, { browser, snapshotDir, userDataDir });

            this.sseService.publishStatus(sessionId, {
                scope: 'browser',
                status: 'loading',
                message: 'Loading the extension in the browser...',
            });
            try {
                await browser.start({ directory: snapshotDir, files });
            } catch (error) {
                this.sseService.publishStatus(sessionId, {
                    scope: 'browser',
                    status: 'failed',
                    message: describeError(error),
                });
                throw error;
            }

            this.sseService.publishStatus(sessionId, {
                scope: 'browser',
                status: 'ready',
                message: 'Extension loaded in the browser.',
            });
            return browser.info();
        });
    }

    runProbe(
        sessionId: string,
        probe: ProbeKind,
        options: ProbeOptions = {},
    ): Promise<BrowserEvent[]> {
        return this.lock.runExclusive(sessionId, async () => {
            const browser = this.requireBrowser(sessionId, `run the ${probe} probe`);
            return browser.runProbe(probe, options);
        });
    }

    evaluate(sessionId: string, script: string): Promise<unknown> {
        return this.lock.runExclusive(sessionId, async () =>
            this.requireBrowser(sessionId, 'evaluate a script').evaluate(script),
        );
    }

    collectLogs(sessionId: string): BrowserEvent[] {
        return this.requireBrowser(sessionId, 'collect logs').collectLogs();
    }

    summarize(sessionId: string): LogAnalysis {
        return this.requireBrowser(sessionId, 'summarize logs').analyze();
    }

    /** Analysis of the latest browser session, when one has been started. */
    latestAnalysis(sessionId: string): LogAnalysis | undefined {
        const browser = this.entries.get(sessionId)?.browser;
        if (!browser || browser.status === 'unstarted') {
            return undefined;
        }
        return browser.analyze();
    }

    info(sessionId: string): BrowserSessionInfo | undefined {
        return this.entries.get(sessionId)?.browser.info();
    }

    close(sessionId: string): Promise<BrowserSessionInfo | undefined> {
        return this.lock.runExclusive(sessionId, async () => {
            await this.closeEntry(sessionId);
            return this.info(sessionId);
        });
    }

    /** Closes the browser session and forgets it. */
    discard(sessionId: string): Promise<void> {
        return this.lock.runExclusive(sessionId, async () => {
            await this.closeEntry(sessionId);
            this.entries.delete(sessionId);
        });
    }

    async closeAll(): Promise<void> {
        const sessionIds = [...this.entries.keys()];
        await Promise.all(sessionIds.map((sessionId) => this.close(sessionId)));
    }

    private requireBrowser(sessionId: string, operation: string): BrowserVerificationSession {
        const browser = this.entries.get(sessionId)?.browser;
        if (!browser) {
            throw new InvalidBrowserTransition(operation, 'unstarted');
        }
        return browser;
    }

    private async closeEntry(sessionId: string): Promise<void> {
        const entry = this.entries.get(sessionId);
        if (!entry || entry.browser.status === 'closed') {
            return;
        }
        await entry.browser.close();
        for (const dir of [entry.snapshotDir, entry.userDataDir]) {
            try {
                fs.rmSync(dir, { recursive: true, force: true });
            } catch (error) {
                this.logger.warn('Failed to remove browser directory', {
                    sessionId,
                    dir,
                    error: describeError(error),
                });
            }
        }
        this.sseService.publishStatus(sessionId, {
            scope: 'browser',
            status: 'closed',
            message: 'Browser session closed.',
        });
    }
}
