import { BrowserContext, Page, chromium } from 'playwright-core';
import { Service } from 'typedi';
import { describeError } from '../../errors';
import { createLogger } from '../../utils/logger';
import {
    BrowserContextHandle,
    BrowserDriver,
    DriverEventSink,
    LaunchRequest,
} from './BrowserDriver';

@Service()
export class PlaywrightDriver implements BrowserDriver {
    private readonly logger = createLogger('PlaywrightDriver');

    async launch(request: LaunchRequest): Promise<BrowserContextHandle> {
        const context = await chromium.launchPersistentContext(request.userDataDir, {
            headless: request.headless,
            executablePath: request.executablePath,
            args: [
                `--disable-extensions-except=${request.extensionPath}`,
                `--load-extension=${request.extensionPath}`,
            ],
        });
        this.logger.info('Browser context launched', {
            extensionPath: request.extensionPath,
            headless: request.headless,
        });
        return new PlaywrightContextHandle(context, request.sink);
    }
}

class PlaywrightContextHandle implements BrowserContextHandle {
    private closing = false;
    private trackedPage?: Page;

    constructor(
        private readonly context: BrowserContext,
        private readonly sink: DriverEventSink,
    ) {
        for (const page of context.pages()) {
            this.watch(page);
        }
        context.on('page', (page) => this.watch(page));
        context.on('serviceworker', (worker) =>
            sink.record('lifecycle', { event: 'service-worker-registered', url: worker.url() }),
        );
        context.on('close', () => {
            if (!this.closing) {
                sink.disconnected('The browser context closed unexpectedly');
            }
        });
    }

    serviceWorkerUrls(): string[] {
        return this.context.serviceWorkers().map((worker) => worker.url());
    }

    async navigate(url: string): Promise<void> {
        const page = await this.page();
        await page.goto(url, { waitUntil: 'domcontentloaded' });
    }

    async click(x: number, y: number): Promise<void> {
        const page = await this.page();
        await page.mouse.click(x, y);
    }

    async press(key: string): Promise<void> {
        const page = await this.page();
        await page.keyboard.press(key);
    }

    async evaluate(script: string): Promise<unknown> {
        const page = await this.page();
        return page.evaluate(script);
    }

    async close(): Promise<void> {
        if (this.closing) {
            return;
        }
        this.closing = true;
        await this.context.close();
    }

    private async page(): Promise<Page> {
        if (this.trackedPage && !this.trackedPage.isClosed()) {
            return this.trackedPage;
        }
        const [existing] = this.context.pages();
        this.trackedPage = existing ?? (await this.context.newPage());
        return this.trackedPage;
    }

    private watch(page: Page): void {
        page.on('console', (message) => {
            const location = message.location();
            this.sink.record('console', {
                level: message.type(),
                text: message.text(),
                url: location.url,
                line: location.lineNumber,
            });
        });
        page.on('pageerror', (error) =>
            this.sink.record('error', {
                message: describeError(error),
                stack: error.stack,
                url: page.url(),
            }),
        );
        page.on('requestfailed', (request) =>
            this.sink.record('network-error', {
                url: request.url(),
                method: request.method(),
                message: request.failure()?.errorText ?? 'request failed',
            }),
        );
        page.on('framenavigated', (frame) => {
            if (frame === page.mainFrame()) {
                this.sink.record('navigation', { url: frame.url() });
            }
        });
        page.on('crash', () =>
            this.sink.record('lifecycle', { event: 'page-crashed', level: 'error', url: page.url() }),
        );
    }
}
