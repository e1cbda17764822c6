import 'reflect-metadata';
import dotenv from 'dotenv';
import { Container } from 'typedi';
import { createApp } from './app';
import { ConfigurationError, loadSettings } from './config';
import { describeError } from './errors';
import { BrowserService } from './services/browser/BrowserService';
import { SseService } from './services/SseService';
import { createLogger, setLogLevel } from './utils/logger';

dotenv.config();

const logger = createLogger('server');

function main(): void {
    const settings = loadSettings();
    setLogLevel(settings.logLevel);

    const app = createApp(settings);
    const server = app.listen(settings.port, () => {
        logger.info('Server listening', { port: settings.port, dataRoot: settings.dataRoot });
    });

    let shuttingDown = false;
    const shutdown = (signal: NodeJS.Signals): void => {
        if (shuttingDown) {
            return;
        }
        shuttingDown = true;
        logger.info('Shutting down', { signal });
        Container.get(SseService).closeAll();
        Container.get(BrowserService)
            .closeAll()
            .catch((error: unknown) => {
                logger.error('Failed to close browser sessions', { error: describeError(error) });
            })
            .finally(() => {
                server.close(() => process.exit(0));
            });
    };

    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
}

try {
    main();
} catch (error) {
    if (error instanceof ConfigurationError) {
        logger.error(error.message, { issues: error.issues });
    } else {
        logger.error('Failed to start server', { error: describeError(error) });
    }
    process.exitCode = 1;
}
