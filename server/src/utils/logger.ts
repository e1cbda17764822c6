import winston from 'winston';

export type Logger = winston.Logger;

const rootLogger = winston.createLogger({
    level: process.env.LOG_LEVEL?.trim() || 'info',
    format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json(),
    ),
    transports: [new winston.transports.Console()],
    silent: process.env.NODE_ENV === 'test',
});

export function createLogger(scope: string): Logger {
    return rootLogger.child({ scope });
}

export function setLogLevel(level: string): void {
    rootLogger.level = level;
}
