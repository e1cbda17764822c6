import path from 'node:path';
import { Token } from 'typedi';
import { z } from 'zod';

export interface RetrySettings {
    attempts: number;
    initialDelayMs: number;
    backoffFactor: number;
    maxDelayMs: number;
}

export interface Settings {
    port: number;
    logLevel: string;
    dataRoot: string;
    templateDir: string;
    generation: {
        command: string;
        model: string;
        timeoutMs: number;
        /** Wait after SIGTERM before SIGKILL, and again before giving up on `close`. */
        killGraceMs: number;
        queueCapacity: number;
    };
    browser: {
        headless: boolean;
        executablePath?: string;
        probeUrl: string;
        extensionId: RetrySettings;
    };
    llm: {
        model: string;
        openaiApiKey?: string;
        geminiApiKey?: string;
    };
}

export const SettingsToken = new Token<Settings>('settings');

const optionalString = z
    .string()
    .trim()
    .optional()
    .transform((value) => (value ? value : undefined));

const booleanFlag = z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .transform((value) => value === 'true' || value === '1' || value === 'yes');

const envSchema = z.object({
    PORT: z.coerce.number().int().positive().default(3000),
    LOG_LEVEL: z
        .enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'])
        .default('info'),
    DATA_ROOT: z.string().trim().min(1).default('data/sessions'),
    TEMPLATE_DIR: z
        .string()
        .trim()
        .min(1)
        .default('server/assets/extension-template'),
    GENERATION_COMMAND: z.string().trim().min(1).default('gemini'),
    GENERATION_MODEL: z.string().trim().min(1).default('gemini-2.5-flash'),
    GENERATION_TIMEOUT_MS: z.coerce.number().int().positive().default(600_000),
    GENERATION_KILL_GRACE_MS: z.coerce.number().int().min(0).default(5000),
    GENERATION_QUEUE_CAPACITY: z.coerce.number().int().min(1).default(256),
    BROWSER_HEADLESS: booleanFlag.default('false'),
    BROWSER_EXECUTABLE_PATH: optionalString,
    BROWSER_PROBE_URL: z.string().url().default('https://example.com'),
    BROWSER_ID_ATTEMPTS: z.coerce.number().int().min(1).default(8),
    BROWSER_ID_INITIAL_DELAY_MS: z.coerce.number().int().min(0).default(250),
    BROWSER_ID_BACKOFF_FACTOR: z.coerce.number().min(1).default(2),
    BROWSER_ID_MAX_DELAY_MS: z.coerce.number().int().min(0).default(4000),
    MODEL: z.string().trim().min(1).default('gpt-4o-mini'),
    OPENAI_API_KEY: optionalString,
    GEMINI_API_KEY: optionalString,
    GOOGLE_GENERATIVE_AI_API_KEY: optionalString,
});

export class ConfigurationError extends Error {
    constructor(readonly issues: string[]) {
        super(`Invalid configuration: ${issues.join('; ')}`);
        this.name = 'ConfigurationError';
    }
}

/**
 * Reads settings from an environment map. Relative directories are resolved
 * against `cwd` so the server can be started from the repository root.
 */
export function loadSettings(
    env: NodeJS.ProcessEnv = process.env,
    cwd: string = process.cwd(),
): Settings {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigurationError(
            parsed.error.issues.map(
                (issue) => `${issue.path.join('.')}: ${issue.message}`,
            ),
        );
    }

    const values = parsed.data;
    return {
        port: values.PORT,
        logLevel: values.LOG_LEVEL,
        dataRoot: path.resolve(cwd, values.DATA_ROOT),
        templateDir: path.resolve(cwd, values.TEMPLATE_DIR),
        generation: {
            command: values.GENERATION_COMMAND,
            model: values.GENERATION_MODEL,
            timeoutMs: values.GENERATION_TIMEOUT_MS,
            killGraceMs: values.GENERATION_KILL_GRACE_MS,
            queueCapacity: values.GENERATION_QUEUE_CAPACITY,
        },
        browser: {
            headless: values.BROWSER_HEADLESS,
            executablePath: values.BROWSER_EXECUTABLE_PATH,
            probeUrl: values.BROWSER_PROBE_URL,
            extensionId: {
                attempts: values.BROWSER_ID_ATTEMPTS,
                initialDelayMs: values.BROWSER_ID_INITIAL_DELAY_MS,
                backoffFactor: values.BROWSER_ID_BACKOFF_FACTOR,
                maxDelayMs: values.BROWSER_ID_MAX_DELAY_MS,
            },
        },
        llm: {
            model: values.MODEL,
            openaiApiKey: values.OPENAI_API_KEY,
            geminiApiKey:
                values.GEMINI_API_KEY ?? values.GOOGLE_GENERATIVE_AI_API_KEY,
        },
    };
}
