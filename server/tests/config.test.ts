import { describe, expect, test } from '@jest/globals';
import { ConfigurationError, loadSettings } from '../src/config';

describe('loadSettings', () => {
    test('should apply defaults', () => {
        expect(loadSettings({}, '/srv/app')).toEqual({
            port: 3000,
            logLevel: 'info',
            dataRoot: '/srv/app/data/sessions',
            templateDir: '/srv/app/server/assets/extension-template',
            generation: {
                command: 'gemini',
                model: 'gemini-2.5-flash',
                timeoutMs: 600000,
                killGraceMs: 5000,
                queueCapacity: 256,
            },
            browser: {
                headless: false,
                executablePath: undefined,
                probeUrl: 'https://example.com',
                extensionId: { attempts: 8, initialDelayMs: 250, backoffFactor: 2, maxDelayMs: 4000 },
            },
            llm: { model: 'gpt-4o-mini', openaiApiKey: undefined, geminiApiKey: undefined },
        });
    });

    test('should read overrides from the environment', () => {
        const settings = loadSettings(
            {
                PORT: '8080',
                DATA_ROOT: '/var/lib/builder',
                GENERATION_TIMEOUT_MS: '1000',
                BROWSER_HEADLESS: 'yes',
                BROWSER_EXECUTABLE_PATH: '  ',
                MODEL: 'gemini-2.0-flash',
                OPENAI_API_KEY: '',
                GOOGLE_GENERATIVE_AI_API_KEY: 'test-secret',
            },
            '/srv/app',
        );

        expect(settings.port).toBe(8080);
        expect(settings.dataRoot).toBe('/var/lib/builder');
        expect(settings.generation.timeoutMs).toBe(1000);
        expect(settings.browser.headless).toBe(true);
        expect(settings.browser.executablePath).toBeUndefined();
        expect(settings.llm).toEqual({
            model: 'gemini-2.0-flash',
            openaiApiKey: undefined,
            geminiApiKey: 'test-secret',
        });
    });

    test('should collect every invalid value', () => {
        let caught: unknown;
        try {
            loadSettings({ PORT: 'abc', BROWSER_HEADLESS: 'maybe' }, '/srv/app');
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(ConfigurationError);
        const issues = caught instanceof ConfigurationError ? caught.issues : [];
        expect(issues.map((issue) => issue.split(':')[0])).toEqual(['PORT', 'BROWSER_HEADLESS']);
    });
});
