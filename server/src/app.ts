import 'reflect-metadata';
import express from 'express';
import cors from 'cors';
import { useContainer, useExpressServer } from 'routing-controllers';
import { Container } from 'typedi';
import { Settings, SettingsToken } from './config';
import { BrowserController } from './controllers/BrowserController';
import { ChatController } from './controllers/ChatController';
import { BrowserDriverToken } from './services/browser/BrowserDriver';
import { PlaywrightDriver } from './services/browser/PlaywrightDriver';
import { ProcessLauncherToken, spawnProcess } from './services/generation/processLauncher';
import { LlmFactory } from './services/llm/LlmFactory';
import { LlmClientToken } from './services/llm/types';

useContainer(Container);

/** Binds the process launcher, browser driver and language model the services are injected with. */
export function registerDependencies(settings: Settings): void {
    Container.set(SettingsToken, settings);
    Container.set(ProcessLauncherToken, spawnProcess);
    Container.set(BrowserDriverToken, Container.get(PlaywrightDriver));
    Container.set(LlmClientToken, Container.get(LlmFactory).getClient());
}

export function createApp(settings: Settings): express.Express {
    registerDependencies(settings);

    const app = express();

    app.use(cors());

    useExpressServer(app, {
        controllers: [ChatController, BrowserController],
        validation: {
            whitelist: true,
            forbidNonWhitelisted: true,
            validationError: { target: false },
        },
        classTransformer: true,
    });

    return app;
}
