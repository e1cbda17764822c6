import fs from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from '@jest/globals';
import { InvalidFilePath, InvalidSessionId, SessionNotFoundError } from '../src/errors';
import { Settings } from '../src/config';
import { ChatService } from '../src/services/ChatService';
import { BrowserService } from '../src/services/browser/BrowserService';
import { GenerationEngine } from '../src/services/generation/GenerationEngine';
import { ProcessLauncher } from '../src/services/generation/processLauncher';
import { IntentRouter } from '../src/services/intent/IntentRouter';
import { SessionStore } from '../src/services/session/SessionStore';
import { WorkspaceStore } from '../src/services/workspace/WorkspaceStore';
import { OutboundEvent } from '../src/types/events';
import { waitFor } from './helpers/async';
import { FakeBrowserDriver } from './helpers/fakeBrowser';
import { FakeLlmClient } from './helpers/fakeLlm';
import { FakeProcess, Launch, StubbornProcess, scriptedLauncher } from './helpers/fakeProcess';
import { RecordingSseService } from './helpers/recordingSse';
import { createTempDir, createTestSettings, removeDir, writeFiles } from './helpers/settings';

const MANIFEST = JSON.stringify({
    manifest_version: 3,
    name: 'Tab Counter',
    description: 'Counts open tabs',
    action: { default_popup: 'popup.html' },
    background: { service_worker: 'popup.js' },
});

const GENERATED = {
    'manifest.json': MANIFEST,
    'popup.html': '<script src="popup.js"></script><span id="count"></span>',
    'popup.js': 'chrome.tabs.query({}, (tabs) => render(tabs.length));',
};

type Script = (proc: FakeProcess, launch: Launch) => Promise<void>;

const buildScript: Script = async (proc, launch) => {
    writeFiles(launch.options.cwd, GENERATED);
    proc.out('Writing manifest.json');
    await proc.exit(0);
};

function types(events: OutboundEvent[]): string[] {
    return events.map((event) => event.type);
}

function lastMessage(events: OutboundEvent[]): string {
    const message = [...events].reverse().find((event) => event.type === 'message');
    return message?.type === 'message' ? message.content : '';
}

describe('ChatService', () => {
    let dataRoot: string;
    let scripts: Script[];
    let launches: Launch[];
    let llm: FakeLlmClient;
    let sse: RecordingSseService;
    let driver: FakeBrowserDriver;
    let sessionStore: SessionStore;
    let workspaceStore: WorkspaceStore;
    let browserService: BrowserService;
    let chat: ChatService;

    beforeEach(() => {
        dataRoot = createTempDir();
        const settings = createTestSettings(dataRoot);
        scripts = [];
        const scripted = scriptedLauncher(async (proc, launch) => {
            const script = scripts.shift() ?? buildScript;
            await script(proc, launch);
        });
        launches = scripted.launches;
        llm = new FakeLlmClient();
        sse = new RecordingSseService();
        driver = new FakeBrowserDriver();
        sessionStore = new SessionStore(settings);
        workspaceStore = new WorkspaceStore(settings);
        browserService = new BrowserService(settings, driver, workspaceStore, sse);
        chat = createChat(settings, scripted.launcher);
    });

    function createChat(settings: Settings, launcher: ProcessLauncher): ChatService {
        return new ChatService(
            sessionStore,
            workspaceStore,
            new GenerationEngine(settings, workspaceStore, launcher),
            new IntentRouter(llm),
            browserService,
            sse,
            llm,
        );
    }

    afterEach(async () => {
        await browserService.closeAll();
        removeDir(dataRoot);
    });

    async function build(sessionId = 's1'): Promise<OutboundEvent[]> {
        return chat.handleUserMessage(sessionId, 'build a tab counter extension');
    }

    describe('build', () => {
        test('should generate an extension and announce it last', async () => {
            const events = await build();

            expect(types(events)).toEqual(['status', 'cli_output', 'status', 'message', 'extension_updated']);
            expect(events[0]).toEqual({
                type: 'status',
                scope: 'generation',
                status: 'started',
                message: 'Building the extension...',
            });
            expect(events[1]).toEqual({ type: 'cli_output', stream: 'stdout', content: 'Writing manifest.json' });
            expect(events[2]).toEqual({
                type: 'status',
                scope: 'generation',
                status: 'completed',
                message: 'Tab Counter is ready.',
            });
            expect(lastMessage(events)).toBe(
                [
                    "I've generated your Chrome extension.",
                    '',
                    '- Name: Tab Counter',
                    '- Description: Counts open tabs',
                    '- Files: manifest.json, popup.html, popup.js',
                    '',
                    'Load it in the browser to try it out, or tell me what to change.',
                ].join('\n'),
            );
            expect(events[4]).toEqual({
                type: 'extension_updated',
                extension_id: expect.any(String),
                name: 'Tab Counter',
                description: 'Counts open tabs',
                file_list: ['manifest.json', 'popup.html', 'popup.js'],
            });
            expect(sse.eventsFor('s1')).toEqual(events);
        });

        test('should hand the generator a single-line build instruction', async () => {
            await build();

            const instruction = launches[0].args[4];
            expect(instruction.startsWith(
                'Create a complete Chrome extension (Manifest V3) in the current directory. ' +
                'Requirements: build a tab counter extension.',
            )).toBe(true);
            expect(instruction).not.toContain('\n');
        });

        test('should record the transcript and the extension on the session', async () => {
            await build();

            const session = sessionStore.require('s1');
            expect(session.messages.map((message) => message.role)).toEqual(['user', 'assistant']);
            expect(session.messages[0].content).toBe('build a tab counter extension');
            expect(session.extension).toMatchObject({ name: 'Tab Counter', description: 'Counts open tabs' });
        });

        test('should leave the workspace alone when nothing was generated', async () => {
            scripts.push(async (proc) => {
                proc.out('thinking');
                await proc.exit(0);
            });

            const events = await build();

            expect(types(events)).toEqual(['status', 'cli_output', 'status', 'message']);
            expect(events[2]).toEqual({
                type: 'status',
                scope: 'generation',
                status: 'failed',
                message: 'The generation process exited successfully but produced no files.',
            });
            expect(lastMessage(events)).toBe(
                'The generator finished but no files were produced, so nothing was changed. ' +
                'Try describing the extension in more detail.',
            );
            expect(workspaceStore.listFiles(workspaceStore.initialize('s1'))).toEqual([]);
            expect(sessionStore.require('s1').extension).toBeUndefined();
        });

        test('should replace the previous extension on a second build', async () => {
            await build();
            scripts.push(async (proc, launch) => {
                expect(fs.existsSync(path.join(launch.options.cwd, 'popup.js'))).toBe(false);
                writeFiles(launch.options.cwd, { 'manifest.json': '{"name":"Clock"}', 'clock.js': 'tick();' });
                await proc.exit(0);
            });

            const events = await chat.handleUserMessage('s1', 'create a clock extension');

            expect(events.at(-1)).toMatchObject({
                type: 'extension_updated',
                name: 'Clock',
                description: 'A Chrome extension',
                file_list: ['clock.js', 'manifest.json'],
            });
        });
    });

    describe('fix', () => {
        test('should merge changed files and keep the rest', async () => {
            const built = await build();
            scripts.push(async (proc, launch) => {
                fs.rmSync(path.join(launch.options.cwd, 'popup.html'));
                writeFiles(launch.options.cwd, { 'popup.js': 'render(0);' });
                proc.out('Patched popup.js');
                await proc.exit(0);
            });

            const events = await chat.handleUserMessage('s1', 'it throws an error when I click the button');

            expect(types(events)).toEqual(['status', 'cli_output', 'status', 'message', 'extension_updated']);
            expect(events[0]).toMatchObject({ status: 'started', message: 'Fixing the extension...' });
            expect(events[4]).toEqual({ ...built[4], file_list: ['manifest.json', 'popup.html', 'popup.js'] });
            expect(workspaceStore.read(workspaceStore.initialize('s1'))).toEqual({
                ...GENERATED,
                'popup.js': 'render(0);',
            });
            expect(launches[1].args[4]).toContain('Existing files: manifest.json, popup.html, popup.js.');
            expect(lastMessage(events).startsWith("I've fixed your Chrome extension.")).toBe(true);
        });

        test('should report a failed run and keep the previous files', async () => {
            await build();
            scripts.push(async (proc) => {
                proc.err('quota exceeded');
                await proc.exit(1);
            });

            const events = await chat.handleUserMessage('s1', 'the popup is broken');

            expect(events.map((event) => (event.type === 'cli_output' ? event.content : event.type))).toEqual([
                'status',
                'quota exceeded',
                'Generation process failed with return code 1\nError: quota exceeded',
                'status',
                'message',
            ]);
            expect(events[3]).toEqual({
                type: 'status',
                scope: 'generation',
                status: 'failed',
                message: 'Generation process failed with return code 1\nError: quota exceeded',
            });
            expect(lastMessage(events)).toBe(
                'Extension generation failed: Generation process failed with return code 1\n' +
                'Error: quota exceeded. Your previous extension files are unchanged.',
            );
            expect(workspaceStore.read(workspaceStore.initialize('s1'))).toEqual(GENERATED);
            expect(chat.isGenerating('s1')).toBe(false);
        });

        test('should build instead when there is nothing to fix', async () => {
            const events = await chat.handleUserMessage('s1', 'the popup is broken');

            expect(events[0]).toMatchObject({ message: 'Building the extension...' });
            expect(launches[0].args[4]).toContain('Requirements: the popup is broken.');
        });

        test('should quote the browser findings to the generator', async () => {
            await build();
            await browserService.start('s1');
            driver.last?.sink.record('console', { level: 'error', text: 'Uncaught TypeError: render is not a function' });
            scripts.push(async (proc, launch) => {
                writeFiles(launch.options.cwd, { 'popup.js': 'render(1);' });
                await proc.exit(0);
            });

            await chat.handleUserMessage('s1', 'the popup is broken');

            expect(launches[1].args[4]).toContain('Recent errors: console: Uncaught TypeError: render is not a function.');
            expect(launches[1].args[4]).toContain('Findings: Found 1 JavaScript errors that may need fixing.');
            expect(browserService.info('s1')?.status).toBe('ready');
        });
    });

    test('should run generations of one session one at a time', async () => {
        let release: () => void = () => undefined;
        const gate = new Promise<void>((resolve) => {
            release = resolve;
        });
        scripts.push(async (proc, launch) => {
            await gate;
            await buildScript(proc, launch);
        });

        const first = build();
        const second = chat.handleUserMessage('s1', 'create a clock extension');
        await waitFor(() => launches.length === 1);
        for (let turn = 0; turn < 20; turn += 1) {
            await new Promise((resolve) => setImmediate(resolve));
        }

        expect(launches).toHaveLength(1);
        expect(chat.isGenerating('s1')).toBe(true);

        release();
        const [firstEvents, secondEvents] = await Promise.all([first, second]);

        expect(launches).toHaveLength(2);
        expect(types(firstEvents)).toEqual(['status', 'cli_output', 'status', 'message', 'extension_updated']);
        expect(types(secondEvents)).toEqual(['status', 'cli_output', 'status', 'message', 'extension_updated']);
        const published = sse.eventsFor('s1');
        expect(published.indexOf(secondEvents[0])).toBeGreaterThan(published.indexOf(firstEvents[4]));
        expect(chat.isGenerating('s1')).toBe(false);
    });

    test('should start generations in the order the messages arrived', async () => {
        let release: () => void = () => undefined;
        llm.classifyGate = new Promise<void>((resolve) => {
            release = resolve;
        });
        llm.queue({ kind: 'build', requirements: 'a weather widget for the toolbar', features: [], targetSites: [] });

        const first = chat.handleUserMessage('s1', 'I want a weather widget in my toolbar');
        const second = chat.handleUserMessage('s1', 'build a second clock extension');
        await waitFor(() => llm.classified.length === 1);
        for (let turn = 0; turn < 20; turn += 1) {
            await new Promise((resolve) => setImmediate(resolve));
        }

        expect(launches).toHaveLength(0);

        release();
        await Promise.all([first, second]);

        expect(launches).toHaveLength(2);
        expect(launches[0].args[4]).toContain('Requirements: a weather widget for the toolbar.');
        expect(launches[1].args[4]).toContain('Requirements: build a second clock extension.');
        expect(sessionStore.require('s1').messages.map((message) => message.role)).toEqual([
            'user',
            'assistant',
            'user',
            'assistant',
        ]);
    });

    test('should route a queued fix against the extension built before it', async () => {
        let release: () => void = () => undefined;
        const gate = new Promise<void>((resolve) => {
            release = resolve;
        });
        scripts.push(async (proc, launch) => {
            await gate;
            await buildScript(proc, launch);
        });

        const first = build();
        const second = chat.handleUserMessage('s1', 'the popup is broken');
        await waitFor(() => launches.length === 1);
        release();
        const [, secondEvents] = await Promise.all([first, second]);

        expect(secondEvents[0]).toMatchObject({ status: 'started', message: 'Fixing the extension...' });
        expect(launches[1].args[4]).toContain('Existing files: manifest.json, popup.html, popup.js.');
    });

    test('should free the session when the generator ignores every signal', async () => {
        const stubborn = scriptedLauncher(
            (proc) => {
                proc.out('working');
            },
            () => new StubbornProcess(),
        );
        const impatient = createChat(
            createTestSettings(dataRoot, { generation: { timeoutMs: 30 } }),
            stubborn.launcher,
        );

        const events = await impatient.handleUserMessage('s1', 'build a tab counter extension');

        expect(stubborn.launches[0].process.signals).toEqual(['SIGTERM', 'SIGKILL']);
        expect(types(events)).toEqual(['status', 'cli_output', 'status', 'message']);
        expect(lastMessage(events)).toBe(
            'Extension generation failed: The generation process timed out after 30 ms and was stopped.',
        );
        expect(impatient.isGenerating('s1')).toBe(false);
        expect(await impatient.handleUserMessage('s1', 'hello')).toEqual([
            { type: 'message', role: 'assistant', content: 'reply to: hello' },
        ]);
    });

    test('should refuse a session id that cannot name its own directory', async () => {
        await expect(chat.handleUserMessage('a.b', 'hello')).rejects.toThrow(InvalidSessionId);
        expect(sessionStore.has('a.b')).toBe(false);
    });

    describe('conversation', () => {
        test('should skip an empty message without creating a session', async () => {
            const events = await chat.handleUserMessage('s1', '   ');

            expect(events).toEqual([
                { type: 'status', scope: 'chat', status: 'skipped', message: 'Message is empty. No changes applied.' },
            ]);
            expect(sessionStore.has('s1')).toBe(false);
        });

        test('should answer questions without generating', async () => {
            const events = await chat.handleUserMessage('s1', 'How do I load an unpacked extension?');

            expect(events).toEqual([
                { type: 'message', role: 'assistant', content: 'reply to: How do I load an unpacked extension?' },
            ]);
            expect(llm.replies[0]).toMatchObject({ kind: 'answer', fileList: [], transcript: [] });
            expect(launches).toHaveLength(0);
        });

        test('should hand the classifier the recent transcript', async () => {
            await chat.handleUserMessage('s1', 'hello');
            llm.queue({ kind: 'none' });

            await chat.handleUserMessage('s1', 'something about colors');

            expect(llm.classified[0].message).toBe('something about colors');
            expect(llm.classified[0].transcript.map((message) => message.content)).toEqual([
                'hello',
                'reply to: hello',
            ]);
        });

        test('should apologise when no reply can be produced', async () => {
            llm.replyError = new Error('rate limited');

            const events = await chat.handleUserMessage('s1', 'hello');

            expect(lastMessage(events)).toBe('I could not produce a reply right now (rate limited). Please try again.');
        });

        test('should report unexpected errors as a message', async () => {
            llm.queue(new Error('socket hang up'));

            const events = await chat.handleUserMessage('s1', 'something about colors');

            expect(events).toEqual([
                {
                    type: 'message',
                    role: 'assistant',
                    content: 'Something went wrong while handling your message: socket hang up',
                },
            ]);
        });
    });

    describe('debug requests', () => {
        test('should build an extension whose request talks about logging', async () => {
            const events = await chat.handleUserMessage('s1', 'build an extension that logs every page I visit');

            expect(types(events)).toEqual(['status', 'cli_output', 'status', 'message', 'extension_updated']);
            expect(launches).toHaveLength(1);
            expect(launches[0].args[4]).toContain('Requirements: build an extension that logs every page I visit.');
        });

        test('should explain how to collect logs when no browser ran', async () => {
            const events = await chat.handleUserMessage('s1', 'analyze the logs');

            expect(types(events)).toEqual(['message']);
            expect(lastMessage(events).startsWith("I don't see a browser session for this extension yet.")).toBe(true);
        });

        test('should summarise the browser log', async () => {
            await build();
            const info = await browserService.start('s1');
            await browserService.runProbe('s1', 'test');
            driver.last?.sink.record('console', { level: 'error', text: 'Uncaught TypeError: x' });

            const events = await chat.handleUserMessage('s1', 'analyze the logs');

            expect(events[0]).toEqual({
                type: 'debug_summary',
                session_id: info.id,
                counts: {
                    click: 1,
                    keyboard: 1,
                    navigation: 2,
                    console: 1,
                    error: 0,
                    'network-error': 0,
                    lifecycle: 3,
                },
            });
            expect(lastMessage(events)).toBe(
                [
                    'Logged 8 events with 1 JavaScript error. Event breakdown: ' +
                    'click: 1, keyboard: 1, navigation: 2, console: 1, lifecycle: 3.',
                    '',
                    'Recommendations:',
                    '- Found 1 JavaScript errors that may need fixing',
                    '',
                    'Ask me to fix the extension and I will include these findings.',
                ].join('\n'),
            );
            expect(launches).toHaveLength(1);
        });
    });

    describe('session management', () => {
        test('should merge a single edited file', async () => {
            await build();

            const event = await chat.updateFile('s1', 'options.html', '<h1>Options</h1>');

            expect(event).toMatchObject({
                type: 'extension_updated',
                file_list: ['manifest.json', 'options.html', 'popup.html', 'popup.js'],
            });
            expect(sse.eventsFor('s1').at(-1)).toEqual(event);
        });

        test('should reject edits outside the extension', async () => {
            await build();

            await expect(chat.updateFile('s1', '../escape.js', 'x')).rejects.toThrow(InvalidFilePath);
            await expect(chat.updateFile('missing', 'a.js', 'x')).rejects.toThrow(SessionNotFoundError);
        });

        test('should discard everything a session owns', async () => {
            await build();
            await browserService.start('s1');

            await chat.discardSession('s1');

            expect(sessionStore.has('s1')).toBe(false);
            expect(workspaceStore.exists('s1')).toBe(false);
            expect(browserService.info('s1')).toBeUndefined();
            expect(driver.last?.closed).toBe(true);
        });
    });
});
