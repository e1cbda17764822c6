import { describe, expect, test } from '@jest/globals';
import { composeInstruction, describeAction } from '../src/services/generation/instructions';
import { ChatMessage } from '../src/types/chat';
import { formatTranscript, serializeMessage, toModelMessages, transcriptTail } from '../src/utils/chat';
import { readExtensionMetadata, resolvePopupPath } from '../src/utils/manifest';

const ICONS = 'Icons icon16.png, icon48.png, icon128.png already exist in the directory; ' +
    'reference them and do not create or modify image files.';

function message(role: ChatMessage['role'], content: string, index: number): ChatMessage {
    return {
        id: `m${index}`,
        role,
        content,
        sessionId: 's1',
        createdAt: new Date(Date.UTC(2026, 0, 1, 0, 0, index)),
    };
}

describe('manifest helpers', () => {
    test('should read name and description', () => {
        expect(
            readExtensionMetadata({ 'manifest.json': '{"name":" Tab Counter ","description":"Counts tabs"}' }),
        ).toEqual({ name: 'Tab Counter', description: 'Counts tabs' });
    });

    test('should fall back when the manifest is missing or invalid', () => {
        const fallback = { name: 'Chrome Extension', description: 'A Chrome extension' };

        expect(readExtensionMetadata({})).toEqual(fallback);
        expect(readExtensionMetadata({ 'manifest.json': '{oops' })).toEqual(fallback);
        expect(readExtensionMetadata({ 'manifest.json': '["name"]' })).toEqual(fallback);
    });

    test('should resolve the popup page', () => {
        expect(resolvePopupPath({ 'manifest.json': '{"action":{"default_popup":"./ui/popup.html"}}' })).toBe(
            'ui/popup.html',
        );
        expect(resolvePopupPath({ 'manifest.json': '{"browser_action":{"default_popup":"menu.html"}}' })).toBe(
            'menu.html',
        );
        expect(resolvePopupPath({ 'manifest.json': '{"action":{}}' })).toBe('popup.html');
    });
});

describe('transcript helpers', () => {
    const history = [
        message('user', 'one', 1),
        message('assistant', 'two', 2),
        message('user', '   ', 3),
        message('assistant', 'four', 4),
        message('user', 'five', 5),
        message('assistant', 'six', 6),
    ];

    test('should keep the last messages', () => {
        expect(transcriptTail(history).map((entry) => entry.id)).toEqual(['m2', 'm3', 'm4', 'm5', 'm6']);
        expect(transcriptTail(history, 0)).toEqual([]);
    });

    test('should format for prompts', () => {
        expect(formatTranscript(history.slice(0, 2))).toBe('User: one\nAssistant: two');
        expect(toModelMessages(history.slice(1, 4))).toEqual([
            { role: 'assistant', content: 'two' },
            { role: 'assistant', content: 'four' },
        ]);
    });

    test('should serialise dates as ISO strings', () => {
        expect(serializeMessage(history[0])).toEqual({
            id: 'm1',
            role: 'user',
            content: 'one',
            createdAt: '2026-01-01T00:00:01.000Z',
        });
    });
});

describe('composeInstruction', () => {
    test('should describe a build', () => {
        expect(
            composeInstruction(
                {
                    kind: 'build',
                    requirements: 'Count open tabs',
                    features: ['badge with the count', 'reset button'],
                    targetSites: ['example.com'],
                },
                { priorFileList: [] },
            ),
        ).toBe(
            'Create a complete Chrome extension (Manifest V3) in the current directory. ' +
            'Requirements: Count open tabs. Features: badge with the count; reset button. ' +
            'It should run on: example.com. ' +
            'Write manifest.json with name and description, and every file it references (popup, scripts, styles). ' +
            ICONS,
        );
    });

    test('should describe a fix with its context', () => {
        expect(
            composeInstruction(
                { kind: 'fix', symptom: 'The badge stays empty', errorText: 'TypeError: x is undefined' },
                {
                    priorFileList: ['manifest.json', 'popup.js'],
                    debug: {
                        counts: {
                            click: 0,
                            keyboard: 0,
                            navigation: 0,
                            console: 0,
                            error: 1,
                            'network-error': 0,
                            lifecycle: 0,
                        },
                        summary: 'Logged 1 event with 1 JavaScript error. Event breakdown: error: 1.',
                        recommendations: ['Found 1 JavaScript errors that may need fixing'],
                    },
                    errorExcerpts: ['error: x is undefined'],
                },
            ),
        ).toBe(
            'Fix the existing Chrome extension in the current directory. ' +
            'Problem reported by the user: The badge stays empty. ' +
            'Error message: TypeError: x is undefined. ' +
            'Browser log: Logged 1 event with 1 JavaScript error. Event breakdown: error: 1. ' +
            'Findings: Found 1 JavaScript errors that may need fixing. ' +
            'Recent errors: error: x is undefined. ' +
            'Existing files: manifest.json, popup.js. ' +
            'Change only what is needed and keep every other file as it is. ' +
            ICONS,
        );
    });

    test('should describe an improvement on one line', () => {
        const instruction = composeInstruction(
            { kind: 'improve', enhancement: 'Add a dark\ntheme!' },
            { priorFileList: [] },
        );

        expect(instruction).toBe(
            'Improve the existing Chrome extension in the current directory. ' +
            'Requested change: Add a dark theme! ' +
            'Change only what is needed and keep every other file as it is. ' +
            ICONS,
        );
    });

    test('should name the action', () => {
        expect(describeAction('build')).toBe('Building');
        expect(describeAction('fix')).toBe('Fixing');
        expect(describeAction('improve')).toBe('Improving');
    });
});
