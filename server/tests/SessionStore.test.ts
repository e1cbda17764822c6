import fs from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, jest, test } from '@jest/globals';
import { InvalidSessionId, SessionNotFoundError } from '../src/errors';
import { SessionStore } from '../src/services/session/SessionStore';
import { createTempDir, createTestSettings, removeDir } from './helpers/settings';

describe('SessionStore', () => {
    let dataRoot: string;
    let store: SessionStore;

    beforeEach(() => {
        dataRoot = createTempDir();
        store = new SessionStore(createTestSettings(dataRoot));
    });

    afterEach(() => {
        jest.useRealTimers();
        removeDir(dataRoot);
    });

    test('should create sessions with a default title', () => {
        const session = store.create();

        expect(session.title).toBe('New extension');
        expect(session.messages).toEqual([]);
        expect(store.has(session.id)).toBe(true);
        expect(store.create('  Tab counter ').title).toBe('Tab counter');
    });

    test('should append messages in order', () => {
        store.create(undefined, 's1');

        store.appendMessage('s1', 'user', 'build a tab counter extension');
        store.appendMessage('s1', 'assistant', 'Done');

        expect(store.require('s1').messages.map(({ role, content }) => ({ role, content }))).toEqual([
            { role: 'user', content: 'build a tab counter extension' },
            { role: 'assistant', content: 'Done' },
        ]);
    });

    test('should hand out copies', () => {
        store.create(undefined, 's1');
        const copy = store.require('s1');

        copy.messages.push({ id: 'x', role: 'user', content: 'sneaky', sessionId: 's1', createdAt: new Date() });

        expect(store.require('s1').messages).toEqual([]);
    });

    test('should reload sessions from disk', () => {
        store.create('Clock', 's1');
        store.appendMessage('s1', 'user', 'hello');
        store.setExtension('s1', { id: 'ext-1', name: 'Clock', description: 'Shows the time' });

        const reopened = new SessionStore(createTestSettings(dataRoot));
        const session = reopened.require('s1');

        expect(session.title).toBe('Clock');
        expect(session.messages.map((message) => message.content)).toEqual(['hello']);
        expect(session.messages[0].createdAt).toBeInstanceOf(Date);
        expect(session.extension).toEqual({ id: 'ext-1', name: 'Clock', description: 'Shows the time' });
    });

    test('should ignore a corrupt session file', () => {
        fs.mkdirSync(path.join(dataRoot, 'broken'), { recursive: true });
        fs.writeFileSync(path.join(dataRoot, 'broken', 'session.json'), '{"id":', 'utf-8');

        expect(store.get('broken')).toBeUndefined();
        expect(store.list()).toEqual([]);
    });

    test('should list sessions newest first', () => {
        jest.useFakeTimers({ now: new Date('2026-01-01T10:00:00.000Z') });
        store.create('first', 'a');
        jest.setSystemTime(new Date('2026-01-01T11:00:00.000Z'));
        store.create('second', 'b');

        const reopened = new SessionStore(createTestSettings(dataRoot));

        expect(reopened.list().map((session) => session.id)).toEqual(['b', 'a']);
    });

    test('should create a session on first contact', () => {
        const session = store.getOrCreate('s1');

        expect(session.id).toBe('s1');
        expect(store.getOrCreate('s1').createdAt).toEqual(session.createdAt);
    });

    test('should refuse ids that cannot name their own directory', () => {
        store.getOrCreate('a_b');

        expect(() => store.getOrCreate('a.b')).toThrow(InvalidSessionId);
        expect(store.has('a.b')).toBe(false);
        expect(store.require('a_b').id).toBe('a_b');
        expect(store.list().map((session) => session.id)).toEqual(['a_b']);
    });

    test('should delete the session directory', () => {
        store.create(undefined, 's1');
        const dir = store.resolveSessionDir('s1');

        store.delete('s1');

        expect(fs.existsSync(dir)).toBe(false);
        expect(store.has('s1')).toBe(false);
        expect(() => store.require('s1')).toThrow(SessionNotFoundError);
        expect(() => store.appendMessage('s1', 'user', 'x')).toThrow('Session s1 not found');
    });
});
