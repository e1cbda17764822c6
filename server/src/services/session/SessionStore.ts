import fs from 'node:fs';
import path from 'node:path';
import { randomUUID } from 'node:crypto';
import { Inject, Service } from 'typedi';
import { z } from 'zod';
import { Settings, SettingsToken } from '../../config';
import { SessionNotFoundError, describeError } from '../../errors';
import { ChatMessage, ChatRole, SessionData } from '../../types/chat';
import { ExtensionRef } from '../../types/extension';
import { createLogger } from '../../utils/logger';
import { isValidSessionId, sessionDirectoryName } from '../workspace/WorkspaceStore';

const DEFAULT_TITLE = 'New extension';

const persistedSessionSchema = z.object({
    id: z.string().min(1),
    title: z.string().default(DEFAULT_TITLE),
    createdAt: z.string(),
    updatedAt: z.string(),
    extension: z
        .object({
            id: z.string(),
            name: z.string(),
            description: z.string(),
        })
        .optional(),
});

const persistedMessagesSchema = z.array(
    z.object({
        id: z.string(),
        role: z.enum(['user', 'assistant']),
        content: z.string(),
        createdAt: z.string(),
    }),
);

type PersistedSession = z.infer<typeof persistedSessionSchema>;

/**
 * Registry of chat sessions. Lookups fall back to the session directory so a
 * restarted process picks up earlier transcripts.
 */
@Service()
export class SessionStore {
    private readonly logger = createLogger('SessionStore');
    private readonly sessions = new Map<string, SessionData>();

    constructor(@Inject(SettingsToken) private readonly settings: Settings) {
        ensureDirectory(settings.dataRoot);
    }

    create(title?: string, id: string = randomUUID()): SessionData {
        sessionDirectoryName(id);
        const now = new Date();
        const session: SessionData = {
            id,
            title: title?.trim() || DEFAULT_TITLE,
            messages: [],
            createdAt: now,
            updatedAt: now,
        };
        this.sessions.set(id, session);
        this.persistSession(session);
        this.logger.info('Session created', { sessionId: id });
        return cloneSession(session);
    }

    get(sessionId: string): SessionData | undefined {
        const session = this.lookup(sessionId);
        return session ? cloneSession(session) : undefined;
    }

    require(sessionId: string): SessionData {
        const session = this.get(sessionId);
        if (!session) {
            throw new SessionNotFoundError(sessionId);
        }
        return session;
    }

    /** Sessions are created on first contact. */
    getOrCreate(sessionId: string): SessionData {
        return this.get(sessionId) ?? this.create(undefined, sessionId);
    }

    has(sessionId: string): boolean {
        return this.lookup(sessionId) !== undefined;
    }

    /** Every known session, newest first. */
    list(): SessionData[] {
        if (fs.existsSync(this.settings.dataRoot)) {
            for (const entry of fs.readdirSync(this.settings.dataRoot, { withFileTypes: true })) {
                if (entry.isDirectory()) {
                    this.lookupByDirectory(entry.name);
                }
            }
        }
        return [...this.sessions.values()]
            .map(cloneSession)
            .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
    }

    appendMessage(sessionId: string, role: ChatRole, content: string): ChatMessage {
        const session = this.requireLive(sessionId);
        const now = new Date();
        const message: ChatMessage = {
            id: randomUUID(),
            role,
            content,
            sessionId,
            createdAt: now,
        };
        session.messages.push(message);
        session.updatedAt = now;
        this.persistSession(session);
        return { ...message };
    }

    setExtension(sessionId: string, extension: ExtensionRef): SessionData {
        const session = this.requireLive(sessionId);
        session.extension = { ...extension };
        session.updatedAt = new Date();
        this.persistSession(session);
        return cloneSession(session);
    }

    /** Forgets the session and deletes its directory, workspace included. */
    delete(sessionId: string): void {
        this.sessions.delete(sessionId);
        removeDirectory(this.resolveSessionDir(sessionId));
        this.logger.info('Session deleted', { sessionId });
    }

    resolveSessionDir(sessionId: string): string {
        return path.join(this.settings.dataRoot, sessionDirectoryName(sessionId));
    }

    private requireLive(sessionId: string): SessionData {
        const session = this.lookup(sessionId);
        if (!session) {
            throw new SessionNotFoundError(sessionId);
        }
        return session;
    }

    private lookup(sessionId: string): SessionData | undefined {
        if (!isValidSessionId(sessionId)) {
            return undefined;
        }
        const cached = this.sessions.get(sessionId);
        if (cached) {
            return cached;
        }
        const loaded = this.loadFromDisk(this.resolveSessionDir(sessionId));
        if (loaded && loaded.id === sessionId) {
            this.sessions.set(sessionId, loaded);
            return loaded;
        }
        return undefined;
    }

    private lookupByDirectory(dirName: string): void {
        const loaded = this.loadFromDisk(path.join(this.settings.dataRoot, dirName));
        if (loaded && !this.sessions.has(loaded.id)) {
            this.sessions.set(loaded.id, loaded);
        }
    }

    private loadFromDisk(sessionDir: string): SessionData | undefined {
        const metaPath = path.join(sessionDir, 'session.json');
        if (!fs.existsSync(metaPath)) {
            return undefined;
        }

        try {
            const meta: PersistedSession = persistedSessionSchema.parse(
                JSON.parse(fs.readFileSync(metaPath, 'utf-8')),
            );

            const session: SessionData = {
                id: meta.id,
                title: meta.title,
                messages: [],
                extension: meta.extension,
                createdAt: new Date(meta.createdAt),
                updatedAt: new Date(meta.updatedAt),
            };

            const messagesPath = path.join(sessionDir, 'messages.json');
            if (fs.existsSync(messagesPath)) {
                const rawMessages = persistedMessagesSchema.parse(
                    JSON.parse(fs.readFileSync(messagesPath, 'utf-8')),
                );
                session.messages = rawMessages.map((entry) => ({
                    ...entry,
                    sessionId: meta.id,
                    createdAt: new Date(entry.createdAt),
                }));
            }

            return session;
        } catch (error) {
            this.logger.error('Failed to load session from disk', {
                sessionDir,
                error: describeError(error),
            });
            return undefined;
        }
    }

    private persistSession(session: SessionData): void {
        const sessionDir = this.resolveSessionDir(session.id);

        try {
            ensureDirectory(sessionDir);

            fs.writeFileSync(
                path.join(sessionDir, 'messages.json'),
                JSON.stringify(
                    session.messages.map(({ id, role, content, createdAt }) => ({
                        id,
                        role,
                        content,
                        createdAt: createdAt.toISOString(),
                    })),
                    null,
                    2,
                ),
                'utf-8',
            );

            const payload: PersistedSession = {
                id: session.id,
                title: session.title,
                createdAt: session.createdAt.toISOString(),
                updatedAt: session.updatedAt.toISOString(),
                extension: session.extension,
            };
            fs.writeFileSync(
                path.join(sessionDir, 'session.json'),
                JSON.stringify(payload, null, 2),
                'utf-8',
            );
        } catch (error) {
            this.logger.error('Failed to persist session to disk', {
                sessionId: session.id,
                error: describeError(error),
            });
        }
    }
}

function ensureDirectory(dir: string): void {
    if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
    }
}

function removeDirectory(dir: string): void {
    if (fs.existsSync(dir)) {
        fs.rmSync(dir, { recursive: true, force: true });
    }
}

function cloneSession(session: SessionData): SessionData {
    return {
        ...session,
        messages: session.messages.map((message) => ({ ...message })),
        extension: session.extension ? { ...session.extension } : undefined,
    };
}
