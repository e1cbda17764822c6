import { ExtensionRef } from './extension';

export type ChatRole = 'user' | 'assistant';

export interface ChatMessage {
    id: string;
    role: ChatRole;
    content: string;
    sessionId: string;
    createdAt: Date;
}

export interface SessionData {
    id: string;
    title: string;
    messages: ChatMessage[];
    extension?: ExtensionRef;
    createdAt: Date;
    updatedAt: Date;
}
