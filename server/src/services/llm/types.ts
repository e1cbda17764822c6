import { Token } from 'typedi';
import { ChatMessage } from '../../types/chat';
import { Intent } from '../intent/schema';

export type ReplyKind = 'none' | 'answer';

export interface ReplyRequest {
    kind: ReplyKind;
    message: string;
    transcript: ChatMessage[];
    /** Files of the session's extension, listed so answers can refer to them. */
    fileList: string[];
}

export interface LlmClient {
    readonly isConfigured: boolean;
    /** Rejects with ClassificationFailure when no confident intent can be produced. */
    classify(transcript: ChatMessage[], message: string): Promise<Intent>;
    reply(request: ReplyRequest): Promise<string>;
}

export const LlmClientToken = new Token<LlmClient>('llm-client');
