import { ModelMessage } from 'ai';
import { ChatMessage } from '../types/chat';

/** Number of prior transcript messages handed to the classifier. */
export const TRANSCRIPT_TAIL_SIZE = 5;

export function transcriptTail(
    messages: ChatMessage[],
    size: number = TRANSCRIPT_TAIL_SIZE,
): ChatMessage[] {
    return size > 0 ? messages.slice(-size) : [];
}

export function toModelMessages(messages: ChatMessage[]): ModelMessage[] {
    return messages
        .filter((entry) => entry.content.trim().length > 0)
        .map((entry): ModelMessage =>
            entry.role === 'user'
                ? { role: 'user', content: entry.content }
                : { role: 'assistant', content: entry.content },
        );
}

export function formatTranscript(messages: ChatMessage[]): string {
    return messages
        .map((entry) => `${entry.role === 'user' ? 'User' : 'Assistant'}: ${entry.content}`)
        .join('\n');
}

export function serializeMessage(message: ChatMessage) {
    return {
        id: message.id,
        role: message.role,
        content: message.content,
        createdAt: message.createdAt.toISOString(),
    };
}
