import { ChatRole } from './chat';
import { CategoryCounts } from './browser';
import { OutputStream } from './generation';

export interface MessageEvent {
    type: 'message';
    role: ChatRole;
    content: string;
}

export interface CliOutputEvent {
    type: 'cli_output';
    stream: OutputStream;
    content: string;
}

export interface ExtensionUpdatedEvent {
    type: 'extension_updated';
    extension_id: string;
    name: string;
    description: string;
    file_list: string[];
}

export interface DebugSummaryEvent {
    type: 'debug_summary';
    session_id: string;
    counts: CategoryCounts;
}

export type StatusScope = 'generation' | 'browser' | 'chat';

export interface StatusEvent {
    type: 'status';
    scope: StatusScope;
    status: string;
    message?: string;
}

export type OutboundEvent =
    | MessageEvent
    | CliOutputEvent
    | ExtensionUpdatedEvent
    | DebugSummaryEvent
    | StatusEvent;

export type EventSink = (event: OutboundEvent) => void;
