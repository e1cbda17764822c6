import { BrowserSessionStatus } from './types/browser';
import { GenerationFailureReason } from './types/generation';

export type ErrorCode =
    | 'CLASSIFICATION_FAILURE'
    | 'GENERATION_PROCESS_ERROR'
    | 'EMPTY_GENERATION_RESULT'
    | 'BROWSER_LAUNCH_FAILURE'
    | 'INVALID_BROWSER_TRANSITION'
    | 'WORKSPACE_IO_ERROR'
    | 'SESSION_NOT_FOUND'
    | 'INVALID_SESSION_ID'
    | 'SCRIPT_EVALUATION_FAILURE';

export abstract class BuilderError extends Error {
    abstract readonly code: ErrorCode;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class ClassificationFailure extends BuilderError {
    readonly code = 'CLASSIFICATION_FAILURE';
}

export class GenerationProcessError extends BuilderError {
    readonly code = 'GENERATION_PROCESS_ERROR';

    constructor(
        readonly reason: GenerationFailureReason,
        message: string,
        options?: { cause?: unknown },
    ) {
        super(message, options);
    }
}

export class EmptyGenerationResult extends BuilderError {
    readonly code = 'EMPTY_GENERATION_RESULT';
}

export class BrowserLaunchFailure extends BuilderError {
    readonly code = 'BROWSER_LAUNCH_FAILURE';
}

export class ScriptEvaluationFailure extends BuilderError {
    readonly code = 'SCRIPT_EVALUATION_FAILURE';
}

export class InvalidBrowserTransition extends BuilderError {
    readonly code = 'INVALID_BROWSER_TRANSITION';

    constructor(
        readonly operation: string,
        readonly status: BrowserSessionStatus,
    ) {
        super(`Cannot ${operation} while the browser session is ${status}`);
    }
}

export class WorkspaceIOError extends BuilderError {
    readonly code = 'WORKSPACE_IO_ERROR';
}

export class InvalidFilePath extends WorkspaceIOError {
    constructor(readonly filePath: string) {
        super(`Invalid file path "${filePath}"`);
    }
}

export class SessionNotFoundError extends BuilderError {
    readonly code = 'SESSION_NOT_FOUND';

    constructor(readonly sessionId: string) {
        super(`Session ${sessionId} not found`);
    }
}

/** Ids name a directory verbatim, so only letters, digits, `-` and `_` are taken. */
export class InvalidSessionId extends BuilderError {
    readonly code = 'INVALID_SESSION_ID';

    constructor(readonly sessionId: string) {
        super(`Invalid session id "${sessionId}"`);
    }
}

export function describeError(error: unknown): string {
    if (error instanceof Error && error.message) {
        return error.message;
    }
    if (typeof error === 'string') {
        return error;
    }
    return 'unknown error';
}
