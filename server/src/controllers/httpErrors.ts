import { BadRequestError, HttpError, NotFoundError } from 'routing-controllers';
import {
    BrowserLaunchFailure,
    InvalidBrowserTransition,
    InvalidFilePath,
    InvalidSessionId,
    ScriptEvaluationFailure,
    SessionNotFoundError,
} from '../errors';

/** Maps domain errors onto HTTP errors; anything else is rethrown as is. */
export function toHttpError(error: unknown): unknown {
    if (error instanceof SessionNotFoundError) {
        return new NotFoundError(error.message);
    }
    if (error instanceof InvalidBrowserTransition) {
        return new HttpError(409, error.message);
    }
    if (error instanceof BrowserLaunchFailure) {
        return new HttpError(502, error.message);
    }
    if (error instanceof ScriptEvaluationFailure) {
        return new HttpError(422, error.message);
    }
    if (error instanceof InvalidFilePath || error instanceof InvalidSessionId) {
        return new BadRequestError(error.message);
    }
    return error;
}

export async function translateErrors<T>(task: () => T | Promise<T>): Promise<T> {
    try {
        return await task();
    } catch (error) {
        throw toHttpError(error);
    }
}
