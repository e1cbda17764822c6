import { FileMap } from './extension';

export type GenerationAction = 'build' | 'fix' | 'improve';

export type OutputStream = 'stdout' | 'stderr';

export interface OutputEvent {
    stream: OutputStream;
    text: string;
}

export type GenerationStatus =
    | 'succeeded-with-files'
    | 'succeeded-no-files'
    | 'failed';

export type GenerationFailureReason = 'spawn' | 'timeout' | 'exit' | 'cancelled';

export interface GenerationResult {
    status: GenerationStatus;
    files: FileMap;
    exitCode: number | null;
    /** Human-readable reason, present when status is not succeeded-with-files. */
    diagnostic?: string;
    /** Set when a failed run is due to the process rather than the workspace. */
    failureReason?: GenerationFailureReason;
}

export interface GenerationRequest {
    action: GenerationAction;
    instruction: string;
    priorFileList: string[];
}

export interface GenerationRun {
    readonly id: string;
    readonly sessionId: string;
    readonly action: GenerationAction;
    readonly instruction: string;
    readonly log: readonly OutputEvent[];
    readonly result: GenerationResult;
    readonly startedAt: Date;
    readonly finishedAt: Date;
}
