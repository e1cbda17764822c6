import { randomUUID } from 'node:crypto';
import { Readable } from 'node:stream';
import { Inject, Service } from 'typedi';
import { Settings, SettingsToken } from '../../config';
import { describeError } from '../../errors';
import { FileMap, WorkspaceHandle } from '../../types/extension';
import {
    GenerationFailureReason,
    GenerationRequest,
    GenerationResult,
    GenerationRun,
    OutputEvent,
    OutputStream,
} from '../../types/generation';
import { createLogger } from '../../utils/logger';
import { WorkspaceStore } from '../workspace/WorkspaceStore';
import { EventQueue } from './EventQueue';
import {
    GenerationProcess,
    ProcessLauncher,
    ProcessLauncherToken,
} from './processLauncher';

const STDERR_TAIL_LINES = 20;

export interface GenerationHandle {
    readonly id: string;
    /** Output lines in arrival order; ends when the process has exited. */
    readonly events: AsyncIterable<OutputEvent>;
    /**
     * Settles after `events` has ended. Consume `events` first: the queue is
     * bounded and a full queue pauses the process output.
     */
    readonly run: Promise<GenerationRun>;
    cancel(): void;
}

export interface InvokeOptions {
    signal?: AbortSignal;
}

@Service()
export class GenerationEngine {
    private readonly logger = createLogger('GenerationEngine');

    constructor(
        @Inject(SettingsToken) private readonly settings: Settings,
        private readonly workspaceStore: WorkspaceStore,
        @Inject(ProcessLauncherToken) private readonly launch: ProcessLauncher,
    ) { }

    invoke(
        workspace: WorkspaceHandle,
        request: GenerationRequest,
        options: InvokeOptions = {},
    ): GenerationHandle {
        const id = randomUUID();
        const startedAt = new Date();
        const queue = new EventQueue<OutputEvent>(this.settings.generation.queueCapacity);
        const log: OutputEvent[] = [];

        let resolveRun: (run: GenerationRun) => void = () => undefined;
        const run = new Promise<GenerationRun>((resolve) => {
            resolveRun = resolve;
        });

        let child: GenerationProcess | undefined;
        let settled = false;
        let stopReason: Extract<GenerationFailureReason, 'timeout' | 'cancelled'> | undefined;
        let timer: NodeJS.Timeout | undefined;
        let escalation: NodeJS.Timeout | undefined;

        const emit = (stream: OutputStream, text: string): boolean => {
            if (queue.isClosed) {
                return true;
            }
            const event: OutputEvent = { stream, text };
            log.push(event);
            return queue.push(event);
        };

        const finish = (result: GenerationResult): void => {
            if (settled) {
                return;
            }
            settled = true;
            if (timer) {
                clearTimeout(timer);
            }
            if (escalation) {
                clearTimeout(escalation);
            }
            options.signal?.removeEventListener('abort', cancel);
            queue.close();
            this.workspaceStore.clearStaging(workspace);

            this.logger.info('Generation finished', {
                runId: id,
                sessionId: workspace.sessionId,
                action: request.action,
                status: result.status,
                exitCode: result.exitCode,
                files: Object.keys(result.files).length,
            });

            resolveRun(
                Object.freeze({
                    id,
                    sessionId: workspace.sessionId,
                    action: request.action,
                    instruction: request.instruction,
                    log: Object.freeze([...log]),
                    result: Object.freeze({
                        ...result,
                        files: Object.freeze({ ...result.files }),
                    }),
                    startedAt,
                    finishedAt: new Date(),
                }),
            );
        };

        const stop = (reason: 'timeout' | 'cancelled'): void => {
            if (settled || stopReason) {
                return;
            }
            stopReason = reason;
            this.logger.warn('Stopping generation process', {
                runId: id,
                sessionId: workspace.sessionId,
                reason,
            });
            // No further events once stopped; lines already queued stay readable.
            queue.close();
            if (!child || !child.kill('SIGTERM')) {
                finish(this.stoppedResult(reason));
                return;
            }

            // SIGKILL after one grace period; after a second one the run settles
            // without `close`, since a grandchild may still hold the pipes open.
            const proc = child;
            const graceMs = this.settings.generation.killGraceMs;
            escalation = setTimeout(() => {
                this.logger.warn('Generation process ignored SIGTERM, sending SIGKILL', {
                    runId: id,
                    sessionId: workspace.sessionId,
                    pid: proc.pid,
                });
                proc.kill('SIGKILL');
                escalation = setTimeout(() => {
                    this.logger.error('Generation process did not close, abandoning it', {
                        runId: id,
                        sessionId: workspace.sessionId,
                        pid: proc.pid,
                    });
                    proc.stdout.destroy();
                    proc.stderr.destroy();
                    finish(this.stoppedResult(reason));
                }, graceMs);
            }, graceMs);
        };

        function cancel(): void {
            stop('cancelled');
        }

        const handle: GenerationHandle = {
            id,
            events: queue,
            run,
            cancel,
        };

        const instruction = toSingleLine(request.instruction);
        if (!instruction) {
            finish(failed(null, 'The generation instruction is empty.', 'spawn'));
            return handle;
        }
        if (options.signal?.aborted) {
            finish(this.stoppedResult('cancelled'));
            return handle;
        }

        let cwd: string;
        try {
            cwd = this.workspaceStore.prepareStaging(
                workspace,
                request.action === 'build' ? 'empty' : 'current',
            );
        } catch (error) {
            finish(failed(null, describeError(error)));
            return handle;
        }

        const { command, model, timeoutMs } = this.settings.generation;
        const args = ['--yolo', '--model', model, '--prompt', instruction];
        this.logger.info('Starting generation process', {
            runId: id,
            sessionId: workspace.sessionId,
            action: request.action,
            command,
            cwd,
            priorFiles: request.priorFileList.length,
        });

        try {
            child = this.launch(command, args, { cwd, env: { ...process.env } });
        } catch (error) {
            finish(
                failed(
                    null,
                    `The generation tool "${command}" could not be started: ${describeError(error)}`,
                    'spawn',
                ),
            );
            return handle;
        }

        const proc = child;
        const stdoutLines = new LineSplitter((line) => forward('stdout', line));
        const stderrLines = new LineSplitter((line) => forward('stderr', line));
        const stderrTail: string[] = [];

        function forward(stream: OutputStream, line: string): void {
            if (stream === 'stderr') {
                stderrTail.push(line);
                if (stderrTail.length > STDERR_TAIL_LINES) {
                    stderrTail.shift();
                }
            }
            if (!emit(stream, line)) {
                proc.stdout.pause();
                proc.stderr.pause();
                queue.onDrain(() => {
                    proc.stdout.resume();
                    proc.stderr.resume();
                });
            }
        }

        attach(proc.stdout, stdoutLines);
        attach(proc.stderr, stderrLines);

        proc.once('error', (error) => {
            this.logger.error('Generation process error', {
                runId: id,
                sessionId: workspace.sessionId,
                error: describeError(error),
            });
            finish(
                failed(
                    null,
                    `The generation tool "${command}" could not be started: ${describeError(error)}`,
                    'spawn',
                ),
            );
        });

        proc.once('close', (code) => {
            stdoutLines.flush();
            stderrLines.flush();

            if (stopReason) {
                finish(this.stoppedResult(stopReason, code));
                return;
            }

            if (code !== 0) {
                const tail = stderrTail.join('\n');
                const message = tail
                    ? `Generation process failed with return code ${code}\nError: ${tail}`
                    : `Generation process failed with return code ${code}`;
                emit('stderr', message);
                finish(failed(code, message, 'exit'));
                return;
            }

            // The process has exited: only now is the staged file set complete.
            let files: FileMap;
            try {
                files = this.workspaceStore.readStaging(workspace);
            } catch (error) {
                finish(failed(code, describeError(error)));
                return;
            }

            if (Object.keys(files).length === 0) {
                finish({
                    status: 'succeeded-no-files',
                    files: {},
                    exitCode: code,
                    diagnostic: 'The generation process exited successfully but produced no files.',
                });
                return;
            }

            finish({ status: 'succeeded-with-files', files, exitCode: code });
        });

        if (timeoutMs > 0) {
            timer = setTimeout(() => stop('timeout'), timeoutMs);
        }
        options.signal?.addEventListener('abort', cancel, { once: true });

        return handle;
    }

    private stoppedResult(
        reason: 'timeout' | 'cancelled',
        exitCode: number | null = null,
    ): GenerationResult {
        const diagnostic =
            reason === 'timeout'
                ? `The generation process timed out after ${this.settings.generation.timeoutMs} ms and was stopped.`
                : 'The generation was cancelled.';
        return failed(exitCode, diagnostic, reason);
    }
}

function failed(
    exitCode: number | null,
    diagnostic: string,
    failureReason?: GenerationFailureReason,
): GenerationResult {
    return { status: 'failed', files: {}, exitCode, diagnostic, failureReason };
}

function attach(stream: Readable, splitter: LineSplitter): void {
    stream.setEncoding('utf-8');
    stream.on('data', (chunk: string) => splitter.write(chunk));
}

/** Collapses a multi-line instruction into one line of single-spaced words. */
export function toSingleLine(text: string): string {
    return text.replace(/[\r\n]+/g, ' ').split(/\s+/).filter(Boolean).join(' ');
}

/** Buffers partial lines; emits each complete, trimmed, non-blank line. */
export class LineSplitter {
    private pending = '';

    constructor(private readonly onLine: (line: string) => void) { }

    write(chunk: string): void {
        this.pending += chunk;
        const lines = this.pending.split(/\r?\n/);
        this.pending = lines.pop() ?? '';
        for (const line of lines) {
            this.deliver(line);
        }
    }

    flush(): void {
        const rest = this.pending;
        this.pending = '';
        this.deliver(rest);
    }

    private deliver(line: string): void {
        const trimmed = line.trim();
        if (trimmed) {
            this.onLine(trimmed);
        }
    }
}
