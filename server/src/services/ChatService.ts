import { randomUUID } from 'node:crypto';
import { Inject, Service } from 'typedi';
import {
    BuilderError,
    EmptyGenerationResult,
    GenerationProcessError,
    WorkspaceIOError,
    describeError,
} from '../errors';
import { ChatMessage } from '../types/chat';
import {
    ExtensionUpdatedEvent,
    OutboundEvent,
    StatusScope,
} from '../types/events';
import { FileMap, WorkspaceHandle } from '../types/extension';
import { GenerationResult, GenerationRun } from '../types/generation';
import { transcriptTail } from '../utils/chat';
import { KeyedLock } from '../utils/KeyedLock';
import { createLogger } from '../utils/logger';
import { readExtensionMetadata } from '../utils/manifest';
import { BrowserService } from './browser/BrowserService';
import { errorExcerpts } from './browser/logAnalysis';
import { GenerationEngine } from './generation/GenerationEngine';
import { composeInstruction, describeAction } from './generation/instructions';
import { IntentRouter } from './intent/IntentRouter';
import { GenerationIntent, Intent } from './intent/schema';
import { LlmClient, LlmClientToken } from './llm/types';
import { SessionStore } from './session/SessionStore';
import { SseService } from './SseService';
import { WorkspaceStore, sessionDirectoryName } from './workspace/WorkspaceStore';

const EMPTY_MESSAGE = 'Message is empty. No changes applied.';

const NO_BROWSER_SESSION = `I don't see a browser session for this extension yet. To analyze how it behaves:

1. Load the extension in the browser.
2. Run the test probe or use the extension to reproduce the issue.
3. Ask me to debug or analyze the logs again.

Every navigation, console message, error and failed request is captured for the analysis.`;

/**
 * Entry point for chat messages. Each call appends to the transcript, routes
 * the message and publishes the events it produces, in order, to the
 * session's live channel. Messages of one session are handled one at a time
 * in the order they arrived, so generation runs never overlap.
 */
@Service()
export class ChatService {
    private readonly logger = createLogger('ChatService');
    private readonly sessionLock = new KeyedLock();
    private readonly generating = new Set<string>();

    constructor(
        private readonly sessionStore: SessionStore,
        private readonly workspaceStore: WorkspaceStore,
        private readonly generationEngine: GenerationEngine,
        private readonly intentRouter: IntentRouter,
        private readonly browserService: BrowserService,
        private readonly sseService: SseService,
        @Inject(LlmClientToken) private readonly llmClient: LlmClient,
    ) { }

    async handleUserMessage(sessionId: string, text: string): Promise<OutboundEvent[]> {
        sessionDirectoryName(sessionId);
        const events: OutboundEvent[] = [];
        const emit = (event: OutboundEvent): void => {
            events.push(event);
            this.sseService.publish(sessionId, event);
        };

        const trimmed = text.trim();
        if (!trimmed) {
            emit({ type: 'status', scope: 'chat', status: 'skipped', message: EMPTY_MESSAGE });
            return events;
        }

        // The slot is taken before the first await: classification and the
        // extension check run only once every earlier message is done.
        await this.sessionLock.runExclusive(sessionId, () =>
            this.routeMessage(sessionId, trimmed, emit),
        );
        return events;
    }

    /** Waits for queued messages, then closes the browser and deletes everything the session owns. */
    async discardSession(sessionId: string): Promise<void> {
        this.sessionStore.require(sessionId);
        await this.sessionLock.runExclusive(sessionId, async () => {
            await this.browserService.discard(sessionId);
            this.workspaceStore.discard(sessionId);
            this.sessionStore.delete(sessionId);
            this.sseService.closeSession(sessionId);
        });
    }

    isGenerating(sessionId: string): boolean {
        return this.generating.has(sessionId);
    }

    /** Merges one file into the workspace between messages. */
    async updateFile(sessionId: string, filePath: string, content: string): Promise<OutboundEvent> {
        this.sessionStore.require(sessionId);
        return this.sessionLock.runExclusive(sessionId, async () => {
            const workspace = this.workspaceStore.initialize(sessionId);
            const files = this.workspaceStore.write(workspace, { [filePath]: content }, 'merge');
            const event = this.recordExtension(sessionId, workspace, files);
            this.sseService.publish(sessionId, event);
            return event;
        });
    }

    private async routeMessage(
        sessionId: string,
        message: string,
        emit: (event: OutboundEvent) => void,
    ): Promise<void> {
        const history = this.sessionStore.getOrCreate(sessionId).messages;
        this.sessionStore.appendMessage(sessionId, 'user', message);

        try {
            if (this.intentRouter.isDebugRequest(message)) {
                this.handleDebugRequest(sessionId, emit);
                return;
            }

            const workspace = this.workspaceStore.initialize(sessionId);
            const hasExtension = this.workspaceStore.listFiles(workspace).length > 0;
            const intent = await this.intentRouter.classify(
                transcriptTail(history),
                message,
                { hasExtension },
            );
            this.logger.info('Message classified', { sessionId, kind: intent.kind });

            if (intent.kind === 'none' || intent.kind === 'answer') {
                await this.reply(sessionId, intent, message, history, workspace, emit);
                return;
            }

            this.generating.add(sessionId);
            try {
                await this.runGeneration(sessionId, intent, emit);
            } finally {
                this.generating.delete(sessionId);
            }
        } catch (error) {
            this.logger.error('Failed to handle message', {
                sessionId,
                code: error instanceof BuilderError ? error.code : undefined,
                error: describeError(error),
            });
            this.appendAssistant(
                sessionId,
                `Something went wrong while handling your message: ${describeError(error)}`,
                emit,
            );
        }
    }

    private async runGeneration(
        sessionId: string,
        intent: GenerationIntent,
        emit: (event: OutboundEvent) => void,
    ): Promise<void> {
        const action = intent.kind;
        const workspace = this.workspaceStore.initialize(sessionId);
        const priorFileList = action === 'build' ? [] : this.workspaceStore.listFiles(workspace);

        const debug = action === 'fix' ? this.browserService.latestAnalysis(sessionId) : undefined;
        const instruction = composeInstruction(intent, {
            priorFileList,
            debug,
            errorExcerpts: debug ? errorExcerpts(this.browserService.collectLogs(sessionId)) : undefined,
        });

        this.notifyStatus(emit, 'generation', 'started', `${describeAction(action)} the extension...`);

        let run: GenerationRun;
        try {
            const handle = this.generationEngine.invoke(workspace, {
                action,
                instruction,
                priorFileList,
            });
            for await (const output of handle.events) {
                emit({ type: 'cli_output', stream: output.stream, content: output.text });
            }
            run = await handle.run;
        } catch (error) {
            this.notifyStatus(emit, 'generation', 'failed', describeError(error));
            throw error;
        }

        this.logger.info('Generation run completed', {
            sessionId,
            runId: run.id,
            action,
            status: run.result.status,
            lines: run.log.length,
        });

        if (run.result.status !== 'succeeded-with-files') {
            const failure = toGenerationError(run.result);
            this.logger.warn('Generation produced no update', {
                sessionId,
                runId: run.id,
                code: failure.code,
                error: failure.message,
            });
            this.notifyStatus(emit, 'generation', 'failed', failure.message);
            this.appendAssistant(sessionId, describeFailure(action, failure), emit);
            return;
        }

        let updated: ExtensionUpdatedEvent;
        try {
            const files = this.workspaceStore.write(
                workspace,
                run.result.files,
                action === 'build' ? 'replace' : 'merge',
            );
            updated = this.recordExtension(sessionId, workspace, files);
        } catch (error) {
            this.notifyStatus(emit, 'generation', 'failed', describeError(error));
            throw error;
        }

        this.notifyStatus(emit, 'generation', 'completed', `${updated.name} is ready.`);

        this.appendAssistant(
            sessionId,
            describeSuccess(action, updated.name, updated.description, updated.file_list),
            emit,
        );
        emit(updated);
    }

    private recordExtension(
        sessionId: string,
        workspace: WorkspaceHandle,
        files: FileMap,
    ): ExtensionUpdatedEvent {
        const metadata = readExtensionMetadata(files);
        const existing = this.sessionStore.require(sessionId).extension;
        const extension = {
            id: existing?.id ?? randomUUID(),
            name: metadata.name,
            description: metadata.description,
        };
        this.sessionStore.setExtension(sessionId, extension);
        return {
            type: 'extension_updated',
            extension_id: extension.id,
            name: extension.name,
            description: extension.description,
            file_list: this.workspaceStore.listFiles(workspace),
        };
    }

    private handleDebugRequest(sessionId: string, emit: (event: OutboundEvent) => void): void {
        const info = this.browserService.info(sessionId);
        if (!info || info.status === 'unstarted') {
            this.appendAssistant(sessionId, NO_BROWSER_SESSION, emit);
            return;
        }

        const analysis = this.browserService.summarize(sessionId);
        emit({ type: 'debug_summary', session_id: info.id, counts: analysis.counts });

        const lines = [analysis.summary];
        if (analysis.recommendations.length) {
            lines.push('', 'Recommendations:', ...analysis.recommendations.map((item) => `- ${item}`));
            lines.push('', 'Ask me to fix the extension and I will include these findings.');
        } else if (info.eventCount === 0) {
            lines.push('', 'Run the test probe or use the extension first to generate some logs.');
        } else {
            lines.push('', 'No problems were detected in the browser log.');
        }
        this.appendAssistant(sessionId, lines.join('\n'), emit);
    }

    private async reply(
        sessionId: string,
        intent: Extract<Intent, { kind: 'none' | 'answer' }>,
        message: string,
        history: ChatMessage[],
        workspace: WorkspaceHandle,
        emit: (event: OutboundEvent) => void,
    ): Promise<void> {
        let content: string;
        try {
            content = await this.llmClient.reply({
                kind: intent.kind,
                message,
                transcript: history,
                fileList: this.workspaceStore.listFiles(workspace),
            });
        } catch (error) {
            this.logger.warn('Reply generation failed', {
                sessionId,
                error: describeError(error),
            });
            content = `I could not produce a reply right now (${describeError(error)}). Please try again.`;
        }
        this.appendAssistant(sessionId, content, emit);
    }

    private appendAssistant(
        sessionId: string,
        content: string,
        emit: (event: OutboundEvent) => void,
    ): void {
        this.sessionStore.appendMessage(sessionId, 'assistant', content);
        emit({ type: 'message', role: 'assistant', content });
    }

    private notifyStatus(
        emit: (event: OutboundEvent) => void,
        scope: StatusScope,
        status: string,
        message?: string,
    ): void {
        emit({ type: 'status', scope, status, message });
    }
}

function describeSuccess(
    action: GenerationIntent['kind'],
    name: string,
    description: string,
    fileList: string[],
): string {
    const verb = action === 'build' ? 'generated' : action === 'fix' ? 'fixed' : 'updated';
    return [
        `I've ${verb} your Chrome extension.`,
        '',
        `- Name: ${name}`,
        `- Description: ${description}`,
        `- Files: ${fileList.join(', ')}`,
        '',
        'Load it in the browser to try it out, or tell me what to change.',
    ].join('\n');
}

function toGenerationError(result: GenerationResult): BuilderError {
    const diagnostic = result.diagnostic ?? 'unknown error';
    if (result.status === 'succeeded-no-files') {
        return new EmptyGenerationResult(diagnostic);
    }
    if (result.failureReason) {
        return new GenerationProcessError(result.failureReason, diagnostic);
    }
    return new WorkspaceIOError(diagnostic);
}

function describeFailure(action: GenerationIntent['kind'], failure: BuilderError): string {
    if (failure instanceof EmptyGenerationResult) {
        return (
            'The generator finished but no files were produced, so nothing was changed. ' +
            'Try describing the extension in more detail.'
        );
    }
    const prior = action === 'build' ? '' : ' Your previous extension files are unchanged.';
    return `Extension generation failed: ${failure.message.replace(/\.$/, '')}.${prior}`;
}
