import { Inject, Service } from 'typedi';
import { ClassificationFailure, describeError } from '../../errors';
import { ChatMessage } from '../../types/chat';
import { createLogger } from '../../utils/logger';
import { LlmClient, LlmClientToken } from '../llm/types';
import { classifyByRules, isDebugRequest } from './rules';
import { BuildIntent, Intent, parseIntent } from './schema';

export interface ClassifyContext {
    /** Whether the session's extension mapping currently holds any file. */
    hasExtension: boolean;
}

@Service()
export class IntentRouter {
    private readonly logger = createLogger('IntentRouter');

    constructor(@Inject(LlmClientToken) private readonly llmClient: LlmClient) { }

    isDebugRequest(message: string): boolean {
        return isDebugRequest(message);
    }

    async classify(
        transcriptTail: ChatMessage[],
        message: string,
        context: ClassifyContext,
    ): Promise<Intent> {
        const intent = classifyByRules(message) ?? (await this.classifyWithModel(transcriptTail, message));
        return this.redirectWhenEmpty(intent, context);
    }

    private async classifyWithModel(
        transcriptTail: ChatMessage[],
        message: string,
    ): Promise<Intent> {
        try {
            return parseIntent(await this.llmClient.classify(transcriptTail, message));
        } catch (error) {
            if (!(error instanceof ClassificationFailure)) {
                throw error;
            }
            this.logger.warn('Classification fell back to none', {
                error: describeError(error),
            });
            return { kind: 'none' };
        }
    }

    // Nothing exists to fix or improve yet, so the request describes a new build.
    private redirectWhenEmpty(intent: Intent, context: ClassifyContext): Intent {
        if (context.hasExtension) {
            return intent;
        }
        if (intent.kind === 'fix') {
            return toBuild(intent.symptom);
        }
        if (intent.kind === 'improve') {
            return toBuild(intent.enhancement);
        }
        return intent;
    }
}

function toBuild(requirements: string): BuildIntent {
    return { kind: 'build', requirements, features: [], targetSites: [] };
}
