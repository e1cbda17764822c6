import { generateObject, generateText, LanguageModel } from 'ai';
import { ClassificationFailure, describeError } from '../../errors';
import { ChatMessage } from '../../types/chat';
import { formatTranscript, toModelMessages } from '../../utils/chat';
import { createLogger } from '../../utils/logger';
import { ClassificationSchema, Intent } from '../intent/schema';
import { LlmClient, ReplyKind, ReplyRequest } from './types';

const FALLBACK_REPLIES: Record<ReplyKind, string> = {
    none:
        'I can build Chrome extensions for you. Describe what the extension should do, ' +
        'for example "build an extension that counts my open tabs", and I will generate it.',
    answer:
        'API key not configured, so I cannot answer free-form questions right now. ' +
        'Configure OPENAI_API_KEY or GEMINI_API_KEY. You can still ask me to build, fix or improve an extension.',
};

const CLASSIFIER_PROMPT = `You route messages for a Chrome extension builder.
Pick exactly one kind:
- build: the user wants a new extension created.
- fix: the user reports something broken in the existing extension.
- improve: the user wants a change or addition to the existing extension.
- answer: the user asks a question that needs an informative reply and no code change.
- none: greetings, thanks or remarks that need no action.
Copy the user's own words into the text fields; do not invent requirements.`;

const REPLY_PROMPTS: Record<ReplyKind, string> = {
    none:
        'You are a friendly assistant for building Chrome extensions. Reply briefly. ' +
        'If the user seems to want an extension, encourage them to describe what it should do.',
    answer:
        'You are an expert on Chrome extension development (Manifest V3). ' +
        'Answer the question clearly and concisely. Do not output complete extensions; ' +
        'the user can ask you to build or fix one instead.',
};

export class AiSdkClient implements LlmClient {
    private readonly logger = createLogger('AiSdkClient');

    constructor(
        private readonly model?: LanguageModel,
        private readonly modelId?: string,
    ) { }

    get isConfigured(): boolean {
        return this.model !== undefined;
    }

    async classify(transcript: ChatMessage[], message: string): Promise<Intent> {
        if (!this.model) {
            throw new ClassificationFailure('No language model configured for classification');
        }

        const context = formatTranscript(transcript);
        try {
            const { object } = await generateObject({
                model: this.model,
                schema: ClassificationSchema,
                system: CLASSIFIER_PROMPT,
                prompt: context
                    ? `Recent conversation:\n${context}\n\nNew message:\n${message}`
                    : `New message:\n${message}`,
                temperature: 0,
            });
            this.logger.debug('Model classification', {
                model: this.modelId,
                kind: object.intent.kind,
            });
            return object.intent;
        } catch (error) {
            throw new ClassificationFailure(
                `Model classification failed: ${describeError(error)}`,
                { cause: error },
            );
        }
    }

    async reply(request: ReplyRequest): Promise<string> {
        if (!this.model) {
            return FALLBACK_REPLIES[request.kind];
        }

        const files = request.fileList.length
            ? `\nThe user's current extension contains: ${request.fileList.join(', ')}.`
            : '';
        const { text } = await generateText({
            model: this.model,
            system: `${REPLY_PROMPTS[request.kind]}${files}`,
            messages: [
                ...toModelMessages(request.transcript),
                { role: 'user', content: request.message },
            ],
            temperature: 0.3,
        });

        const trimmed = text.trim();
        return trimmed || FALLBACK_REPLIES[request.kind];
    }
}
