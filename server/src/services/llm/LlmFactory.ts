import { Inject, Service } from 'typedi';
import { createOpenAI } from '@ai-sdk/openai';
import { createGoogleGenerativeAI } from '@ai-sdk/google';
import { LanguageModel } from 'ai';
import { Settings, SettingsToken } from '../../config';
import { createLogger } from '../../utils/logger';
import { LlmClient } from './types';
import { AiSdkClient } from './AiSdkClient';

@Service()
export class LlmFactory {
    private readonly logger = createLogger('LlmFactory');

    constructor(@Inject(SettingsToken) private readonly settings: Settings) { }

    getClient(): LlmClient {
        const { model: modelId, openaiApiKey, geminiApiKey } = this.settings.llm;
        const isGemini = modelId.startsWith('gemini');

        let model: LanguageModel | undefined;

        if (isGemini) {
            if (geminiApiKey) {
                const google = createGoogleGenerativeAI({ apiKey: geminiApiKey });
                model = google(modelId);
            }
        } else if (openaiApiKey) {
            const openai = createOpenAI({ apiKey: openaiApiKey });
            model = openai(modelId);
        }

        if (!model) {
            this.logger.warn('No API key for the configured model; using fixed replies', {
                model: modelId,
            });
        }

        return new AiSdkClient(model, modelId);
    }
}
