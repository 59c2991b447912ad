import { LanguageModel } from '../types/services.js';
import { AnthropicLanguageModel } from './anthropic.js';
import { OpenAILanguageModel } from './openai.js';

export const MODEL_PROVIDERS = ['openai', 'anthropic'] as const;

export type ModelProvider = typeof MODEL_PROVIDERS[number];

export const DEFAULT_MODELS: Record<ModelProvider, string> = {
    openai: 'gpt-4o-mini',
    anthropic: 'claude-3-5-sonnet-latest'
};

export interface LanguageModelSettings {
    provider: ModelProvider;
    apiKey: string;
    modelName: string;
    temperature: number;
    maxTokens?: number;
}

export function createLanguageModel(settings: LanguageModelSettings): LanguageModel {
    const options = {
        apiKey: settings.apiKey,
        model: settings.modelName,
        temperature: settings.temperature,
        maxTokens: settings.maxTokens
    };

    switch (settings.provider) {
        case 'openai':
            return new OpenAILanguageModel(options);
        case 'anthropic':
            return new AnthropicLanguageModel(options);
    }
}
