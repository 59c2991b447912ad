import Anthropic from '@anthropic-ai/sdk';
import { GenerateOptions, LanguageModel } from '../types/services.js';
import { logger, excerpt } from './logger.js';
import { buildSystemPrompt } from './systemPrompt.js';

// The Messages API needs an explicit completion cap
export const DEFAULT_ANTHROPIC_MAX_TOKENS = 4096;

export interface AnthropicModelOptions {
    apiKey: string;
    model: string;
    temperature: number;
    maxTokens?: number;
}

/**
 * Messages API backed LanguageModel, interchangeable with the OpenAI one.
 * Retries are disabled here too.
 */
export class AnthropicLanguageModel implements LanguageModel {
    private anthropic: Anthropic;

    constructor(private options: AnthropicModelOptions, client?: Anthropic) {
        this.anthropic = client ?? new Anthropic({
            apiKey: options.apiKey,
            maxRetries: 0
        });
    }

    async generate(prompt: string, { styleGuide, timeoutMs, signal }: GenerateOptions): Promise<string> {
        const message = await this.anthropic.messages.create(
            {
                model: this.options.model,
                max_tokens: this.options.maxTokens ?? DEFAULT_ANTHROPIC_MAX_TOKENS,
                temperature: this.options.temperature,
                system: buildSystemPrompt(styleGuide),
                messages: [{ role: 'user', content: prompt }]
            },
            { timeout: timeoutMs, signal, maxRetries: 0 }
        );

        const content = message.content
            .map(block => block.type === 'text' ? block.text : '')
            .join('');
        logger.debug('[LLM] Message received', {
            model: this.options.model,
            stopReason: message.stop_reason,
            responseExcerpt: excerpt(content)
        });
        return content;
    }
}
