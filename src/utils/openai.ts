import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { GenerateOptions, LanguageModel } from '../types/services.js';
import { logger, excerpt } from './logger.js';
import { buildSystemPrompt } from './systemPrompt.js';

export interface OpenAIModelOptions {
    apiKey: string;
    model: string;
    temperature: number;
    maxTokens?: number;
}

/**
 * Chat-completions backed LanguageModel. Retries are disabled: a failed or
 * timed-out call surfaces to the caller as-is.
 */
export class OpenAILanguageModel implements LanguageModel {
    private openai: OpenAI;

    constructor(private options: OpenAIModelOptions, client?: OpenAI) {
        this.openai = client ?? new OpenAI({
            apiKey: options.apiKey,
            maxRetries: 0
        });
    }

    async generate(prompt: string, { styleGuide, timeoutMs, signal }: GenerateOptions): Promise<string> {
        const messages: ChatCompletionMessageParam[] = [
            { role: "system", content: buildSystemPrompt(styleGuide) },
            { role: "user", content: prompt }
        ];

        const completion = await this.openai.chat.completions.create(
            {
                model: this.options.model,
                messages,
                temperature: this.options.temperature,
                ...(this.options.maxTokens ? { max_tokens: this.options.maxTokens } : {})
            },
            { timeout: timeoutMs, signal, maxRetries: 0 }
        );

        const content = completion.choices[0]?.message?.content || '';
        logger.debug('[LLM] Completion received', {
            model: this.options.model,
            finishReason: completion.choices[0]?.finish_reason,
            responseExcerpt: excerpt(content)
        });
        return content;
    }
}
