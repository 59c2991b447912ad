import { ChapterNarrative } from '../types/story.js';
import { LanguageModel, NarrativeStore } from '../types/services.js';
import { AnswerAggregator } from './answerAggregator.js';
import { PromptBuilder } from './promptBuilder.js';
import { GenerationFailedError, errorMessage } from '../utils/errorHandler.js';
import { logger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeUtils.js';

type GenerationStep = 'narrative' | 'summary';

interface GenerationContext {
    personId: string;
    chapterId: string;
    step: GenerationStep;
}

export interface ChapterSynthesizerOptions {
    // Bounded wait for each model call
    timeoutMs: number;
}

/**
 * Turns one chapter's answers into narrative prose plus a short carry-forward
 * summary, and stores both. Nothing is stored unless both model calls
 * produce usable text.
 */
export class ChapterSynthesizer {
    constructor(
        private aggregator: AnswerAggregator,
        private prompts: PromptBuilder,
        private model: LanguageModel,
        private store: NarrativeStore,
        private options: ChapterSynthesizerOptions
    ) {}

    async synthesize(
        personId: string,
        chapterId: string,
        styleGuide: string,
        contextSummary: string
    ): Promise<ChapterNarrative> {
        const aggregated = await this.aggregator.aggregate(personId, chapterId);

        logger.info('[Story] Synthesizing chapter', {
            personId,
            chapterId,
            questions: aggregated.entries.length,
            answered: aggregated.entries.filter(entry => entry.answer.trim() !== '').length,
            hasContext: contextSummary.trim() !== ''
        });

        const chapterPrompt = await this.prompts.chapterPrompt(aggregated, styleGuide, contextSummary);
        const narrative = await this.generate(chapterPrompt, styleGuide, { personId, chapterId, step: 'narrative' });

        const summaryPrompt = await this.prompts.summaryPrompt(aggregated.chapter, narrative);
        const summary = await this.generate(summaryPrompt, styleGuide, { personId, chapterId, step: 'summary' });

        const saved = await this.store.saveNarrative({
            personId,
            chapterId,
            narrative,
            summary,
            styleGuide,
            contextSummary,
            generatedAt: new Date()
        });

        logger.info('[Story] Chapter narrative stored', {
            personId,
            chapterId,
            narrativeLength: narrative.length,
            summaryLength: summary.length
        });
        return saved;
    }

    private async generate(prompt: string, styleGuide: string, context: GenerationContext): Promise<string> {
        const { timeoutMs } = this.options;
        const started = Date.now();

        let output: string;
        try {
            output = await withTimeout(
                signal => this.model.generate(prompt, { styleGuide, timeoutMs, signal }),
                timeoutMs
            );
        } catch (error) {
            const reason = errorMessage(error);
            logger.error('[LLM] Generation failed', { ...context, reason });
            throw new GenerationFailedError(`Failed to generate chapter ${context.step}: ${reason}`, { ...context, reason });
        }

        const text = output.trim();
        if (!text) {
            logger.error('[LLM] Empty output', context);
            throw new GenerationFailedError(`Language model returned an empty chapter ${context.step}`, { ...context });
        }

        logger.debug('[LLM] Generation complete', {
            ...context,
            promptLength: prompt.length,
            outputLength: text.length,
            elapsedMs: Date.now() - started
        });
        return text;
    }
}
