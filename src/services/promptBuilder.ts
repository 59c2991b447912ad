import * as fs from 'fs';
import * as path from 'path';
import { PromptTemplate } from '@langchain/core/prompts';
import { AggregatedChapter, AnswerEntry, Chapter, Language } from '../types/story.js';

const PROMPTS_DIR = path.resolve(__dirname, '../../prompts');

export const NO_STYLE_GUIDE = 'No specific style guide.';
export const NO_CONTEXT_SUMMARY = 'No earlier chapters have been written yet.';
export const NO_QUESTIONS = 'This chapter has no questions.';

export const LANGUAGE_NAMES: Record<Language, string> = {
    he: 'Hebrew',
    en: 'English'
};

function loadPrompt(dir: string, filename: string): string {
    const promptPath = path.join(dir, filename);
    if (!fs.existsSync(promptPath)) {
        throw new Error(`Prompt file not found: ${promptPath}`);
    }
    return fs.readFileSync(promptPath, 'utf-8').trim();
}

// Answers are quoted so an unanswered question reads as Answer: ""
export function formatAnswerEntries(entries: AnswerEntry[]): string {
    if (entries.length === 0) return NO_QUESTIONS;

    return entries
        .map((entry, index) => `${index + 1}. ${entry.prompt}\n   Answer: ${JSON.stringify(entry.answer)}`)
        .join('\n');
}

export class PromptBuilder {
    private chapterTemplate: PromptTemplate;
    private summaryTemplate: PromptTemplate;

    constructor(promptsDir: string = PROMPTS_DIR) {
        this.chapterTemplate = PromptTemplate.fromTemplate(loadPrompt(promptsDir, 'chapterPrompt.md'));
        this.summaryTemplate = PromptTemplate.fromTemplate(loadPrompt(promptsDir, 'summaryPrompt.md'));
    }

    async chapterPrompt(aggregated: AggregatedChapter, styleGuide: string, contextSummary: string): Promise<string> {
        return this.chapterTemplate.format({
            style_guide: styleGuide.trim() ? styleGuide : NO_STYLE_GUIDE,
            context_summary: contextSummary.trim() ? contextSummary : NO_CONTEXT_SUMMARY,
            chapter_title: aggregated.chapter.title,
            language: LANGUAGE_NAMES[aggregated.chapter.language],
            qa_pairs: formatAnswerEntries(aggregated.entries)
        });
    }

    async summaryPrompt(chapter: Chapter, narrative: string): Promise<string> {
        return this.summaryTemplate.format({
            chapter_title: chapter.title,
            language: LANGUAGE_NAMES[chapter.language],
            narrative
        });
    }
}
