import { Answer, Chapter, ChapterNarrative, CompiledBook, Language, Principal, Question } from './story.js';

export interface ChapterCatalog {
    // Chapters of one language in canonical order
    listChapters(language: Language): Promise<Chapter[]>;
    getChapter(chapterId: string): Promise<Chapter | null>;
    // Questions ordered by their position in the chapter
    getQuestions(chapterId: string): Promise<Question[]>;
}

export interface AnswerStore {
    getAnswers(personId: string, chapterId: string): Promise<Answer[]>;
    upsertAnswer(answer: Answer): Promise<{ answer: Answer; updated: boolean }>;
}

export interface NarrativeStore {
    getNarrative(personId: string, chapterId: string): Promise<ChapterNarrative | null>;
    saveNarrative(narrative: ChapterNarrative): Promise<ChapterNarrative>;
    getBook(personId: string): Promise<CompiledBook | null>;
    saveBook(book: CompiledBook): Promise<CompiledBook>;
}

export interface GenerateOptions {
    styleGuide: string;
    timeoutMs: number;
    signal?: AbortSignal;
}

/**
 * Opaque text generation capability. Resolves with the model's text or
 * rejects; callers must not assume any structure in the output.
 */
export interface LanguageModel {
    generate(prompt: string, options: GenerateOptions): Promise<string>;
}

export interface EntitlementProvider {
    canUseGeneration(principal: Principal): Promise<boolean>;
    // Resolves null when no such person is registered
    setGenerationAccess(personId: string, allowed: boolean): Promise<{ personId: string; canUseLlm: boolean } | null>;
}

export interface LanguagePreferences {
    // Resolves null when the person never chose a language
    getLanguage(personId: string): Promise<Language | null>;
    setLanguage(personId: string, language: Language): Promise<void>;
}
