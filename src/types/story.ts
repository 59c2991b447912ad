export const LANGUAGES = ['he', 'en'] as const;

// Questionnaire and narrative language
export type Language = typeof LANGUAGES[number];

export interface Chapter {
    id: string;
    title: string;
    order: number;
    language: Language;
}

export interface Question {
    id: string;
    chapterId: string;
    order: number;
    prompt: string;
}

export interface Answer {
    personId: string;
    chapterId: string;
    questionId: string;
    text: string;
    audioUrl?: string;
}

// One question of a chapter with whatever the person answered ("" when unanswered)
export interface AnswerEntry {
    questionId: string;
    prompt: string;
    answer: string;
}

export interface AggregatedChapter {
    chapter: Chapter;
    entries: AnswerEntry[];
}

export interface SynthesisResult {
    narrative: string;
    summary: string;
}

export interface ChapterNarrative extends SynthesisResult {
    personId: string;
    chapterId: string;
    styleGuide: string;
    contextSummary: string;
    generatedAt: Date;
}

export interface CompiledBook {
    personId: string;
    bookText: string;
    styleGuide: string;
    chaptersUsed: number;
    compiledAt: Date;
}

export interface Principal {
    personId: string;
}

export interface ChapterSynthesisRequest {
    personId: string;
    chapterId: string;
    styleGuide?: string;
    /**
     * Digest of earlier chapters. When omitted it is rebuilt from the
     * summaries already stored for the chapters that precede this one;
     * an explicit empty string means "no earlier chapters".
     */
    contextSummary?: string;
    /** Bypass the stored narrative and call the model again. */
    regenerate?: boolean;
}

export interface ChapterSynthesisResponse extends SynthesisResult {
    chapterId: string;
    cached: boolean;
    generatedAt: Date;
}

export interface BookCompileRequest {
    personId: string;
    styleGuide?: string;
}
