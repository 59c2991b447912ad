import { Chapter, ChapterNarrative, CompiledBook, Language } from '../types/story.js';
import { ChapterCatalog, NarrativeStore } from '../types/services.js';
import { ChapterNarrativeGate, chapterLockKey } from './chapterNarrativeGate.js';
import { ChapterSynthesizer } from './chapterSynthesizer.js';
import { appendChapterSummary } from './contextSummary.js';
import { KeyedLock } from '../utils/keyedLock.js';
import { GenerationFailedError, NotFoundError, PartialGenerationFailedError } from '../utils/errorHandler.js';
import { logger } from '../utils/logger.js';

export const bookLockKey = (personId: string): string => `book:${personId}`;

export const formatSection = (title: string, narrative: string): string => `## ${title}\n\n${narrative}`;

interface ResolvedChapter {
    narrative: ChapterNarrative;
    synthesized: boolean;
}

export class BookCompiler {
    constructor(
        private catalog: ChapterCatalog,
        private gate: ChapterNarrativeGate,
        private synthesizer: ChapterSynthesizer,
        private store: NarrativeStore,
        private locks: KeyedLock
    ) {}

    /**
     * Walks the chapters of the person's language in canonical order, reusing stored narratives and
     * synthesizing missing ones with the summary of everything before them,
     * then overwrites the person's book. A failed chapter aborts the run
     * before anything is written to the book.
     */
    async compile(personId: string, styleGuide: string, language: Language): Promise<CompiledBook> {
        const chapters = await this.catalog.listChapters(language);
        if (chapters.length === 0) {
            throw new NotFoundError(`No chapters are defined for language ${language}`, { language });
        }

        let contextSummary = '';
        const sections: string[] = [];
        let synthesizedCount = 0;

        for (const chapter of chapters) {
            const incoming = contextSummary;
            const resolved = await this.locks.run(
                chapterLockKey(personId, chapter.id),
                () => this.resolveChapter(personId, chapter, styleGuide, incoming)
            );

            if (resolved.synthesized) synthesizedCount++;
            contextSummary = appendChapterSummary(contextSummary, chapter.title, resolved.narrative.summary);
            sections.push(formatSection(chapter.title, resolved.narrative.narrative));
        }

        const book = await this.store.saveBook({
            personId,
            bookText: sections.join('\n\n'),
            styleGuide,
            chaptersUsed: chapters.length,
            compiledAt: new Date()
        });

        logger.info('[Story] Book compiled', {
            personId,
            language,
            chapters: chapters.length,
            synthesized: synthesizedCount,
            reused: chapters.length - synthesizedCount,
            bookLength: book.bookText.length
        });
        return book;
    }

    private async resolveChapter(
        personId: string,
        chapter: Chapter,
        styleGuide: string,
        contextSummary: string
    ): Promise<ResolvedChapter> {
        const cached = await this.gate.getOrNull(personId, chapter.id);
        if (cached) {
            return { narrative: cached, synthesized: false };
        }

        try {
            const narrative = await this.synthesizer.synthesize(personId, chapter.id, styleGuide, contextSummary);
            return { narrative, synthesized: true };
        } catch (error) {
            if (error instanceof GenerationFailedError) {
                throw new PartialGenerationFailedError(
                    `Book compilation stopped: chapter "${chapter.title}" could not be generated`,
                    { chapterId: chapter.id, reason: error.message }
                );
            }
            throw error;
        }
    }
}
