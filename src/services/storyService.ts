import {
    BookCompileRequest,
    Chapter,
    ChapterNarrative,
    ChapterSynthesisRequest,
    ChapterSynthesisResponse,
    CompiledBook,
    Principal
} from '../types/story.js';
import { ChapterCatalog, NarrativeStore } from '../types/services.js';
import { BookCompiler, bookLockKey } from './bookCompiler.js';
import { ChapterNarrativeGate, chapterLockKey } from './chapterNarrativeGate.js';
import { ChapterResolver } from './chapterResolver.js';
import { ChapterSynthesizer } from './chapterSynthesizer.js';
import { appendChapterSummary } from './contextSummary.js';
import { PermissionGate } from './permissionGate.js';
import { KeyedLock } from '../utils/keyedLock.js';
import { NotFoundError } from '../utils/errorHandler.js';
import { logger } from '../utils/logger.js';

export interface StoryServiceDeps {
    catalog: ChapterCatalog;
    store: NarrativeStore;
    resolver: ChapterResolver;
    permissionGate: PermissionGate;
    gate: ChapterNarrativeGate;
    synthesizer: ChapterSynthesizer;
    compiler: BookCompiler;
    locks: KeyedLock;
}

const toResponse = (narrative: ChapterNarrative, cached: boolean): ChapterSynthesisResponse => ({
    chapterId: narrative.chapterId,
    narrative: narrative.narrative,
    summary: narrative.summary,
    generatedAt: narrative.generatedAt,
    cached
});

/**
 * Entry point for the two generation operations. Both check entitlement
 * first; chapter synthesis then holds the (person, chapter) lock across the
 * cache check, the model calls and the write. Chapter ids are resolved in
 * the person's questionnaire language.
 */
export class StoryService {
    constructor(private deps: StoryServiceDeps) {}

    async synthesizeChapter(principal: Principal, request: ChapterSynthesisRequest): Promise<ChapterSynthesisResponse> {
        const { permissionGate, resolver, gate, synthesizer, locks } = this.deps;
        await permissionGate.authorize(principal);

        const { personId } = request;
        const styleGuide = request.styleGuide ?? '';
        const chapter = await resolver.resolve(request.chapterId, await resolver.languageFor(personId));
        const chapterId = chapter.id;

        return locks.run(chapterLockKey(personId, chapterId), async () => {
            if (!request.regenerate) {
                const cached = await gate.getOrNull(personId, chapterId);
                if (cached) {
                    logger.info('[Story] Returning stored narrative', { personId, chapterId });
                    return toResponse(cached, true);
                }
            }

            const contextSummary = request.contextSummary ?? await this.priorContextSummary(personId, chapter);
            const narrative = await synthesizer.synthesize(personId, chapterId, styleGuide, contextSummary);
            return toResponse(narrative, false);
        });
    }

    // Stored narrative for the chapter, or null when none has been generated yet
    async getChapterNarrative(personId: string, chapterId: string): Promise<ChapterNarrative | null> {
        const { resolver, gate } = this.deps;
        const chapter = await resolver.resolve(chapterId, await resolver.languageFor(personId));
        return gate.getOrNull(personId, chapter.id);
    }

    async compileBook(principal: Principal, request: BookCompileRequest): Promise<CompiledBook> {
        const { permissionGate, resolver, compiler, locks } = this.deps;
        await permissionGate.authorize(principal);

        const language = await resolver.languageFor(request.personId);
        return locks.run(bookLockKey(request.personId), () =>
            compiler.compile(request.personId, request.styleGuide ?? '', language)
        );
    }

    async getBook(personId: string): Promise<CompiledBook> {
        const book = await this.deps.store.getBook(personId);
        if (!book) {
            throw new NotFoundError(`No compiled story found for person ${personId}`, { personId });
        }
        return book;
    }

    // Summaries already stored for the chapters that come before this one, in order
    private async priorContextSummary(personId: string, current: Chapter): Promise<string> {
        const chapters = await this.deps.catalog.listChapters(current.language);

        let summary = '';
        for (const chapter of chapters.filter(candidate => candidate.order < current.order)) {
            const stored = await this.deps.store.getNarrative(personId, chapter.id);
            if (stored) {
                summary = appendChapterSummary(summary, chapter.title, stored.summary);
            }
        }
        return summary;
    }
}
