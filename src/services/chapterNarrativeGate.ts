import { ChapterNarrative } from '../types/story.js';
import { NarrativeStore } from '../types/services.js';

// Lock key for the single writer of a (person, chapter) narrative
export const chapterLockKey = (personId: string, chapterId: string): string =>
    `chapter:${personId}:${chapterId}`;

/**
 * Read side of the narrative cache. A stored narrative is returned as-is and
 * must win over a new model call unless the caller explicitly regenerates.
 */
export class ChapterNarrativeGate {
    constructor(private store: NarrativeStore) {}

    async getOrNull(personId: string, chapterId: string): Promise<ChapterNarrative | null> {
        return this.store.getNarrative(personId, chapterId);
    }
}
