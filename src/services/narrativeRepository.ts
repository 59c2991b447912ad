import ChapterNarrativeModel from '../models/chapterNarrativeModel.js';
import CompiledBookModel from '../models/compiledBookModel.js';
import { ChapterNarrative, CompiledBook } from '../types/story.js';
import { NarrativeStore } from '../types/services.js';

const toNarrative = (doc: ChapterNarrative): ChapterNarrative => ({
    personId: doc.personId,
    chapterId: doc.chapterId,
    narrative: doc.narrative,
    summary: doc.summary,
    styleGuide: doc.styleGuide,
    contextSummary: doc.contextSummary,
    generatedAt: doc.generatedAt
});

const toBook = (doc: CompiledBook): CompiledBook => ({
    personId: doc.personId,
    bookText: doc.bookText,
    styleGuide: doc.styleGuide,
    chaptersUsed: doc.chaptersUsed,
    compiledAt: doc.compiledAt
});

/**
 * Keyed storage for generated narratives and compiled books. Reads are a
 * single findOne (null when absent); writes overwrite in place.
 */
export class MongoNarrativeStore implements NarrativeStore {
    async getNarrative(personId: string, chapterId: string): Promise<ChapterNarrative | null> {
        const doc = await ChapterNarrativeModel.findOne({ personId, chapterId }).lean<ChapterNarrative>().exec();
        return doc ? toNarrative(doc) : null;
    }

    async saveNarrative(narrative: ChapterNarrative): Promise<ChapterNarrative> {
        const doc = await ChapterNarrativeModel.findOneAndUpdate(
            { personId: narrative.personId, chapterId: narrative.chapterId },
            { $set: narrative },
            { upsert: true, new: true }
        ).lean<ChapterNarrative>().exec();

        if (!doc) {
            throw new Error(`Failed to save narrative for chapter ${narrative.chapterId}`);
        }
        return toNarrative(doc);
    }

    async getBook(personId: string): Promise<CompiledBook | null> {
        const doc = await CompiledBookModel.findOne({ personId }).lean<CompiledBook>().exec();
        return doc ? toBook(doc) : null;
    }

    async saveBook(book: CompiledBook): Promise<CompiledBook> {
        const doc = await CompiledBookModel.findOneAndUpdate(
            { personId: book.personId },
            { $set: book },
            { upsert: true, new: true }
        ).lean<CompiledBook>().exec();

        if (!doc) {
            throw new Error(`Failed to save compiled book for ${book.personId}`);
        }
        return toBook(doc);
    }
}
