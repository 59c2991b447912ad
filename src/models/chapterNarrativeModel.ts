import mongoose, { Schema } from 'mongoose';
import { ChapterNarrative } from '../types/story.js';

const chapterNarrativeSchema = new Schema<ChapterNarrative>({
    personId: { type: String, required: true, ref: 'User' },
    chapterId: { type: String, required: true, ref: 'Chapter' },
    narrative: { type: String, required: true },
    summary: { type: String, required: true },
    styleGuide: { type: String, default: '' },
    contextSummary: { type: String, default: '' },
    generatedAt: { type: Date, required: true }
}, {
    timestamps: true
});

chapterNarrativeSchema.index({ personId: 1, chapterId: 1 }, { unique: true });

export default mongoose.model<ChapterNarrative>('ChapterNarrative', chapterNarrativeSchema);
