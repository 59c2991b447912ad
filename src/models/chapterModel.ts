import mongoose, { Schema } from 'mongoose';
import { Chapter, LANGUAGES } from '../types/story.js';

const chapterSchema = new Schema<Chapter>({
    id: { type: String, required: true, unique: true },
    title: { type: String, required: true, trim: true },
    order: { type: Number, required: true },
    language: { type: String, enum: [...LANGUAGES], required: true }
}, {
    id: false, // `id` is the seeded chapter key, not the ObjectId virtual
    timestamps: true
});

chapterSchema.index({ language: 1, order: 1 });

export default mongoose.model<Chapter>('Chapter', chapterSchema);
