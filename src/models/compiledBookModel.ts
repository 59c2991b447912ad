import mongoose, { Schema } from 'mongoose';
import { CompiledBook } from '../types/story.js';

const compiledBookSchema = new Schema<CompiledBook>({
    personId: { type: String, required: true, unique: true, ref: 'User' },
    bookText: { type: String, required: true },
    styleGuide: { type: String, default: '' },
    chaptersUsed: { type: Number, default: 0 },
    compiledAt: { type: Date, required: true }
}, {
    timestamps: true
});

export default mongoose.model<CompiledBook>('CompiledBook', compiledBookSchema);
