import mongoose, { Schema } from 'mongoose';
import { Question } from '../types/story.js';

const questionSchema = new Schema<Question>({
    id: { type: String, required: true, unique: true },
    chapterId: { type: String, required: true, ref: 'Chapter' },
    order: { type: Number, required: true },
    prompt: { type: String, required: true, trim: true }
}, {
    id: false
});

questionSchema.index({ chapterId: 1, order: 1 });

export default mongoose.model<Question>('Question', questionSchema);
