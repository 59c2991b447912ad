import mongoose, { Schema } from 'mongoose';
import { Answer } from '../types/story.js';

const answerSchema = new Schema<Answer>({
    personId: { type: String, required: true, ref: 'User' },
    chapterId: { type: String, required: true, ref: 'Chapter' },
    questionId: { type: String, required: true },
    text: { type: String, default: '' },
    audioUrl: String
}, {
    timestamps: true
});

// One answer per person and question; writes are upserts
answerSchema.index({ personId: 1, questionId: 1 }, { unique: true });
answerSchema.index({ personId: 1, chapterId: 1 });

export default mongoose.model<Answer>('Answer', answerSchema);
