import AnswerModel from '../models/answerModel.js';
import { Answer } from '../types/story.js';
import { AnswerStore } from '../types/services.js';

const toAnswer = (doc: Answer): Answer => ({
    personId: doc.personId,
    chapterId: doc.chapterId,
    questionId: doc.questionId,
    text: doc.text,
    ...(doc.audioUrl ? { audioUrl: doc.audioUrl } : {})
});

export class MongoAnswerStore implements AnswerStore {
    async getAnswers(personId: string, chapterId: string): Promise<Answer[]> {
        const answers = await AnswerModel.find({ personId, chapterId }).lean<Answer[]>().exec();
        return answers.map(toAnswer);
    }

    async upsertAnswer(answer: Answer): Promise<{ answer: Answer; updated: boolean }> {
        const update: Partial<Answer> = { chapterId: answer.chapterId, text: answer.text };
        if (answer.audioUrl) {
            update.audioUrl = answer.audioUrl;
        }

        // The unique (personId, questionId) index makes this a single atomic upsert
        const result = await AnswerModel.updateOne(
            { personId: answer.personId, questionId: answer.questionId },
            { $set: update },
            { upsert: true }
        ).exec();

        const saved = await AnswerModel
            .findOne({ personId: answer.personId, questionId: answer.questionId })
            .lean<Answer>()
            .exec();
        if (!saved) {
            throw new Error(`Failed to save answer ${answer.questionId}`);
        }
        return { answer: toAnswer(saved), updated: result.matchedCount > 0 };
    }
}
