import { AggregatedChapter } from '../types/story.js';
import { AnswerStore, ChapterCatalog } from '../types/services.js';
import { NotFoundError } from '../utils/errorHandler.js';

export class AnswerAggregator {
    constructor(
        private catalog: ChapterCatalog,
        private answers: AnswerStore
    ) {}

    /**
     * Pairs every question of the chapter with the person's answer, in
     * question order. Unanswered questions stay in the list with an empty
     * answer so the model sees the whole questionnaire.
     */
    async aggregate(personId: string, chapterId: string): Promise<AggregatedChapter> {
        const chapter = await this.catalog.getChapter(chapterId);
        if (!chapter) {
            throw new NotFoundError(`Chapter ${chapterId} not found`, { chapterId });
        }

        const [questions, answers] = await Promise.all([
            this.catalog.getQuestions(chapterId),
            this.answers.getAnswers(personId, chapterId)
        ]);

        const answerByQuestion = new Map(answers.map(answer => [answer.questionId, answer.text]));

        const entries = [...questions]
            .sort((a, b) => a.order - b.order)
            .map(question => ({
                questionId: question.id,
                prompt: question.prompt,
                answer: answerByQuestion.get(question.id) ?? ''
            }));

        return { chapter, entries };
    }
}
