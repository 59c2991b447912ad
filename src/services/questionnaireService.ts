import { AggregatedChapter, Answer, Chapter, Language, Question } from '../types/story.js';
import { AnswerStore, ChapterCatalog, LanguagePreferences } from '../types/services.js';
import { AnswerAggregator } from './answerAggregator.js';
import { ChapterResolver } from './chapterResolver.js';
import { NotFoundError } from '../utils/errorHandler.js';

export interface AnswerInput {
    chapterId: string;
    questionId: string;
    text: string;
    audioUrl?: string;
}

// Who is asking, and in which language they asked (if they did)
export interface Caller {
    personId?: string;
    language?: Language;
}

// Read access to chapters and questions, the answer capture writes and the language preference
export class QuestionnaireService {
    constructor(
        private catalog: ChapterCatalog,
        private answers: AnswerStore,
        private aggregator: AnswerAggregator,
        private resolver: ChapterResolver,
        private preferences: LanguagePreferences
    ) {}

    async listChapters(caller: Caller): Promise<Chapter[]> {
        const language = await this.resolver.pickLanguage(caller.language, caller.personId);
        return this.catalog.listChapters(language);
    }

    async listQuestions(chapterId: string, caller: Caller): Promise<Question[]> {
        const language = await this.resolver.pickLanguage(caller.language, caller.personId);
        const chapter = await this.resolver.resolve(chapterId, language);
        return this.catalog.getQuestions(chapter.id);
    }

    async saveAnswer(personId: string, input: AnswerInput): Promise<{ answer: Answer; updated: boolean }> {
        const chapter = await this.resolveForPerson(personId, input.chapterId);

        const questions = await this.catalog.getQuestions(chapter.id);
        if (!questions.some(question => question.id === input.questionId)) {
            throw new NotFoundError(
                `Question ${input.questionId} not found in chapter ${chapter.id}`,
                { chapterId: chapter.id, questionId: input.questionId }
            );
        }

        return this.answers.upsertAnswer({ personId, ...input, chapterId: chapter.id });
    }

    async getChapterAnswers(personId: string, chapterId: string): Promise<AggregatedChapter> {
        const chapter = await this.resolveForPerson(personId, chapterId);
        return this.aggregator.aggregate(personId, chapter.id);
    }

    async getLanguage(personId: string): Promise<{ personId: string; language: Language }> {
        return { personId, language: await this.resolver.languageFor(personId) };
    }

    async setLanguage(personId: string, language: Language): Promise<{ personId: string; language: Language }> {
        await this.preferences.setLanguage(personId, language);
        return { personId, language };
    }

    private async resolveForPerson(personId: string, chapterId: string): Promise<Chapter> {
        return this.resolver.resolve(chapterId, await this.resolver.languageFor(personId));
    }
}
