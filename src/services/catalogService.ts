import ChapterModel from '../models/chapterModel.js';
import QuestionModel from '../models/questionModel.js';
import { Chapter, Language, Question } from '../types/story.js';
import { ChapterCatalog } from '../types/services.js';

const toChapter = (doc: Chapter): Chapter => ({
    id: doc.id,
    title: doc.title,
    order: doc.order,
    language: doc.language
});

const toQuestion = (doc: Question): Question => ({
    id: doc.id,
    chapterId: doc.chapterId,
    order: doc.order,
    prompt: doc.prompt
});

export class MongoChapterCatalog implements ChapterCatalog {
    async listChapters(language: Language): Promise<Chapter[]> {
        const chapters = await ChapterModel.find({ language }).sort({ order: 1 }).lean<Chapter[]>().exec();
        return chapters.map(toChapter);
    }

    async getChapter(chapterId: string): Promise<Chapter | null> {
        const chapter = await ChapterModel.findOne({ id: chapterId }).lean<Chapter>().exec();
        return chapter ? toChapter(chapter) : null;
    }

    async getQuestions(chapterId: string): Promise<Question[]> {
        const questions = await QuestionModel
            .find({ chapterId })
            .sort({ order: 1 })
            .lean<Question[]>()
            .exec();
        return questions.map(toQuestion);
    }
}
