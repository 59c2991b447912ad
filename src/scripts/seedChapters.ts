import * as fs from 'fs';
import * as path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';
import ChapterModel from '../models/chapterModel.js';
import QuestionModel from '../models/questionModel.js';
import { connectDB, disconnectDB } from '../config/database.js';
import { logger } from '../utils/logger.js';
import { LANGUAGES } from '../types/story.js';

dotenv.config();

const CHAPTERS_FILE = path.resolve(__dirname, '../../data/chapters.json');

const SeedSchema = z.array(z.object({
    id: z.string().min(1),
    title: z.string().min(1),
    order: z.number().int().positive(),
    language: z.enum(LANGUAGES),
    questions: z.array(z.object({
        id: z.string().min(1),
        order: z.number().int().positive(),
        prompt: z.string().min(1)
    }))
}));

export type ChapterSeed = z.infer<typeof SeedSchema>;

export function readChapterSeed(file: string = CHAPTERS_FILE): ChapterSeed {
    return SeedSchema.parse(JSON.parse(fs.readFileSync(file, 'utf-8')));
}

async function seedChapters() {
    const uri = process.env.MONGO_URI;
    if (!uri) {
        throw new Error('MONGO_URI is not defined in environment variables');
    }

    const seed = readChapterSeed();
    await connectDB(uri);
    try {
        for (const { questions, ...chapter } of seed) {
            await ChapterModel.updateOne({ id: chapter.id }, { $set: chapter }, { upsert: true });

            for (const question of questions) {
                await QuestionModel.updateOne(
                    { id: question.id },
                    { $set: { ...question, chapterId: chapter.id } },
                    { upsert: true }
                );
            }

            // Questions dropped from the seed file go away; answers to them stay stored
            await QuestionModel.deleteMany({
                chapterId: chapter.id,
                id: { $nin: questions.map(question => question.id) }
            });
        }
        // Chapters keyed before the questionnaire was split by language
        const chapterIds = seed.map(chapter => chapter.id);
        await QuestionModel.deleteMany({ chapterId: { $nin: chapterIds } });
        await ChapterModel.deleteMany({ id: { $nin: chapterIds } });

        logger.info('Seeded chapters', {
            chapters: seed.length,
            languages: LANGUAGES.map(language => `${language}: ${seed.filter(chapter => chapter.language === language).length}`)
        });
    } finally {
        await disconnectDB();
    }
}

if (require.main === module) {
    seedChapters().catch(error => {
        logger.error('Error seeding chapters', error);
        process.exitCode = 1;
    });
}
