import { Request, Response } from 'express';
import { StoryService } from '../services/storyService.js';
import { requirePrincipal } from '../middleware/authMiddleware.js';
import { BookCompileSchema, ChapterSynthesisSchema, parseInput } from '../schemas/storySchemas.js';
import { ForbiddenError, handleError } from '../utils/errorHandler.js';
import { Principal } from '../types/story.js';

// A caller may only read or generate their own story
export const resolvePersonId = (principal: Principal, requested?: string): string => {
    if (requested && requested !== principal.personId) {
        throw new ForbiddenError('You can only access your own story');
    }
    return principal.personId;
};

export class StoryController {
    constructor(private storyService: StoryService) {}

    synthesizeChapter = async (req: Request, res: Response): Promise<void> => {
        try {
            const principal = requirePrincipal(req);
            const body = parseInput(ChapterSynthesisSchema, req.body);
            const personId = resolvePersonId(principal, body.personId);

            const result = await this.storyService.synthesizeChapter(principal, { ...body, personId });
            res.json(result);
        } catch (error) {
            handleError(res, error);
        }
    };

    getChapterNarrative = async (req: Request, res: Response): Promise<void> => {
        try {
            const principal = requirePrincipal(req);
            const narrative = await this.storyService.getChapterNarrative(principal.personId, req.params.chapterId);
            // null is the normal answer before the chapter has been generated
            res.json(narrative);
        } catch (error) {
            handleError(res, error);
        }
    };

    compileBook = async (req: Request, res: Response): Promise<void> => {
        try {
            const principal = requirePrincipal(req);
            const body = parseInput(BookCompileSchema, req.body);
            const personId = resolvePersonId(principal, body.personId);

            const book = await this.storyService.compileBook(principal, { ...body, personId });
            res.json({
                compiled: true,
                book: book.bookText,
                chaptersUsed: book.chaptersUsed,
                compiledAt: book.compiledAt
            });
        } catch (error) {
            handleError(res, error);
        }
    };

    getBook = async (req: Request, res: Response): Promise<void> => {
        try {
            const principal = requirePrincipal(req);
            const book = await this.storyService.getBook(principal.personId);
            res.json({
                personId: book.personId,
                book: book.bookText,
                styleGuide: book.styleGuide,
                chaptersUsed: book.chaptersUsed,
                compiledAt: book.compiledAt
            });
        } catch (error) {
            handleError(res, error);
        }
    };
}
