import { Request, Response } from 'express';
import { QuestionnaireService } from '../services/questionnaireService.js';
import { requirePrincipal } from '../middleware/authMiddleware.js';
import {
    AnswerSchema,
    AnswersQuerySchema,
    LanguagePreferenceSchema,
    LanguageQuerySchema,
    parseInput
} from '../schemas/storySchemas.js';
import { handleError } from '../utils/errorHandler.js';

export class QuestionnaireController {
    constructor(private questionnaireService: QuestionnaireService) {}

    // Signing in is optional here; a token only selects the person's language
    listChapters = async (req: Request, res: Response): Promise<void> => {
        try {
            const { language } = parseInput(LanguageQuerySchema, req.query);
            res.json(await this.questionnaireService.listChapters({ personId: req.principal?.personId, language }));
        } catch (error) {
            handleError(res, error);
        }
    };

    listQuestions = async (req: Request, res: Response): Promise<void> => {
        try {
            const { language } = parseInput(LanguageQuerySchema, req.query);
            const caller = { personId: req.principal?.personId, language };
            res.json(await this.questionnaireService.listQuestions(req.params.chapterId, caller));
        } catch (error) {
            handleError(res, error);
        }
    };

    saveAnswer = async (req: Request, res: Response): Promise<void> => {
        try {
            const principal = requirePrincipal(req);
            const input = parseInput(AnswerSchema, req.body);
            const { answer, updated } = await this.questionnaireService.saveAnswer(principal.personId, input);
            res.status(updated ? 200 : 201).json({ ok: true, answer, updated });
        } catch (error) {
            handleError(res, error);
        }
    };

    getAnswers = async (req: Request, res: Response): Promise<void> => {
        try {
            const principal = requirePrincipal(req);
            const { chapterId } = parseInput(AnswersQuerySchema, req.query);
            res.json(await this.questionnaireService.getChapterAnswers(principal.personId, chapterId));
        } catch (error) {
            handleError(res, error);
        }
    };

    getLanguage = async (req: Request, res: Response): Promise<void> => {
        try {
            const principal = requirePrincipal(req);
            res.json(await this.questionnaireService.getLanguage(principal.personId));
        } catch (error) {
            handleError(res, error);
        }
    };

    setLanguage = async (req: Request, res: Response): Promise<void> => {
        try {
            const principal = requirePrincipal(req);
            const { language } = parseInput(LanguagePreferenceSchema, req.body);
            res.json(await this.questionnaireService.setLanguage(principal.personId, language));
        } catch (error) {
            handleError(res, error);
        }
    };
}
