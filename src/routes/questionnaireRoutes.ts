import { RequestHandler, Router } from 'express';
import { QuestionnaireController } from '../controllers/questionnaireController.js';

export const createChapterRoutes = (controller: QuestionnaireController, optionalAuth: RequestHandler): Router => {
    const router = Router();

    router.get('/', optionalAuth, controller.listChapters);
    router.get('/:chapterId/questions', optionalAuth, controller.listQuestions);

    return router;
};

export const createAnswerRoutes = (controller: QuestionnaireController, auth: RequestHandler): Router => {
    const router = Router();

    router.get('/', auth, controller.getAnswers);
    router.put('/', auth, controller.saveAnswer);

    return router;
};

export const createProfileRoutes = (controller: QuestionnaireController, auth: RequestHandler): Router => {
    const router = Router();

    router.get('/language', auth, controller.getLanguage);
    router.put('/language', auth, controller.setLanguage);

    return router;
};
