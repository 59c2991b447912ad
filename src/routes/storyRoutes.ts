import { RequestHandler, Router } from 'express';
import { StoryController } from '../controllers/storyController.js';

export const createStoryRoutes = (controller: StoryController, auth: RequestHandler): Router => {
    const router = Router();

    // Generate (or return the stored) narrative for one chapter
    router.post('/chapter', auth, controller.synthesizeChapter);
    router.get('/chapter/:chapterId', auth, controller.getChapterNarrative);

    // Compile every chapter into the book
    router.post('/compile', auth, controller.compileBook);
    router.get('/book', auth, controller.getBook);

    return router;
};
