import express, { Express } from "express";
import cookieParser from 'cookie-parser';
import { ServiceContainer } from './services/index.js';
import { StoryController } from './controllers/storyController.js';
import { QuestionnaireController } from './controllers/questionnaireController.js';
import { AdminController } from './controllers/adminController.js';
import { createAuthMiddleware } from './middleware/authMiddleware.js';
import { createStoryRoutes } from './routes/storyRoutes.js';
import { createAnswerRoutes, createChapterRoutes, createProfileRoutes } from './routes/questionnaireRoutes.js';
import { createAdminRoutes } from './routes/adminRoutes.js';
import { NotFoundError, errorMiddleware, handleError } from './utils/errorHandler.js';
import { logger } from './utils/logger.js';

export interface AppOptions {
    jwtSecret: string;
    adminPersonIds: string[];
}

export function createApp(services: ServiceContainer, options: AppOptions): Express {
    const app = express();

    // Middleware
    app.use(express.json({ limit: '1mb' }));
    app.use(cookieParser());

    app.use((req, _res, next) => {
        logger.debug('[HTTP] Incoming request', { method: req.method, path: req.path });
        next();
    });

    const auth = createAuthMiddleware(options.jwtSecret);
    const optionalAuth = createAuthMiddleware(options.jwtSecret, { optional: true });
    const questionnaireController = new QuestionnaireController(services.questionnaireService);

    // API Routes
    app.use('/api/chapters', createChapterRoutes(questionnaireController, optionalAuth));
    app.use('/api/answers', createAnswerRoutes(questionnaireController, auth));
    app.use('/api/profile', createProfileRoutes(questionnaireController, auth));
    app.use('/api/story', createStoryRoutes(new StoryController(services.storyService), auth));
    app.use('/api/admin', createAdminRoutes(new AdminController(services.entitlements, options.adminPersonIds), auth));

    app.get('/api/health', (_req, res) => {
        res.json({ status: 'ok' });
    });

    app.use('/api', (req, res) => {
        handleError(res, new NotFoundError(`No route for ${req.method} ${req.originalUrl}`));
    });

    app.use(errorMiddleware);

    return app;
}
