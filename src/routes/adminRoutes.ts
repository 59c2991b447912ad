import { RequestHandler, Router } from 'express';
import { AdminController } from '../controllers/adminController.js';

export const createAdminRoutes = (controller: AdminController, auth: RequestHandler): Router => {
    const router = Router();

    router.post('/llm-permission', auth, controller.updateLlmPermission);

    return router;
};
