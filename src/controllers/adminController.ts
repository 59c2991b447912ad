import { Request, Response } from 'express';
import { EntitlementProvider } from '../types/services.js';
import { requirePrincipal } from '../middleware/authMiddleware.js';
import { LlmPermissionSchema, parseInput } from '../schemas/storySchemas.js';
import { ForbiddenError, NotFoundError, handleError } from '../utils/errorHandler.js';
import { logger } from '../utils/logger.js';

export class AdminController {
    constructor(
        private entitlements: EntitlementProvider,
        private adminPersonIds: string[]
    ) {}

    updateLlmPermission = async (req: Request, res: Response): Promise<void> => {
        try {
            const principal = requirePrincipal(req);
            if (!this.adminPersonIds.includes(principal.personId)) {
                throw new ForbiddenError('Only administrators can change LLM permissions');
            }

            const { personId, canUseLlm } = parseInput(LlmPermissionSchema, req.body);
            const user = await this.entitlements.setGenerationAccess(personId, canUseLlm);
            if (!user) {
                throw new NotFoundError('User not found', { personId });
            }

            logger.info('[Admin] LLM permission changed', { by: principal.personId, personId, canUseLlm });
            res.json({
                message: `LLM permission ${canUseLlm ? 'granted' : 'revoked'} successfully`,
                user
            });
        } catch (error) {
            handleError(res, error);
        }
    };
}
