import { Principal } from '../types/story.js';
import { EntitlementProvider } from '../types/services.js';
import { ForbiddenError } from '../utils/errorHandler.js';
import { logger } from '../utils/logger.js';

export const GENERATION_DENIED_MESSAGE =
    "LLM access denied. You don't have permission to use generation features. Please contact support to enable this feature.";

export class PermissionGate {
    constructor(private entitlements: EntitlementProvider) {}

    async authorize(principal: Principal): Promise<void> {
        const allowed = await this.entitlements.canUseGeneration(principal);
        if (!allowed) {
            logger.warn('[Story] Generation denied', { personId: principal.personId });
            throw new ForbiddenError(GENERATION_DENIED_MESSAGE);
        }
    }
}
