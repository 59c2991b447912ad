import { Request, Response, NextFunction, RequestHandler } from 'express';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { Principal } from '../types/story.js';
import { UnauthorizedError, handleError } from '../utils/errorHandler.js';
import { logger } from '../utils/logger.js';

declare global {
    namespace Express {
        interface Request {
            principal?: Principal;
        }
    }
}

const TokenPayloadSchema = z.object({ personId: z.string().min(1) });

const readToken = (req: Request): string | undefined => {
    const cookieToken: unknown = req.cookies?.token;
    if (typeof cookieToken === 'string' && cookieToken) return cookieToken;

    const header = req.headers.authorization;
    if (header?.startsWith('Bearer ')) return header.slice('Bearer '.length);
    return undefined;
};

export interface AuthOptions {
    // Let requests without a token through unauthenticated; a bad token is still rejected
    optional?: boolean;
}

// Accepts the token from the `token` cookie or an Authorization bearer header
export const createAuthMiddleware = (jwtSecret: string, { optional = false }: AuthOptions = {}): RequestHandler =>
    (req: Request, res: Response, next: NextFunction): void => {
        const token = readToken(req);
        if (!token) {
            if (optional) {
                next();
                return;
            }
            handleError(res, new UnauthorizedError('Not authorized - No token'));
            return;
        }

        try {
            const decoded = TokenPayloadSchema.parse(jwt.verify(token, jwtSecret));
            req.principal = { personId: decoded.personId };
            next();
        } catch (error) {
            logger.debug('[HTTP] Token rejected', { reason: error instanceof Error ? error.message : String(error) });
            handleError(res, new UnauthorizedError('Not authorized - Invalid token'));
        }
    };

export const requirePrincipal = (req: Request): Principal => {
    if (!req.principal) {
        throw new UnauthorizedError();
    }
    return req.principal;
};
