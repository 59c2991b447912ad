// src/utils/errorHandler.ts
import { NextFunction, Request, Response } from 'express';
import { logger } from './logger.js';

export class AppError extends Error {
  constructor(
    public message: string,
    public statusCode: number = 500,
    public code?: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 400, 'VALIDATION_FAILED', details);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Not authorized') {
    super(message, 401, 'UNAUTHORIZED');
  }
}

export class ForbiddenError extends AppError {
  constructor(message: string) {
    super(message, 403, 'FORBIDDEN');
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 404, 'NOT_FOUND', details);
  }
}

// The language model timed out, failed, or produced nothing usable
export class GenerationFailedError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 502, 'GENERATION_FAILED', details);
  }
}

// One chapter failed while compiling a book; no book was written
export class PartialGenerationFailedError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 502, 'PARTIAL_GENERATION_FAILED', details);
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const httpStatusOf = (error: unknown): number | undefined => {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
};

export const handleError = (res: Response, error: unknown) => {
  if (error instanceof AppError) {
    if (error.statusCode >= 500) {
      logger.error(`[HTTP] ${error.code ?? 'ERROR'}: ${error.message}`, error.details);
    }
    return res.status(error.statusCode).json({ 
      error: error.message,
      code: error.code,
      details: error.details
    });
  }

  // express.json() rejects malformed bodies with a SyntaxError
  if (error instanceof SyntaxError) {
    return res.status(400).json({ error: 'Malformed JSON body', code: 'VALIDATION_FAILED' });
  }

  // Body parser errors (oversized or unreadable bodies) carry their own 4xx status
  const status = httpStatusOf(error);
  if (status !== undefined && status >= 400 && status < 500) {
    logger.warn(`[HTTP] Request rejected: ${errorMessage(error)}`, { status });
    return res.status(status).json({ error: errorMessage(error), code: 'REQUEST_REJECTED' });
  }
  
  logger.error('[HTTP] Unhandled error', error);
  const message = errorMessage(error) || 'Unknown error';
  return res.status(500).json({ error: message });
};

// Final express error handler for anything thrown outside a controller
export const errorMiddleware = (error: unknown, _req: Request, res: Response, _next: NextFunction): void => {
  handleError(res, error);
};
