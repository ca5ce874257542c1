import { ApiErrorResponse } from '@survey-transcription/shared';
import { Request, Response, NextFunction } from 'express';
import { log } from '../lib/logger.js';
import { ServiceError, ValidationError } from '../lib/errors.js';

// Shape the handler reads; ServiceError subclasses and body-parser errors both fit
interface HttpError extends Error {
    statusCode?: number;
    status?: number;
    code?: string;
    details?: unknown;
    type?: string;
}

/**
 * Global error handling middleware
 * Converts pipeline errors into standardized API responses
 */
export const errorHandler = (
    error: HttpError,
    _req: Request,
    res: Response,
    _next: NextFunction
): void => {
    // Malformed JSON bodies are rejected by express.json() before any route runs
    const normalized: HttpError = error.type === 'entity.parse.failed'
        ? new ValidationError('Request body must be valid JSON')
        : error;

    const statusCode: number = normalized.statusCode || normalized.status || 500;

    log.error('system', 'Request failed', normalized, { status_code: statusCode, code: normalized.code });

    // Don't expose unexpected errors in production; ServiceError messages are written for the caller
    const message: string = process.env.NODE_ENV === 'production' && statusCode === 500
        && !(normalized instanceof ServiceError)
        ? 'Internal server error'
        : normalized.message || 'An unexpected error occurred';

    const errorResponse: ApiErrorResponse = {
        success: false,
        error: message
    };

    if (normalized.code) {
        errorResponse.code = normalized.code;
    }

    if (normalized instanceof ServiceError && normalized.statusCode < 500 && normalized.details !== undefined) {
        errorResponse.details = normalized.details;
    }

    if (process.env.NODE_ENV === 'development') {
        if (normalized.details !== undefined) {
            errorResponse.details = normalized.details;
        }
        if (normalized.stack) {
            errorResponse.stack = normalized.stack;
        }
    }

    res.status(statusCode).json(errorResponse);
};

/**
 * 404 Not Found handler
 * Handles requests to non-existent endpoints
 */
export const notFoundHandler = (_req: Request, res: Response): void => {
    const errorResponse: ApiErrorResponse = {
        success: false,
        error: 'Endpoint not found',
        code: 'ENDPOINT_NOT_FOUND'
    };

    res.status(404).json(errorResponse);
};

/**
 * Async error wrapper
 * Wraps async route handlers to catch errors automatically
 */
export const asyncHandler = (
    fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) => {
    return (req: Request, res: Response, next: NextFunction): void => {
        Promise.resolve(fn(req, res, next)).catch(next);
    };
};
