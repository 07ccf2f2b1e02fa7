import type { NextFunction, Request, Response } from 'express';
import type { ErrorResponse } from '../types/analysis';
import {
    AIServiceError,
    AuthenticationError,
    DocumentExtractionError,
    ParseError,
    RequestValidationError,
    TimeoutError,
    ValidationError,
} from '../utils/errors';
import logger from '../utils/logger';
import { getRequestContext } from './requestContext';

interface MappedError {
    status: number;
    body: ErrorResponse;
}

export function mapError(error: unknown): MappedError {
    if (error instanceof AuthenticationError) {
        return { status: 401, body: { error: error.message, code: error.code } };
    }

    if (error instanceof RequestValidationError) {
        return {
            status: 400,
            body: { error: error.message, code: error.code, validationErrors: error.details },
        };
    }

    if (error instanceof DocumentExtractionError) {
        return { status: error.statusCode, body: { error: error.message, code: error.kind } };
    }

    if (error instanceof AIServiceError) {
        return {
            status: error.statusCode || 502,
            body: { error: 'AI service request failed', details: error.message, code: error.code },
        };
    }

    if (error instanceof TimeoutError) {
        return {
            status: 502,
            body: { error: 'AI service timed out', details: error.message, code: error.code },
        };
    }

    if (error instanceof ParseError) {
        return {
            status: 502,
            body: { error: 'Failed to parse AI response', details: error.message, code: error.code },
        };
    }

    if (error instanceof ValidationError) {
        return {
            status: 502,
            body: {
                error: 'AI response validation failed',
                details: error.message,
                code: error.code,
                validationErrors: error.details,
            },
        };
    }

    // body-parser and friends tag client errors with a status
    if (error instanceof Error && 'status' in error && error.status === 400) {
        return { status: 400, body: { error: 'Malformed request', details: error.message, code: 'VALIDATION_FAILED' } };
    }

    return { status: 500, body: { error: 'An unexpected error occurred', code: 'INTERNAL_ERROR' } };
}

/**
 * Terminal error middleware: every failure leaves as JSON with a status from the error taxonomy.
 */
export function errorHandler(error: unknown, req: Request, res: Response, _next: NextFunction) {
    const { requestId } = getRequestContext(req);
    const { status, body } = mapError(error);

    if (status >= 500) {
        logger.error('Request failed', {
            requestId,
            endpoint: req.path,
            status,
            code: body.code,
            error: error instanceof Error ? error.message : String(error),
            stack: status === 500 && error instanceof Error ? error.stack : undefined,
        });
    } else {
        logger.info('Request rejected', { requestId, endpoint: req.path, status, code: body.code });
    }

    res.status(status).json(body);
}
