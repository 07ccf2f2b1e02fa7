import type { NextFunction, Request, Response } from 'express';
import type { RateLimitDecision, RateLimiter } from '../services/rateLimitService';
import type { ErrorResponse } from '../types/analysis';
import logger from '../utils/logger';
import { getRequestContext } from './requestContext';

/**
 * Key on the authenticated user when there is one, otherwise on the client address.
 * The address key applies when the limiter is mounted ahead of, or without, authentication.
 */
export function rateLimitKey(req: Request): string {
    const context = getRequestContext(req);
    return context.user ? `uid:${context.user.id}` : `ip:${context.ip}`;
}

export function createRateLimitMiddleware(limiter: RateLimiter) {
    return async function rateLimitMiddleware(req: Request, res: Response, next: NextFunction) {
        const key = rateLimitKey(req);

        let decision: RateLimitDecision;
        try {
            decision = await limiter.consume(key);
        } catch (error) {
            logger.warn('Rate limiter unavailable, allowing request', {
                key,
                error: error instanceof Error ? error.message : 'Unknown error',
            });
            return next();
        }

        if (decision.allowed) {
            return next();
        }

        res.set('Retry-After', String(decision.retryAfterSeconds));
        logger.warn('Rate limit exceeded', {
            key,
            retryAfter: decision.retryAfterSeconds,
            endpoint: req.path,
        });

        const body: ErrorResponse = {
            error: 'Rate limit exceeded. Please try again later.',
            code: 'RATE_LIMITED',
            retryAfter: decision.retryAfterSeconds,
        };
        return res.status(429).json(body);
    };
}
