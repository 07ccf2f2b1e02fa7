import express, { type NextFunction, type Request, type Response } from 'express';
import request from 'supertest';
import { describe, expect, it, vi } from 'vitest';
import type { RateLimitDecision, RateLimiter } from '../services/rateLimitService';
import logger from '../utils/logger';
import { createRateLimitMiddleware, rateLimitKey } from './rateLimiter';
import { getRequestContext, requestContextMiddleware } from './requestContext';

class RecordingLimiter implements RateLimiter {
    readonly keys: string[] = [];

    constructor(private readonly decide: (key: string) => RateLimitDecision) {}

    async consume(key: string): Promise<RateLimitDecision> {
        this.keys.push(key);
        return this.decide(key);
    }
}

class BrokenLimiter implements RateLimiter {
    async consume(_key: string): Promise<RateLimitDecision> {
        throw new Error('redis unavailable');
    }
}

const allowAll = () => ({ allowed: true, remaining: 1, retryAfterSeconds: 0 });

function buildApp(limiter: RateLimiter, userId?: string) {
    const app = express();
    app.use(requestContextMiddleware);
    if (userId) {
        app.use((req: Request, _res: Response, next: NextFunction) => {
            getRequestContext(req).user = { id: userId, email: null };
            next();
        });
    }
    app.post('/limited', createRateLimitMiddleware(limiter), (req: Request, res: Response) => {
        res.json({ key: rateLimitKey(req) });
    });
    return app;
}

describe('rateLimitKey', () => {
    it('uses the authenticated user id', async () => {
        const res = await request(buildApp(new RecordingLimiter(allowAll), 'user-1')).post('/limited');

        expect(res.body).toEqual({ key: 'uid:user-1' });
    });

    it('falls back to the first X-Forwarded-For hop', async () => {
        const limiter = new RecordingLimiter(allowAll);

        const res = await request(buildApp(limiter))
            .post('/limited')
            .set('X-Forwarded-For', ' 203.0.113.7 , 10.0.0.1');

        expect(res.body).toEqual({ key: 'ip:203.0.113.7' });
        expect(limiter.keys).toEqual(['ip:203.0.113.7']);
    });

    it('uses the socket address without a proxy header', async () => {
        const res = await request(buildApp(new RecordingLimiter(allowAll))).post('/limited');

        expect(res.body.key).toMatch(/^ip:(::ffff:)?127\.0\.0\.1$|^ip:::1$/);
    });
});

describe('createRateLimitMiddleware', () => {
    it('answers 429 with Retry-After when the limiter denies', async () => {
        const limiter = new RecordingLimiter(() => ({ allowed: false, remaining: 0, retryAfterSeconds: 42 }));

        const res = await request(buildApp(limiter, 'user-1')).post('/limited');

        expect(res.status).toBe(429);
        expect(res.headers['retry-after']).toBe('42');
        expect(res.body).toEqual({
            error: 'Rate limit exceeded. Please try again later.',
            code: 'RATE_LIMITED',
            retryAfter: 42,
        });
    });

    it('lets the request through and logs when the store fails', async () => {
        const warn = vi.spyOn(logger, 'warn').mockImplementation(() => logger);

        try {
            const res = await request(buildApp(new BrokenLimiter(), 'user-1')).post('/limited');

            expect(res.status).toBe(200);
            expect(res.body).toEqual({ key: 'uid:user-1' });
            expect(warn).toHaveBeenCalledWith('Rate limiter unavailable, allowing request', {
                key: 'uid:user-1',
                error: 'redis unavailable',
            });
        } finally {
            warn.mockRestore();
        }
    });
});
