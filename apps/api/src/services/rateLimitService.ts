import Redis from 'ioredis';
import { RateLimiterRedis, RateLimiterRes } from 'rate-limiter-flexible';
import type { AppConfig } from '../config';
import logger from '../utils/logger';

export interface RateLimitDecision {
    allowed: boolean;
    remaining: number;
    retryAfterSeconds: number;
}

export interface RateLimiter {
    consume(key: string): Promise<RateLimitDecision>;
}

export interface SlidingWindowOptions {
    maxRequests: number;
    windowMs: number;
    now?: () => number;
}

/**
 * In-process sliding-window limiter: a request is allowed while fewer than
 * `maxRequests` timestamps for its key fall inside the trailing window.
 *
 * Check and record happen in one synchronous step, so concurrent requests on
 * the event loop cannot interleave between them.
 */
export class SlidingWindowRateLimiter implements RateLimiter {
    private readonly history = new Map<string, number[]>();
    private readonly maxRequests: number;
    private readonly windowMs: number;
    private readonly now: () => number;

    constructor(options: SlidingWindowOptions) {
        this.maxRequests = options.maxRequests;
        this.windowMs = options.windowMs;
        this.now = options.now ?? Date.now;
    }

    async consume(key: string): Promise<RateLimitDecision> {
        return this.hit(key);
    }

    hit(key: string): RateLimitDecision {
        const now = this.now();
        const windowStart = now - this.windowMs;
        const recent = (this.history.get(key) ?? []).filter((t) => t > windowStart);

        if (recent.length >= this.maxRequests) {
            this.history.set(key, recent);
            return {
                allowed: false,
                remaining: 0,
                retryAfterSeconds: Math.max(1, Math.ceil((recent[0] + this.windowMs - now) / 1000)),
            };
        }

        recent.push(now);
        this.history.set(key, recent);
        this.prune(windowStart);

        return {
            allowed: true,
            remaining: this.maxRequests - recent.length,
            retryAfterSeconds: 0,
        };
    }

    /** Number of keys currently tracked. */
    get size(): number {
        return this.history.size;
    }

    private prune(windowStart: number): void {
        for (const [key, times] of this.history) {
            if (times.length === 0 || times[times.length - 1] <= windowStart) {
                this.history.delete(key);
            }
        }
    }
}

/**
 * The subset of rate-limiter-flexible's limiter API this adapter needs.
 */
export interface FlexibleLimiter {
    consume(key: string | number, points?: number): Promise<RateLimiterRes>;
}

/**
 * Adapts a rate-limiter-flexible limiter (e.g. RateLimiterRedis for
 * multi-instance deployments) to the RateLimiter interface.
 */
export class FlexibleRateLimiter implements RateLimiter {
    constructor(private readonly limiter: FlexibleLimiter) {}

    async consume(key: string): Promise<RateLimitDecision> {
        try {
            const res = await this.limiter.consume(key);
            return { allowed: true, remaining: res.remainingPoints, retryAfterSeconds: 0 };
        } catch (rejection) {
            if (rejection instanceof RateLimiterRes) {
                return {
                    allowed: false,
                    remaining: 0,
                    retryAfterSeconds: Math.max(1, Math.round(rejection.msBeforeNext / 1000)),
                };
            }
            throw rejection;
        }
    }
}

export function createRateLimiter(settings: AppConfig['rateLimit']): RateLimiter {
    if (settings.store === 'redis') {
        const redis = new Redis({
            host: settings.redisHost,
            port: settings.redisPort,
            retryStrategy: (times) => Math.min(times * 50, 2000),
            maxRetriesPerRequest: 3,
        });

        redis.on('connect', () => {
            logger.info('Redis connected for rate limiting');
        });
        redis.on('error', (err: Error) => {
            logger.error('Redis connection error', { error: err.message });
        });

        return new FlexibleRateLimiter(
            new RateLimiterRedis({
                storeClient: redis,
                keyPrefix: 'resume-match',
                points: settings.requests,
                duration: settings.windowSeconds,
                blockDuration: 0,
            }),
        );
    }

    return new SlidingWindowRateLimiter({
        maxRequests: settings.requests,
        windowMs: settings.windowSeconds * 1000,
    });
}
