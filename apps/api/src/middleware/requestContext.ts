import crypto from 'node:crypto';
import type { NextFunction, Request, Response } from 'express';
import type { AuthenticatedUser } from '../types/analysis';

export interface RequestContext {
    requestId: string;
    startTime: number;
    ip: string;
    user?: AuthenticatedUser;
}

const requestContextMap = new WeakMap<Request, RequestContext>();

function generateRequestId(): string {
    return crypto.randomBytes(8).toString('hex');
}

/**
 * Client address: first X-Forwarded-For hop when behind a proxy, else the socket peer.
 */
export function clientIp(req: Request): string {
    const forwarded = req.headers['x-forwarded-for'];
    const header = Array.isArray(forwarded) ? forwarded[0] : forwarded;
    const first = header?.split(',')[0]?.trim();
    return first || req.socket.remoteAddress || 'unknown';
}

export function requestContextMiddleware(req: Request, res: Response, next: NextFunction) {
    const context: RequestContext = {
        requestId: generateRequestId(),
        startTime: Date.now(),
        ip: clientIp(req),
    };
    requestContextMap.set(req, context);
    res.setHeader('X-Request-ID', context.requestId);
    next();
}

export function getRequestContext(req: Request): RequestContext {
    let context = requestContextMap.get(req);
    if (!context) {
        context = { requestId: 'unknown', startTime: Date.now(), ip: clientIp(req) };
        requestContextMap.set(req, context);
    }
    return context;
}
