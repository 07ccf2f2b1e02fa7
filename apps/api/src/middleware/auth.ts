import type { NextFunction, Request, Response } from 'express';
import { extractBearerToken, type IdentityVerifier } from '../services/identityService';
import { AuthenticationError } from '../utils/errors';
import { logAuth } from '../utils/logger';
import { getRequestContext } from './requestContext';

/**
 * Verifies the bearer token before anything else touches the request body.
 */
export function createAuthMiddleware(identity: IdentityVerifier) {
    return async function authMiddleware(req: Request, _res: Response, next: NextFunction) {
        const context = getRequestContext(req);

        try {
            const token = extractBearerToken(req.headers.authorization);
            context.user = await identity.verify(token);
            logAuth('success', { requestId: context.requestId, userId: context.user.id });
            next();
        } catch (error) {
            const authError =
                error instanceof AuthenticationError
                    ? error
                    : new AuthenticationError(
                          `Authentication failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
                      );
            logAuth('failure', { requestId: context.requestId, code: authError.code });
            next(authError);
        }
    };
}
