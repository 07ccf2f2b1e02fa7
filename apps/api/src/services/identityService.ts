import { createClient } from '@supabase/supabase-js';
import type { AuthenticatedUser } from '../types/analysis';
import { AuthenticationError } from '../utils/errors';
import logger from '../utils/logger';

export interface IdentityVerifier {
    verify(token: string): Promise<AuthenticatedUser>;
}

/**
 * Pull the token out of an `Authorization: Bearer <token>` header.
 */
export function extractBearerToken(header: string | undefined): string {
    if (!header || !header.startsWith('Bearer ')) {
        throw new AuthenticationError('Missing or invalid authorization header', 'MISSING_TOKEN');
    }

    const token = header.slice('Bearer '.length).trim();
    if (!token) {
        throw new AuthenticationError('Missing or invalid authorization header', 'MISSING_TOKEN');
    }
    return token;
}

/**
 * The slice of the Supabase client used for token verification.
 */
export interface TokenAuthClient {
    auth: {
        getUser(jwt: string): Promise<{
            data: { user: { id: string; email?: string } | null };
            error: { message: string } | null;
        }>;
    };
}

export type TokenAuthClientFactory = (url: string, serviceKey: string) => TokenAuthClient;

const createSupabaseClient: TokenAuthClientFactory = (url, serviceKey) =>
    createClient(url, serviceKey, {
        auth: { persistSession: false, autoRefreshToken: false },
    });

/**
 * Verifies access tokens against Supabase Auth. The client is created lazily so
 * the service can boot (and report a clear 401) without identity credentials.
 */
export class SupabaseIdentityVerifier implements IdentityVerifier {
    private client: TokenAuthClient | null = null;

    constructor(
        private readonly url: string | undefined,
        private readonly serviceKey: string | undefined,
        private readonly clientFactory: TokenAuthClientFactory = createSupabaseClient,
    ) {}

    private getClient(): TokenAuthClient {
        if (this.client) {
            return this.client;
        }

        if (!this.url || !this.serviceKey) {
            logger.error('Identity provider is not configured. Set SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY.');
            throw new AuthenticationError('Authentication is not available', 'INVALID_TOKEN');
        }

        this.client = this.clientFactory(this.url, this.serviceKey);
        return this.client;
    }

    async verify(token: string): Promise<AuthenticatedUser> {
        const { data, error } = await this.getClient().auth.getUser(token);

        if (error) {
            if (/expired/i.test(error.message)) {
                throw new AuthenticationError('Authentication token has expired', 'EXPIRED_TOKEN');
            }
            throw new AuthenticationError('Invalid authentication token', 'INVALID_TOKEN');
        }

        if (!data.user?.id) {
            throw new AuthenticationError('Token missing user ID', 'INVALID_TOKEN');
        }

        return { id: data.user.id, email: data.user.email ?? null };
    }
}

/**
 * Local-development verifier: any non-empty token maps to one fixed user.
 */
export class DevIdentityVerifier implements IdentityVerifier {
    async verify(_token: string): Promise<AuthenticatedUser> {
        return { id: 'dev-user', email: 'dev@localhost' };
    }
}
