import dotenv from 'dotenv';
import path from 'node:path';
import { z } from 'zod';
import logger from './utils/logger';
import { formatValidationErrors } from './utils/validators';

const booleanFlag = z
    .enum(['true', 'false', '1', '0', ''])
    .default('false')
    .transform((value) => value === 'true' || value === '1');

const optionalString = z
    .string()
    .optional()
    .transform((value) => (value && value.trim() ? value.trim() : undefined));

const envSchema = z.object({
    PORT: z.coerce.number().int().positive().default(4000),
    NODE_ENV: z.string().default('development'),
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),

    SUPABASE_URL: optionalString,
    SUPABASE_SERVICE_ROLE_KEY: optionalString,
    AUTH_DISABLED: booleanFlag,

    OPENAI_API_KEY: optionalString,
    OPENAI_API_BASE: z.string().url().default('https://api.openai.com/v1'),
    OPENAI_MODEL: z.string().min(1).default('gpt-4o-mini'),
    OPENAI_VISION_MODEL: optionalString,
    OPENAI_MAX_TOKENS: z.coerce.number().int().positive().default(4000),
    OPENAI_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
    LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),

    RATE_LIMIT_REQUESTS: z.coerce.number().int().positive().default(10),
    RATE_LIMIT_WINDOW: z.coerce.number().int().positive().default(3600),
    RATE_LIMIT_STORE: z.enum(['memory', 'redis']).default('memory'),
    REDIS_HOST: z.string().default('localhost'),
    REDIS_PORT: z.coerce.number().int().positive().default(6379),

    MAX_UPLOAD_SIZE: z.coerce.number().int().positive().default(2 * 1024 * 1024),
    MIN_JOB_DESCRIPTION_LENGTH: z.coerce.number().int().nonnegative().default(100),
    MAX_JOB_DESCRIPTION_LENGTH: z.coerce.number().int().positive().default(10_000),
    MIN_RESUME_TEXT_LENGTH: z.coerce.number().int().nonnegative().default(50),
    MIN_EXTRACTED_JD_LENGTH: z.coerce.number().int().nonnegative().default(300),

    LOCAL_OCR_ENABLED: booleanFlag,
    LOCAL_OCR_LANG: z.string().min(1).default('eng'),
    LOCAL_OCR_LANG_PATH: optionalString,
});

export interface AppConfig {
    port: number;
    nodeEnv: string;
    logLevel: string;
    auth: {
        supabaseUrl?: string;
        supabaseServiceKey?: string;
        disabled: boolean;
    };
    llm: {
        apiKey?: string;
        apiBase: string;
        model: string;
        visionModel: string;
        maxTokens: number;
        temperature: number;
        timeoutMs: number;
    };
    rateLimit: {
        requests: number;
        windowSeconds: number;
        store: 'memory' | 'redis';
        redisHost: string;
        redisPort: number;
    };
    limits: {
        maxUploadSize: number;
        minJobDescriptionLength: number;
        maxJobDescriptionLength: number;
        minResumeTextLength: number;
        minExtractedJobDescriptionLength: number;
    };
    ocr: {
        localEnabled: boolean;
        localLang: string;
        localLangPath?: string;
    };
}

export class ConfigError extends Error {
    public details: string[];

    constructor(details: string[]) {
        super(`Invalid environment configuration: ${details.join('; ')}`);
        this.name = 'ConfigError';
        this.details = details;
    }
}

/**
 * Load the first .env file found. The API may be started from the repo root
 * or from apps/api, so both locations are tried.
 */
export function loadEnvFile(cwd: string = process.cwd()): string | undefined {
    const envPaths = [path.resolve(cwd, '.env'), path.resolve(cwd, '../../.env')];

    for (const envPath of envPaths) {
        const result = dotenv.config({ path: envPath });
        if (result.error === undefined) {
            logger.info('[STARTUP] Loaded .env', { path: envPath });
            return envPath;
        }
    }

    logger.warn('[STARTUP] Could not find .env file, using process environment only', { paths: envPaths });
    return undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigError(formatValidationErrors(parsed.error));
    }

    const e = parsed.data;

    if (e.MIN_JOB_DESCRIPTION_LENGTH > e.MAX_JOB_DESCRIPTION_LENGTH) {
        throw new ConfigError(['MIN_JOB_DESCRIPTION_LENGTH: must not exceed MAX_JOB_DESCRIPTION_LENGTH']);
    }

    return Object.freeze({
        port: e.PORT,
        nodeEnv: e.NODE_ENV,
        logLevel: e.LOG_LEVEL,
        auth: {
            supabaseUrl: e.SUPABASE_URL,
            supabaseServiceKey: e.SUPABASE_SERVICE_ROLE_KEY,
            // never honoured in production
            disabled: e.AUTH_DISABLED && e.NODE_ENV !== 'production',
        },
        llm: {
            apiKey: e.OPENAI_API_KEY,
            apiBase: e.OPENAI_API_BASE.replace(/\/+$/, ''),
            model: e.OPENAI_MODEL,
            visionModel: e.OPENAI_VISION_MODEL ?? e.OPENAI_MODEL,
            maxTokens: e.OPENAI_MAX_TOKENS,
            temperature: e.OPENAI_TEMPERATURE,
            timeoutMs: e.LLM_TIMEOUT_MS,
        },
        rateLimit: {
            requests: e.RATE_LIMIT_REQUESTS,
            windowSeconds: e.RATE_LIMIT_WINDOW,
            store: e.RATE_LIMIT_STORE,
            redisHost: e.REDIS_HOST,
            redisPort: e.REDIS_PORT,
        },
        limits: {
            maxUploadSize: e.MAX_UPLOAD_SIZE,
            minJobDescriptionLength: e.MIN_JOB_DESCRIPTION_LENGTH,
            maxJobDescriptionLength: e.MAX_JOB_DESCRIPTION_LENGTH,
            minResumeTextLength: e.MIN_RESUME_TEXT_LENGTH,
            minExtractedJobDescriptionLength: e.MIN_EXTRACTED_JD_LENGTH,
        },
        ocr: {
            localEnabled: e.LOCAL_OCR_ENABLED,
            localLang: e.LOCAL_OCR_LANG,
            localLangPath: e.LOCAL_OCR_LANG_PATH,
        },
    });
}
