import cors from 'cors';
import express, { type Express, type Request, type Response } from 'express';
import type { AppConfig } from './config';
import { createAuthMiddleware } from './middleware/auth';
import { errorHandler } from './middleware/errorHandler';
import { createRateLimitMiddleware } from './middleware/rateLimiter';
import { getRequestContext, requestContextMiddleware } from './middleware/requestContext';
import { createAnalysisRouter } from './routes/analysis';
import { MatchAnalyzer } from './services/analysisService';
import { ALLOWED_EXTENSIONS, DocumentTextExtractor } from './services/documentExtractor';
import { DevIdentityVerifier, SupabaseIdentityVerifier, type IdentityVerifier } from './services/identityService';
import { OpenAICompatibleClient, type LlmClient } from './services/llmClient';
import { TesseractOcrEngine, VisionOcrEngine } from './services/ocrService';
import { createRateLimiter, type RateLimiter } from './services/rateLimitService';
import { logRequest } from './utils/logger';

export interface AppDependencies {
    config: AppConfig;
    identity: IdentityVerifier;
    rateLimiter: RateLimiter;
    extractor: DocumentTextExtractor;
    analyzer: MatchAnalyzer;
}

/**
 * Wire the production services from configuration.
 */
export function createDependencies(config: AppConfig, llm: LlmClient = new OpenAICompatibleClient(config.llm)): AppDependencies {
    const identity = config.auth.disabled
        ? new DevIdentityVerifier()
        : new SupabaseIdentityVerifier(config.auth.supabaseUrl, config.auth.supabaseServiceKey);

    const extractor = new DocumentTextExtractor({
        ocrEngines: [
            new VisionOcrEngine(llm, config.llm.visionModel),
            new TesseractOcrEngine(config.ocr.localEnabled, config.ocr.localLang, config.ocr.localLangPath),
        ],
        minLength: {
            resume: config.limits.minResumeTextLength,
            'job-description': config.limits.minExtractedJobDescriptionLength,
        },
    });

    return {
        config,
        identity,
        rateLimiter: createRateLimiter(config.rateLimit),
        extractor,
        analyzer: new MatchAnalyzer(llm),
    };
}

export function createApp(deps: AppDependencies): Express {
    const { config } = deps;
    const app = express();

    app.disable('x-powered-by');
    app.use(cors());
    app.use(requestContextMiddleware);

    app.get('/health', (req: Request, res: Response) => {
        logRequest('GET', '/health', { requestId: getRequestContext(req).requestId });
        res.json({ status: 'ok' });
    });

    // Public limits for clients building the upload form
    app.get('/api/config', (_req: Request, res: Response) => {
        res.json({
            maxFileSizeMb: config.limits.maxUploadSize / (1024 * 1024),
            allowedExtensions: Object.keys(ALLOWED_EXTENSIONS),
            imageOcrEnabled: deps.extractor.imageOcrEnabled,
            maxJobDescriptionLength: config.limits.maxJobDescriptionLength,
            minJobDescriptionLength: config.limits.minJobDescriptionLength,
        });
    });

    app.use(
        '/api',
        createAnalysisRouter({
            config,
            extractor: deps.extractor,
            analyzer: deps.analyzer,
            authenticate: createAuthMiddleware(deps.identity),
            rateLimit: createRateLimitMiddleware(deps.rateLimiter),
        }),
    );

    app.use((_req: Request, res: Response) => {
        res.status(404).json({ error: 'Not found', code: 'NOT_FOUND' });
    });

    app.use(errorHandler);

    return app;
}
