import { Router, type NextFunction, type Request, type RequestHandler, type Response } from 'express';
import { ZodError } from 'zod';
import type { AppConfig } from '../config';
import { getRequestContext } from '../middleware/requestContext';
import { createUploadMiddleware } from '../middleware/upload';
import type { MatchAnalyzer } from '../services/analysisService';
import type { DocumentTextExtractor } from '../services/documentExtractor';
import type { AnalysisResponse, AuthenticatedUser, ExtractionResponse } from '../types/analysis';
import { AuthenticationError, RequestValidationError } from '../utils/errors';
import logger, { logRequest } from '../utils/logger';
import { formatValidationErrors, validateAnalysisFields } from '../utils/validators';

export interface AnalysisRouterDeps {
    config: AppConfig;
    extractor: DocumentTextExtractor;
    analyzer: MatchAnalyzer;
    /** Runs ahead of body parsing on every route. */
    authenticate: RequestHandler;
    /** Runs after authentication on /analyze only; extraction does not use up analysis quota. */
    rateLimit: RequestHandler;
}

function requireFile(req: Request, field: string): Express.Multer.File {
    if (!req.file) {
        throw new RequestValidationError(
            field === 'cv_file' ? 'CV file is required' : 'No file uploaded. Please select a file.',
            'FILE_REQUIRED',
        );
    }
    return req.file;
}

function requireUser(req: Request): AuthenticatedUser {
    const { user } = getRequestContext(req);
    if (!user) {
        throw new AuthenticationError('Missing or invalid authorization header', 'MISSING_TOKEN');
    }
    return user;
}

export function createAnalysisRouter({ config, extractor, analyzer, authenticate, rateLimit }: AnalysisRouterDeps): Router {
    const router = Router();
    const { limits } = config;

    router.post(
        '/analyze',
        authenticate,
        rateLimit,
        createUploadMiddleware('cv_file', limits.maxUploadSize),
        async (req: Request, res: Response, next: NextFunction) => {
            const context = getRequestContext(req);
            const { requestId } = context;

            try {
                const user = requireUser(req);
                logRequest('POST', '/api/analyze', { requestId, userId: user.id });

                let jobDescription: string;
                try {
                    ({ jobDescription } = validateAnalysisFields(req.body ?? {}, {
                        minLength: limits.minJobDescriptionLength,
                        maxLength: limits.maxJobDescriptionLength,
                    }));
                } catch (error) {
                    if (error instanceof ZodError) {
                        const validationErrors = formatValidationErrors(error);
                        throw new RequestValidationError(
                            validationErrors[0] ?? 'Validation failed',
                            'VALIDATION_FAILED',
                            validationErrors,
                        );
                    }
                    throw error;
                }

                const file = requireFile(req, 'cv_file');
                const resumeText = await extractor.extract({
                    buffer: file.buffer,
                    filename: file.originalname,
                    purpose: 'resume',
                });

                const analysis = await analyzer.analyze(resumeText, jobDescription, { requestId });

                const processingTime = Date.now() - context.startTime;
                const response: AnalysisResponse = {
                    success: true,
                    user,
                    analysis,
                    metadata: {
                        processingTime,
                        model: analyzer.model,
                        timestamp: new Date().toISOString(),
                    },
                };

                logger.info('Analysis response sent', { requestId, processingTime, matchScore: analysis.matchScore });
                res.json(response);
            } catch (error) {
                next(error);
            }
        },
    );

    router.post(
        '/extract-jd',
        authenticate,
        createUploadMiddleware('jd_file', limits.maxUploadSize),
        async (req: Request, res: Response, next: NextFunction) => {
            const { requestId } = getRequestContext(req);

            try {
                logRequest('POST', '/api/extract-jd', { requestId });

                const file = requireFile(req, 'jd_file');
                const extractedText = await extractor.extract({
                    buffer: file.buffer,
                    filename: file.originalname,
                    purpose: 'job-description',
                });

                const response: ExtractionResponse = {
                    success: true,
                    extractedText,
                    charCount: extractedText.length,
                    filename: file.originalname,
                };
                res.json(response);
            } catch (error) {
                next(error);
            }
        },
    );

    return router;
}
