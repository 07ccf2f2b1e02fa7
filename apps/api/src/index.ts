import { createApp, createDependencies } from './app';
import { ConfigError, loadConfig, loadEnvFile, type AppConfig } from './config';
import logger, { setLogLevel } from './utils/logger';

loadEnvFile();

let config: AppConfig;
try {
    config = loadConfig();
} catch (error) {
    if (error instanceof ConfigError) {
        logger.error('[STARTUP] Invalid configuration', { errors: error.details });
        process.exit(1);
    }
    throw error;
}

setLogLevel(config.logLevel);

if (!config.llm.apiKey) {
    logger.warn('[STARTUP] OPENAI_API_KEY not configured; analysis requests will fail');
}
if (config.auth.disabled) {
    logger.warn('[STARTUP] Authentication is disabled; every token maps to the dev user');
}
if (config.rateLimit.store === 'memory') {
    logger.info('[STARTUP] Using in-memory rate limiting; limits are per process', {
        requests: config.rateLimit.requests,
        windowSeconds: config.rateLimit.windowSeconds,
    });
}

const app = createApp(createDependencies(config));

const server = app.listen(config.port, () => {
    logger.info('API server running', {
        port: config.port,
        environment: config.nodeEnv,
        model: config.llm.model,
    });
});

// Graceful shutdown
process.on('SIGTERM', () => {
    logger.info('SIGTERM signal received: closing HTTP server');
    server.close(() => {
        logger.info('HTTP server closed, exiting process');
        process.exit(0);
    });
});
