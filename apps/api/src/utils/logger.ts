import winston from 'winston';

const SERVICE_NAME = 'resume-match-api';

type LogMeta = Record<string, unknown>;

const logger = winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
    defaultMeta: { service: SERVICE_NAME },
    transports: [new winston.transports.Console()],
    silent: process.env.NODE_ENV === 'test',
});

export function setLogLevel(level: string): void {
    logger.level = level;
}

export function logRequest(method: string, endpoint: string, meta: LogMeta = {}) {
    logger.info(`[Request] ${method} ${endpoint}`, { method, endpoint, ...meta });
}

export function logAuth(status: 'success' | 'failure', meta: LogMeta = {}) {
    const level = status === 'success' ? 'info' : 'warn';
    logger.log(level, `[Auth] Token verification: ${status}`, { status, ...meta });
}

export function logExtraction(fileType: string, status: 'start' | 'success' | 'error' | 'fallback', meta: LogMeta = {}) {
    logger.info(`[Extraction] ${fileType}: ${status}`, { fileType, status, ...meta });
}

export function logAICall(model: string, status: 'start' | 'success' | 'error', meta: LogMeta = {}) {
    logger.info(`[AI Service] API call: ${status}`, { model, status, ...meta });
}

export default logger;
