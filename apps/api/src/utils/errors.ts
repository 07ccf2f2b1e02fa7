export type AuthErrorCode = 'MISSING_TOKEN' | 'INVALID_TOKEN' | 'EXPIRED_TOKEN';

export class AuthenticationError extends Error {
    public code: AuthErrorCode;
    public statusCode = 401;

    constructor(message: string, code: AuthErrorCode = 'INVALID_TOKEN') {
        super(message);
        this.name = 'AuthenticationError';
        this.code = code;
    }
}

export type RequestErrorCode = 'VALIDATION_FAILED' | 'FILE_TOO_LARGE' | 'FILE_REQUIRED';

/**
 * Raised for bad client input: form fields, missing upload, oversized upload.
 */
export class RequestValidationError extends Error {
    public code: RequestErrorCode;
    public statusCode = 400;
    public details?: string[];

    constructor(message: string, code: RequestErrorCode = 'VALIDATION_FAILED', details?: string[]) {
        super(message);
        this.name = 'RequestValidationError';
        this.code = code;
        this.details = details;
    }
}

export type ExtractionFailureKind =
    | 'unsupported-type'
    | 'corrupt-file'
    | 'extraction-too-short'
    | 'ocr-unavailable'
    | 'empty-file';

export class DocumentExtractionError extends Error {
    public kind: ExtractionFailureKind;

    constructor(kind: ExtractionFailureKind, message: string) {
        super(message);
        this.name = 'DocumentExtractionError';
        this.kind = kind;
    }

    get statusCode(): number {
        // OCR outages are upstream problems, everything else is the caller's file
        return this.kind === 'ocr-unavailable' ? 502 : 400;
    }
}

export class AIServiceError extends Error {
    public code: string;
    public statusCode?: number;

    constructor(message: string, code: string, statusCode?: number) {
        super(message);
        this.name = 'AIServiceError';
        this.code = code;
        this.statusCode = statusCode;
    }
}

export class ParseError extends Error {
    public readonly code = 'invalid-json';
    public details?: string;

    constructor(message: string, details?: string) {
        super(message);
        this.name = 'ParseError';
        this.details = details;
    }
}

export type ResultValidationCode = 'missing-field' | 'invalid-field';

export class ValidationError extends Error {
    public code: ResultValidationCode;
    public details?: string[];

    constructor(message: string, code: ResultValidationCode, details?: string[] | string) {
        super(message);
        this.name = 'ValidationError';
        this.code = code;
        if (Array.isArray(details)) {
            this.details = details;
        } else if (details) {
            this.details = [details];
        }
    }
}

export class TimeoutError extends Error {
    public readonly code = 'upstream-timeout';
    public timeoutMs: number;

    constructor(message: string, timeoutMs: number) {
        super(message);
        this.name = 'TimeoutError';
        this.timeoutMs = timeoutMs;
    }
}
