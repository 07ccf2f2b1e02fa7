import type { NextFunction, Request, Response } from 'express';
import multer from 'multer';
import { RequestValidationError } from '../utils/errors';

export function formatSize(bytes: number): string {
    if (bytes < 1024 * 1024) {
        return `${Math.round(bytes / 1024)}KB`;
    }
    const mb = bytes / (1024 * 1024);
    return Number.isInteger(mb) ? `${mb}MB` : `${mb.toFixed(1)}MB`;
}

/**
 * Parse a multipart form with at most one file in `fieldName`, held in memory.
 * Oversized uploads are cut off while streaming, before any handler runs.
 */
export function createUploadMiddleware(fieldName: string, maxFileSize: number) {
    const upload = multer({
        storage: multer.memoryStorage(),
        limits: { fileSize: maxFileSize, files: 1 },
    }).single(fieldName);

    return function uploadMiddleware(req: Request, res: Response, next: NextFunction) {
        upload(req, res, (error: unknown) => {
            if (!error) {
                return next();
            }

            if (error instanceof multer.MulterError) {
                if (error.code === 'LIMIT_FILE_SIZE') {
                    return next(
                        new RequestValidationError(
                            `File is too large. Maximum allowed size is ${formatSize(maxFileSize)}.`,
                            'FILE_TOO_LARGE',
                        ),
                    );
                }
                return next(
                    new RequestValidationError(`Invalid upload: ${error.message}`, 'VALIDATION_FAILED', [
                        `${error.field ?? fieldName}: ${error.code}`,
                    ]),
                );
            }

            // busboy rejects truncated bodies and missing boundaries with plain errors
            return next(new RequestValidationError('Malformed multipart body', 'VALIDATION_FAILED'));
        });
    };
}
