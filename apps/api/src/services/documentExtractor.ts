/**
 * Document Text Extractor - turns an uploaded PDF, DOCX or image into plain text, in memory.
 */

import mammoth from 'mammoth';
import { extractText } from 'unpdf';
import { DocumentExtractionError } from '../utils/errors';
import logger, { logExtraction } from '../utils/logger';
import { sanitizeExtractedText } from '../utils/text';
import type { OcrEngine } from './ocrService';

export type FileCategory = 'pdf' | 'docx' | 'image';

export type DocumentPurpose = 'resume' | 'job-description';

export const ALLOWED_EXTENSIONS: Readonly<Record<string, FileCategory>> = {
    '.pdf': 'pdf',
    '.docx': 'docx',
    '.doc': 'docx',
    '.png': 'image',
    '.jpg': 'image',
    '.jpeg': 'image',
};

const MAX_PDF_PAGES = 20;

export function fileExtension(filename: string): string {
    const dot = filename.lastIndexOf('.');
    return dot === -1 ? '' : filename.slice(dot).toLowerCase();
}

/**
 * Detect file category from the filename extension.
 */
export function detectFileType(filename: string): FileCategory {
    const ext = fileExtension(filename);
    const category = ALLOWED_EXTENSIONS[ext];

    if (!category) {
        const allowed = Object.keys(ALLOWED_EXTENSIONS).sort().join(', ');
        throw new DocumentExtractionError(
            'unsupported-type',
            `File type '${ext || filename}' is not supported. Please upload one of: ${allowed}`,
        );
    }

    return category;
}

function looksLikeImage(buffer: Buffer, ext: string): boolean {
    if (ext === '.png') {
        return buffer.subarray(0, 4).equals(Buffer.from([0x89, 0x50, 0x4e, 0x47]));
    }
    return buffer.subarray(0, 3).equals(Buffer.from([0xff, 0xd8, 0xff]));
}

export interface ExtractInput {
    buffer: Buffer;
    filename: string;
    purpose: DocumentPurpose;
}

/**
 * Library-backed parsers. PDF yields one string per page.
 */
export interface DocumentParsers {
    pdf(buffer: Buffer): Promise<string[]>;
    docx(buffer: Buffer): Promise<string>;
}

export const defaultParsers: DocumentParsers = {
    async pdf(buffer) {
        const result = await extractText(new Uint8Array(buffer));
        return Array.isArray(result.text) ? result.text : [String(result.text)];
    },
    async docx(buffer) {
        const result = await mammoth.extractRawText({ buffer });
        return result.value;
    },
};

export interface DocumentExtractorOptions {
    ocrEngines: OcrEngine[];
    minLength: Record<DocumentPurpose, number>;
    parsers?: DocumentParsers;
}

export class DocumentTextExtractor {
    private readonly ocrEngines: OcrEngine[];
    private readonly minLength: Record<DocumentPurpose, number>;
    private readonly parsers: DocumentParsers;

    constructor(options: DocumentExtractorOptions) {
        this.ocrEngines = options.ocrEngines;
        this.minLength = options.minLength;
        this.parsers = options.parsers ?? defaultParsers;
    }

    get imageOcrEnabled(): boolean {
        return this.ocrEngines.some((engine) => engine.available);
    }

    async extract({ buffer, filename, purpose }: ExtractInput): Promise<string> {
        const fileType = detectFileType(filename);

        if (buffer.length === 0) {
            throw new DocumentExtractionError('empty-file', 'The uploaded file is empty.');
        }

        logExtraction(fileType, 'start', { purpose, size: buffer.length });

        let rawText: string;
        switch (fileType) {
            case 'pdf':
                rawText = await this.extractPdf(buffer);
                break;
            case 'docx':
                rawText = await this.extractDocx(buffer);
                break;
            case 'image':
                rawText = await this.extractImage(buffer, fileExtension(filename));
                break;
        }

        const text = sanitizeExtractedText(rawText);
        const minimum = this.minLength[purpose];

        if (text.length < minimum) {
            const subject = purpose === 'resume' ? 'CV' : 'job description';
            throw new DocumentExtractionError(
                'extraction-too-short',
                `Extracted text is too short (${text.length} characters). ` +
                    `A ${subject} should contain at least ${minimum} characters of readable text. ` +
                    'Please upload a more complete file or paste the text manually.',
            );
        }

        logExtraction(fileType, 'success', { purpose, chars: text.length });
        return text;
    }

    private async extractPdf(buffer: Buffer): Promise<string> {
        let pages: string[];
        try {
            pages = await this.parsers.pdf(buffer);
        } catch (error) {
            logExtraction('pdf', 'error', { error: error instanceof Error ? error.message : String(error) });
            throw new DocumentExtractionError(
                'corrupt-file',
                'Failed to read PDF file. It may be corrupted or password-protected.',
            );
        }

        if (pages.length > MAX_PDF_PAGES) {
            logger.warn('PDF has too many pages, extracting the first ones only', {
                totalPages: pages.length,
                maxPages: MAX_PDF_PAGES,
            });
        }

        const text = pages
            .slice(0, MAX_PDF_PAGES)
            .map((page) => page.trim())
            .filter(Boolean)
            .join('\n\n');

        if (!text) {
            throw new DocumentExtractionError(
                'corrupt-file',
                'Could not extract text from PDF. The file may be image-based or scanned. ' +
                    'Try uploading an image screenshot instead.',
            );
        }

        return text;
    }

    private async extractDocx(buffer: Buffer): Promise<string> {
        let value: string;
        try {
            value = await this.parsers.docx(buffer);
        } catch (error) {
            logExtraction('docx', 'error', { error: error instanceof Error ? error.message : String(error) });
            throw new DocumentExtractionError(
                'corrupt-file',
                'Failed to read document file. It may be corrupted or in an unsupported format.',
            );
        }

        if (!value.trim()) {
            throw new DocumentExtractionError(
                'corrupt-file',
                'Could not extract text from document. The file appears to be empty.',
            );
        }

        return value;
    }

    /**
     * Try each configured OCR engine once, in order. An engine that answers with
     * no text ends the search with an empty result so the length check reports it.
     */
    private async extractImage(buffer: Buffer, ext: string): Promise<string> {
        if (!looksLikeImage(buffer, ext)) {
            throw new DocumentExtractionError(
                'corrupt-file',
                'Could not read this image file. It may be corrupted or in an unsupported format. ' +
                    'Please upload a PNG/JPG/JPEG image.',
            );
        }

        const engines = this.ocrEngines.filter((engine) => engine.available);
        if (engines.length === 0) {
            throw new DocumentExtractionError(
                'ocr-unavailable',
                'Image text extraction is not configured. Please paste the text manually, or upload a PDF/DOCX file.',
            );
        }

        for (const engine of engines) {
            try {
                const text = await engine.recognize(buffer);
                logExtraction('image', 'success', { engine: engine.name, chars: text.length });
                return text;
            } catch (error) {
                logExtraction('image', 'fallback', {
                    engine: engine.name,
                    error: error instanceof Error ? error.message : String(error),
                });
            }
        }

        throw new DocumentExtractionError(
            'ocr-unavailable',
            'Failed to read text from the image. Please try again later, paste the text manually, or upload a PDF/DOCX file.',
        );
    }
}
