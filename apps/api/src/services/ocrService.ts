import { createRequire } from 'node:module';
import path from 'node:path';
import sharp from 'sharp';
import type { LlmClient } from './llmClient';

export interface OcrEngine {
    readonly name: string;
    readonly available: boolean;
    recognize(image: Buffer): Promise<string>;
}

const MAX_IMAGE_DIMENSION = 2048;

/**
 * Flatten transparency onto white, cap the longest side and re-encode as JPEG.
 */
export async function normalizeImage(image: Buffer): Promise<Buffer> {
    return sharp(image)
        .rotate()
        .flatten({ background: '#ffffff' })
        .resize({
            width: MAX_IMAGE_DIMENSION,
            height: MAX_IMAGE_DIMENSION,
            fit: 'inside',
            withoutEnlargement: true,
        })
        .jpeg({ quality: 85 })
        .toBuffer();
}

const VISION_EXTRACTION_PROMPT = `Extract ALL text from this image exactly as it appears.
Preserve the original formatting, including:
- Headings and section titles
- Bullet points and numbered lists
- Paragraph breaks

Output ONLY the extracted text, nothing else. Do not add any commentary or explanation.`;

/**
 * Cloud OCR through a vision-capable chat model on the configured LLM endpoint.
 */
export class VisionOcrEngine implements OcrEngine {
    readonly name = 'vision';

    constructor(
        private readonly llm: LlmClient,
        private readonly model: string,
    ) {}

    get available(): boolean {
        return this.llm.configured;
    }

    async recognize(image: Buffer): Promise<string> {
        const jpeg = await normalizeImage(image);
        const dataUrl = `data:image/jpeg;base64,${jpeg.toString('base64')}`;
        return this.llm.complete(
            [
                {
                    role: 'user',
                    content: [
                        { type: 'text', text: VISION_EXTRACTION_PROMPT },
                        { type: 'image_url', image_url: { url: dataUrl, detail: 'high' } },
                    ],
                },
            ],
            { model: this.model, temperature: 0.1, maxTokens: 4000 },
        );
    }
}

const requireFromHere = createRequire(import.meta.url);

/**
 * Directory holding the traineddata shipped in the `@tesseract.js-data/<lang>` npm package.
 */
export function bundledLangPath(lang: string): string {
    const manifest = requireFromHere.resolve(`@tesseract.js-data/${lang}/package.json`);
    return path.join(path.dirname(manifest), '4.0.0_best_int');
}

/**
 * Local OCR with tesseract.js. The module is loaded on first use so deployments
 * that leave it disabled never start a worker. Language data is read from disk
 * and never cached, so the worker makes no network requests and writes no files.
 */
export class TesseractOcrEngine implements OcrEngine {
    readonly name = 'tesseract';

    constructor(
        private readonly enabled: boolean,
        private readonly lang: string = 'eng',
        private readonly langPath?: string,
    ) {}

    get available(): boolean {
        return this.enabled;
    }

    async recognize(image: Buffer): Promise<string> {
        const { createWorker, OEM } = await import('tesseract.js');
        const worker = await createWorker(this.lang, OEM.LSTM_ONLY, {
            langPath: this.langPath ?? bundledLangPath(this.lang),
            cacheMethod: 'none',
        });
        try {
            const { data } = await worker.recognize(image);
            return data.text.trim();
        } finally {
            await worker.terminate();
        }
    }
}
