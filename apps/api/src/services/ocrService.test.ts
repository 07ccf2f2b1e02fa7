import path from 'node:path';
import sharp from 'sharp';
import { describe, expect, it, vi } from 'vitest';
import type { ChatMessage, CompletionOptions, LlmClient } from './llmClient';
import { bundledLangPath, normalizeImage, TesseractOcrEngine, VisionOcrEngine } from './ocrService';

const tesseract = vi.hoisted(() => {
    const recognize = vi.fn(async (_image: Buffer) => ({ data: { text: '  Jane Doe\nEngineer  ' } }));
    const terminate = vi.fn(async () => undefined);
    const createWorker = vi.fn(async (_lang: string, _oem: number, _options: Record<string, unknown>) => ({
        recognize,
        terminate,
    }));
    return { createWorker, recognize, terminate };
});

vi.mock('tesseract.js', () => ({ createWorker: tesseract.createWorker, OEM: { LSTM_ONLY: 1 } }));

class RecordingLlm implements LlmClient {
    readonly model = 'text-model';
    readonly calls: Array<{ messages: ChatMessage[]; options?: CompletionOptions }> = [];

    constructor(readonly configured: boolean = true) {}

    async complete(messages: ChatMessage[], options?: CompletionOptions): Promise<string> {
        this.calls.push({ messages, options });
        return 'Jane Doe\nSenior Engineer';
    }
}

function solidPng(width: number, height: number): Promise<Buffer> {
    return sharp({
        create: { width, height, channels: 4, background: { r: 30, g: 60, b: 90, alpha: 0.5 } },
    })
        .png()
        .toBuffer();
}

function imageUrlOf(messages: ChatMessage[]): string {
    const content = messages[0].content;
    if (typeof content === 'string') {
        throw new Error('expected multi-part content');
    }
    for (const part of content) {
        if (part.type === 'image_url') {
            return part.image_url.url;
        }
    }
    throw new Error('no image part');
}

describe('normalizeImage', () => {
    it('caps the longest side at 2048px and re-encodes as opaque JPEG', async () => {
        const jpeg = await normalizeImage(await solidPng(3000, 1000));
        const meta = await sharp(jpeg).metadata();

        expect(meta.format).toBe('jpeg');
        expect(meta.width).toBe(2048);
        expect(meta.height).toBeGreaterThanOrEqual(682);
        expect(meta.height).toBeLessThanOrEqual(683);
        expect(meta.channels).toBe(3);
    });

    it('never enlarges small images', async () => {
        const meta = await sharp(await normalizeImage(await solidPng(120, 40))).metadata();

        expect(meta.width).toBe(120);
        expect(meta.height).toBe(40);
    });
});

describe('VisionOcrEngine', () => {
    it('sends the image as a base64 JPEG data URL to the vision model', async () => {
        const llm = new RecordingLlm();
        const engine = new VisionOcrEngine(llm, 'vision-model');

        await expect(engine.recognize(await solidPng(64, 64))).resolves.toBe('Jane Doe\nSenior Engineer');

        expect(llm.calls).toHaveLength(1);
        const [call] = llm.calls;
        expect(call.options).toEqual({ model: 'vision-model', temperature: 0.1, maxTokens: 4000 });
        expect(call.messages).toHaveLength(1);
        expect(call.messages[0].role).toBe('user');

        const url = imageUrlOf(call.messages);
        expect(url.startsWith('data:image/jpeg;base64,')).toBe(true);
        const decoded = Buffer.from(url.slice('data:image/jpeg;base64,'.length), 'base64');
        const meta = await sharp(decoded).metadata();
        expect(meta.format).toBe('jpeg');
        expect(meta.width).toBe(64);
    });

    it('is available only when the model client is configured', () => {
        expect(new VisionOcrEngine(new RecordingLlm(true), 'vision-model').available).toBe(true);
        expect(new VisionOcrEngine(new RecordingLlm(false), 'vision-model').available).toBe(false);
    });

    it('fails on bytes that are not a decodable image', async () => {
        const llm = new RecordingLlm();

        await expect(new VisionOcrEngine(llm, 'vision-model').recognize(Buffer.from('not an image'))).rejects.toThrow();
        expect(llm.calls).toHaveLength(0);
    });
});

describe('TesseractOcrEngine', () => {
    it('reads language data from the given directory without caching', async () => {
        tesseract.createWorker.mockClear();
        tesseract.terminate.mockClear();
        const engine = new TesseractOcrEngine(true, 'eng', '/opt/tessdata');

        await expect(engine.recognize(Buffer.from('image'))).resolves.toBe('Jane Doe\nEngineer');

        expect(tesseract.createWorker).toHaveBeenCalledWith('eng', 1, {
            langPath: '/opt/tessdata',
            cacheMethod: 'none',
        });
        expect(tesseract.terminate).toHaveBeenCalledTimes(1);
    });

    it('terminates the worker when recognition fails', async () => {
        tesseract.terminate.mockClear();
        tesseract.recognize.mockRejectedValueOnce(new Error('bad image'));

        await expect(new TesseractOcrEngine(true, 'eng', '/opt/tessdata').recognize(Buffer.from('x'))).rejects.toThrow(
            'bad image',
        );
        expect(tesseract.terminate).toHaveBeenCalledTimes(1);
    });

    it('follows the enabled flag', () => {
        expect(new TesseractOcrEngine(false).available).toBe(false);
        expect(new TesseractOcrEngine(true).available).toBe(true);
    });
});

describe('bundledLangPath', () => {
    it('points into the installed language data package', () => {
        expect(bundledLangPath('eng').endsWith(path.join('@tesseract.js-data', 'eng', '4.0.0_best_int'))).toBe(true);
    });

    it('fails for a language whose data package is not installed', () => {
        expect(() => bundledLangPath('zz-not-installed')).toThrow();
    });
});
