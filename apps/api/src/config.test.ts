import { describe, expect, it } from 'vitest';
import { ConfigError, loadConfig } from './config';

describe('loadConfig', () => {
    it('applies defaults', () => {
        const config = loadConfig({});

        expect(config.port).toBe(4000);
        expect(config.nodeEnv).toBe('development');
        expect(config.rateLimit).toEqual({
            requests: 10,
            windowSeconds: 3600,
            store: 'memory',
            redisHost: 'localhost',
            redisPort: 6379,
        });
        expect(config.limits.maxUploadSize).toBe(2 * 1024 * 1024);
        expect(config.llm.apiBase).toBe('https://api.openai.com/v1');
        expect(config.llm.visionModel).toBe('gpt-4o-mini');
        expect(config.llm.apiKey).toBeUndefined();
        expect(config.auth.disabled).toBe(false);
        expect(config.ocr).toEqual({ localEnabled: false, localLang: 'eng' });
    });

    it('parses overrides', () => {
        const config = loadConfig({
            OPENAI_API_BASE: 'https://llm.example.test/v1/',
            OPENAI_MODEL: 'small-model',
            OPENAI_VISION_MODEL: 'vision-model',
            RATE_LIMIT_REQUESTS: '3',
            LOCAL_OCR_ENABLED: 'true',
        });

        expect(config.llm.apiBase).toBe('https://llm.example.test/v1');
        expect(config.llm.model).toBe('small-model');
        expect(config.llm.visionModel).toBe('vision-model');
        expect(config.rateLimit.requests).toBe(3);
        expect(config.ocr.localEnabled).toBe(true);
    });

    it('treats blank secrets as unset', () => {
        expect(loadConfig({ OPENAI_API_KEY: '   ' }).llm.apiKey).toBeUndefined();
    });

    it('only disables auth outside production', () => {
        expect(loadConfig({ AUTH_DISABLED: 'true' }).auth.disabled).toBe(true);
        expect(loadConfig({ AUTH_DISABLED: 'true', NODE_ENV: 'production' }).auth.disabled).toBe(false);
    });

    it('rejects malformed numbers', () => {
        expect(() => loadConfig({ RATE_LIMIT_REQUESTS: 'abc' })).toThrow(ConfigError);

        try {
            loadConfig({ RATE_LIMIT_REQUESTS: 'abc' });
        } catch (error) {
            expect(error).toBeInstanceOf(ConfigError);
            if (error instanceof ConfigError) {
                expect(error.details).toHaveLength(1);
                expect(error.details[0]).toMatch(/^RATE_LIMIT_REQUESTS: /);
            }
        }
    });

    it('rejects a minimum job description length above the maximum', () => {
        expect(() => loadConfig({ MIN_JOB_DESCRIPTION_LENGTH: '500', MAX_JOB_DESCRIPTION_LENGTH: '400' })).toThrow(
            'MIN_JOB_DESCRIPTION_LENGTH: must not exceed MAX_JOB_DESCRIPTION_LENGTH',
        );
    });
});
