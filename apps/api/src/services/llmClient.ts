/**
 * Minimal client for OpenAI-compatible chat completion endpoints.
 * One request per call: no retries, no model fallback.
 */

import { z } from 'zod';
import type { AppConfig } from '../config';
import { AIServiceError, TimeoutError } from '../utils/errors';
import logger from '../utils/logger';

export type ChatContentPart =
    | { type: 'text'; text: string }
    | { type: 'image_url'; image_url: { url: string; detail?: 'low' | 'high' | 'auto' } };

export interface ChatMessage {
    role: 'system' | 'user' | 'assistant';
    content: string | ChatContentPart[];
}

export interface CompletionOptions {
    model?: string;
    temperature?: number;
    maxTokens?: number;
    jsonMode?: boolean;
}

export interface LlmClient {
    readonly model: string;
    readonly configured: boolean;
    complete(messages: ChatMessage[], options?: CompletionOptions): Promise<string>;
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

const completionResponseSchema = z.object({
    choices: z
        .array(
            z.object({
                message: z.object({
                    content: z.string().nullable().optional(),
                }),
            }),
        )
        .min(1),
});

export class OpenAICompatibleClient implements LlmClient {
    private readonly settings: AppConfig['llm'];
    private readonly fetchImpl: FetchLike;

    constructor(settings: AppConfig['llm'], fetchImpl: FetchLike = fetch) {
        this.settings = settings;
        this.fetchImpl = fetchImpl;
    }

    get model(): string {
        return this.settings.model;
    }

    get configured(): boolean {
        return Boolean(this.settings.apiKey);
    }

    async complete(messages: ChatMessage[], options: CompletionOptions = {}): Promise<string> {
        const { apiKey, apiBase, timeoutMs } = this.settings;
        if (!apiKey) {
            throw new AIServiceError(
                'AI service is not configured. Please set OPENAI_API_KEY.',
                'AI_NOT_CONFIGURED',
                500,
            );
        }

        const body: Record<string, unknown> = {
            model: options.model ?? this.settings.model,
            messages,
            temperature: options.temperature ?? this.settings.temperature,
            max_tokens: options.maxTokens ?? this.settings.maxTokens,
        };
        if (options.jsonMode) {
            body.response_format = { type: 'json_object' };
        }

        const controller = new AbortController();
        let timer: ReturnType<typeof setTimeout> | undefined;
        const timeoutPromise = new Promise<never>((_, reject) => {
            timer = setTimeout(() => {
                // settle first so the race reports the timeout, not the abort
                reject(new TimeoutError(`Request timed out after ${timeoutMs}ms`, timeoutMs));
                controller.abort();
            }, timeoutMs);
        });

        const fetchPromise = this.fetchImpl(`${apiBase}/chat/completions`, {
            method: 'POST',
            headers: {
                Authorization: `Bearer ${apiKey}`,
                'Content-Type': 'application/json',
            },
            body: JSON.stringify(body),
            signal: controller.signal,
        });
        // the race settles on the timeout; keep the aborted fetch from surfacing as unhandled
        fetchPromise.catch(() => undefined);

        let response: Response;
        try {
            response = await Promise.race([fetchPromise, timeoutPromise]);
        } catch (error) {
            if (error instanceof TimeoutError) {
                throw error;
            }
            throw new AIServiceError(
                `AI service request failed: ${error instanceof Error ? error.message : String(error)}`,
                'AI_SERVICE_ERROR',
                502,
            );
        } finally {
            clearTimeout(timer);
        }

        if (!response.ok) {
            const errorText = await response.text().catch(() => 'Unable to read error response');
            logger.error('[AI Service] Upstream returned an error', {
                status: response.status,
                error: errorText.substring(0, 500),
            });
            throw new AIServiceError(
                `AI service returned ${response.status}: ${response.statusText}`,
                'AI_SERVICE_ERROR',
                502,
            );
        }

        const data: unknown = await response.json().catch(() => null);
        const parsed = completionResponseSchema.safeParse(data);
        const content = parsed.success ? parsed.data.choices[0].message.content?.trim() : undefined;

        if (!content) {
            throw new AIServiceError('AI service returned empty response', 'EMPTY_RESPONSE', 502);
        }

        return content;
    }
}
