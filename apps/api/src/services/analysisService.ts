/**
 * Analysis Service - scores a résumé against a job description with a single LLM call
 */

import { ZodError } from 'zod';
import type { AnalysisResult } from '../types/analysis';
import { ParseError, ValidationError } from '../utils/errors';
import logger, { logAICall } from '../utils/logger';
import { formatValidationErrors, REQUIRED_RESULT_FIELDS, validateAnalysisResult } from '../utils/validators';
import type { ChatMessage, LlmClient } from './llmClient';

export const SYSTEM_PROMPT = `You are an experienced HR analyst and ATS expert. Assess how well a candidate's CV matches a job description.

You must respond ONLY with valid JSON. No markdown, no commentary, no extra keys.
Do NOT put literal newline characters inside JSON strings. Avoid unescaped double quotes inside strings.

JSON STRUCTURE:
{
  "match_score": <integer between 0 and 100>,
  "strengths": ["<strength backed by evidence from the CV>"],
  "missing_skills": ["<requirement from the job description not evidenced in the CV>"],
  "improvement_suggestions": ["<actionable change to the CV or skill to build>"],
  "summary": "<3-4 sentence assessment suitable for a hiring manager>"
}

SCORING:
- 0-30 poor, 31-50 below average, 51-70 average, 71-85 good, 86-100 excellent
- Be honest but constructive
- Weigh hard requirements, seniority, and quantified achievements
- Order every list from most to least important`;

export function buildUserPrompt(resumeText: string, jobDescription: string): string {
    return `Please analyze the following CV against the job description:

JOB DESCRIPTION:
${jobDescription}

CANDIDATE CV:
${resumeText}

Provide your analysis in the required JSON format.`;
}

export function buildAnalysisPrompt(resumeText: string, jobDescription: string): ChatMessage[] {
    return [
        { role: 'system', content: SYSTEM_PROMPT },
        { role: 'user', content: buildUserPrompt(resumeText, jobDescription) },
    ];
}

const FENCED_BLOCK = /```(?:json)?\s*([\s\S]*?)```/i;

function nextNonWhitespace(text: string, from: number): string {
    for (let i = from; i < text.length; i++) {
        const ch = text[i];
        if (ch !== ' ' && ch !== '\t' && ch !== '\n' && ch !== '\r') {
            return ch;
        }
    }
    return '';
}

/**
 * Repair the two mistakes models make most often inside JSON strings:
 * raw line breaks and unescaped double quotes.
 */
export function repairJson(raw: string): string {
    let out = '';
    let inString = false;
    let escapeNext = false;

    for (let i = 0; i < raw.length; i++) {
        const ch = raw[i];

        if (escapeNext) {
            out += ch;
            escapeNext = false;
            continue;
        }

        if (ch === '\\') {
            out += ch;
            escapeNext = true;
            continue;
        }

        if (ch === '"') {
            if (!inString) {
                inString = true;
                out += ch;
                continue;
            }
            // a closing quote is followed by a key separator, a value separator or a closer
            const next = nextNonWhitespace(raw, i + 1);
            if (next === ':' || next === ',' || next === '}' || next === ']' || next === '') {
                inString = false;
                out += ch;
            } else {
                out += '\\"';
            }
            continue;
        }

        if (inString && ch === '\n') {
            out += '\\n';
            continue;
        }
        if (inString && ch === '\r') {
            out += '\\r';
            continue;
        }

        out += ch;
    }

    return out;
}

type JsonAttempt = { ok: true; value: unknown } | { ok: false; message: string };

function tryParseJson(text: string): JsonAttempt {
    try {
        return { ok: true, value: JSON.parse(text) };
    } catch (error) {
        return { ok: false, message: error instanceof Error ? error.message : String(error) };
    }
}

/**
 * Parse AI response and extract JSON
 */
export function parseAIResponse(content: string): unknown {
    const fenced = content.match(FENCED_BLOCK);
    const body = (fenced ? fenced[1] : content).trim();

    const direct = tryParseJson(body);
    if (direct.ok) {
        return direct.value;
    }

    const start = body.indexOf('{');
    const end = body.lastIndexOf('}');
    if (start === -1 || end <= start) {
        throw new ParseError('No JSON object found in AI response', content.substring(0, 200));
    }

    const repaired = tryParseJson(repairJson(body.slice(start, end + 1)));
    if (!repaired.ok) {
        throw new ParseError(`Failed to parse JSON: ${repaired.message}`, content.substring(0, 200));
    }
    return repaired.value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Check the parsed object against the result schema.
 * Absent keys are reported as missing-field, anything else as invalid-field.
 */
export function validateAndFormatResult(parsed: unknown): AnalysisResult {
    if (!isRecord(parsed)) {
        throw new ValidationError('AI response is not a JSON object', 'invalid-field');
    }

    const missing = REQUIRED_RESULT_FIELDS.filter((field) => !(field in parsed));
    if (missing.length > 0) {
        throw new ValidationError(
            `Missing required field: ${missing.join(', ')}`,
            'missing-field',
            missing.map((field) => `${field}: Required`),
        );
    }

    try {
        return validateAnalysisResult(parsed);
    } catch (error) {
        if (error instanceof ZodError) {
            throw new ValidationError(
                'AI response validation failed - invalid structure',
                'invalid-field',
                formatValidationErrors(error),
            );
        }
        throw error;
    }
}

export class MatchAnalyzer {
    constructor(private readonly llm: LlmClient) {}

    get model(): string {
        return this.llm.model;
    }

    async analyze(resumeText: string, jobDescription: string, meta: Record<string, unknown> = {}): Promise<AnalysisResult> {
        logAICall(this.llm.model, 'start', {
            ...meta,
            resumeLength: resumeText.length,
            jobDescLength: jobDescription.length,
        });

        try {
            const content = await this.llm.complete(buildAnalysisPrompt(resumeText, jobDescription), { jsonMode: true });
            logger.debug('[AI Service] Raw response received', { ...meta, preview: content.substring(0, 200) });

            const result = validateAndFormatResult(parseAIResponse(content));
            logAICall(this.llm.model, 'success', { ...meta, matchScore: result.matchScore });
            return result;
        } catch (error) {
            logAICall(this.llm.model, 'error', {
                ...meta,
                name: error instanceof Error ? error.name : 'Unknown',
                message: error instanceof Error ? error.message : String(error),
            });
            throw error;
        }
    }
}
