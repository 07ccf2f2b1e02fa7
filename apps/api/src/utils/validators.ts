import createDOMPurify from 'dompurify';
import { JSDOM } from 'jsdom';
import { z } from 'zod';
import type { AnalysisResult } from '../types/analysis';

// Create a DOMPurify instance for server-side sanitization
const window = new JSDOM('').window;
const DOMPurify = createDOMPurify(window);

/**
 * Strip HTML from free text and return the plain text content.
 * The DOM is returned rather than a serialized string so entities come back decoded.
 */
export function sanitizeInput(input: string): string {
    const body = DOMPurify.sanitize(input, {
        ALLOWED_TAGS: [],
        ALLOWED_ATTR: [],
        KEEP_CONTENT: true,
        RETURN_DOM: true,
    });

    return (body.textContent ?? '').trim();
}

export interface JobDescriptionLimits {
    minLength: number;
    maxLength: number;
}

export function createAnalysisFieldsSchema(limits: JobDescriptionLimits) {
    return z.object({
        job_description: z
            .string({
                required_error: 'Job description is required. Please paste or extract text first.',
                invalid_type_error: 'Job description must be text',
            })
            .max(
                limits.maxLength,
                `Job description exceeds maximum length of ${limits.maxLength} characters`,
            )
            .transform(sanitizeInput)
            .refine(
                (val) => val.length > 0,
                'Job description is required. Please paste or extract text first.',
            )
            .refine(
                (val) => val.length >= limits.minLength,
                'Job description is too short. Please provide more details.',
            ),
    });
}

export type AnalysisFields = { jobDescription: string };

export function validateAnalysisFields(payload: unknown, limits: JobDescriptionLimits): AnalysisFields {
    const parsed = createAnalysisFieldsSchema(limits).parse(payload);
    return { jobDescription: parsed.job_description };
}

const stringList = z.array(z.string().transform((s) => s.trim())).transform((items) => items.filter(Boolean));

export const analysisResultSchema = z.object({
    match_score: z.number().int('match_score must be an integer').min(0).max(100),
    strengths: stringList,
    missing_skills: stringList,
    improvement_suggestions: stringList,
    summary: z.string().trim().min(1, 'summary must not be empty'),
});

export const REQUIRED_RESULT_FIELDS = Object.keys(analysisResultSchema.shape);

export function validateAnalysisResult(payload: unknown): AnalysisResult {
    const parsed = analysisResultSchema.parse(payload);
    return {
        matchScore: parsed.match_score,
        strengths: parsed.strengths,
        missingSkills: parsed.missing_skills,
        suggestions: parsed.improvement_suggestions,
        summary: parsed.summary,
    };
}

export function formatValidationErrors(error: z.ZodError): string[] {
    return error.issues.map((issue: z.ZodIssue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
    );
}
