export interface AnalysisResult {
    matchScore: number;
    strengths: string[];
    missingSkills: string[];
    suggestions: string[];
    summary: string;
}

export interface AnalysisResponse {
    success: true;
    user: AuthenticatedUser;
    analysis: AnalysisResult;
    metadata: {
        processingTime: number;
        model: string;
        timestamp: string;
    };
}

export interface ExtractionResponse {
    success: true;
    extractedText: string;
    charCount: number;
    filename: string;
}

export interface AuthenticatedUser {
    id: string;
    email: string | null;
}

export interface ErrorResponse {
    error: string;
    code: string;
    validationErrors?: string[];
    details?: string;
    retryAfter?: number;
}
