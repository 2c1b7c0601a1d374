export interface AnalysisRequest {
    resume_text: string;
    job_posting: string;
    model_id?: string;
}

/**
 * The JSON object the model produced. The prompt asks for relevancy_score,
 * reliability_score, learning_potential, suspicious, red_flags and
 * key_achievements, but the keys are not checked and may be missing or extra.
 */
export type AnalysisDocument = Record<string, unknown>;

export interface AnalysisOutcome {
    analysis: AnalysisDocument;
    modelUsed: string | null;
    rawLlmResponse: string;
}

export type AnalysisResponse = AnalysisDocument & {
    model_used: string | null;
    raw_llm_response: string;
};

export interface UpstreamErrorDetail {
    message: string;
    suggest_model_change: boolean;
    raw?: string;
}

export interface ErrorResponse {
    detail: string | UpstreamErrorDetail;
    validation_errors?: string[];
}
