/**
 * Analysis Service - builds the resume analysis prompt and turns the model reply into a response.
 * One upstream call per request; failures are not retried and no fallback model is tried.
 */

import type {
    AnalysisDocument,
    AnalysisOutcome,
    AnalysisRequest,
    AnalysisResponse,
    UpstreamErrorDetail,
} from '../types/analysis';
import { ParseError, UpstreamError } from '../utils/errors';
import logger from '../utils/logger';
import type { CompletionTransport } from './openRouterClient';

/**
 * Build the analysis prompt for a job posting and resume.
 */
export function buildAnalysisPrompt(resumeText: string, jobPosting: string): string {
    return `You are an AI resume analysis assistant. Analyze the following job description and candidate resume.

JOB DESCRIPTION:
${jobPosting}

CANDIDATE RESUME:
${resumeText}

Tasks:
1. Compute a relevancy score (0-100) with breakdown:
   - Skill Match %
   - Experience Match %
   - Education Match %
2. Assess reliability and learning potential:
   - Is the candidate consistent in skill acquisition and career progression?
   - Does their history suggest they are a fast learner?
   - Return a score (0-100).
3. Identify suspicious or potentially false information:
   - List any red flags (exaggerated claims, missing details, vague buzzwords).
   - Return a binary value: Suspicious (Yes/No).
4. Extract the candidate's key achievements:
   - Which ones align directly with this job?
   - Which ones are transferable to other roles?

Return result strictly in JSON:
{
  "relevancy_score": { "overall": X, "skills": X, "experience": X, "education": X },
  "reliability_score": X,
  "learning_potential": X,
  "suspicious": "Yes/No",
  "red_flags": [ ... ],
  "key_achievements": {
    "directly_relevant": [ ... ],
    "transferable": [ ... ]
  }
}`;
}

function isAnalysisDocument(value: unknown): value is AnalysisDocument {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse the model's message content. The whole content must be one JSON object;
 * its fields are passed through unchecked.
 */
export function parseAnalysisReply(content: string): AnalysisDocument {
    let parsed: unknown;
    try {
        parsed = JSON.parse(content);
    } catch {
        throw new ParseError('LLM did not return valid JSON', content);
    }

    if (!isAnalysisDocument(parsed)) {
        throw new ParseError('LLM did not return a JSON object', content);
    }
    return parsed;
}

export function toAnalysisResponse(outcome: AnalysisOutcome): AnalysisResponse {
    return {
        ...outcome.analysis,
        model_used: outcome.modelUsed,
        raw_llm_response: outcome.rawLlmResponse,
    };
}

export function toUpstreamErrorDetail(error: UpstreamError): UpstreamErrorDetail {
    const detail: UpstreamErrorDetail = {
        message: error.message,
        suggest_model_change: error.suggestModelChange,
    };
    if (error instanceof ParseError) {
        detail.raw = error.raw;
    }
    return detail;
}

export class AnalysisService {
    private readonly transport: CompletionTransport;

    constructor(transport: CompletionTransport) {
        this.transport = transport;
    }

    async analyze(request: AnalysisRequest): Promise<AnalysisOutcome> {
        const prompt = buildAnalysisPrompt(request.resume_text, request.job_posting);
        logger.info('[Analysis] Requesting analysis', {
            model: request.model_id ?? 'default',
            resumeLength: request.resume_text.length,
            jobPostingLength: request.job_posting.length,
        });

        const reply = await this.transport.complete({ prompt, modelId: request.model_id });

        try {
            const analysis = parseAnalysisReply(reply.content);
            return { analysis, modelUsed: reply.model, rawLlmResponse: reply.content };
        } catch (error) {
            if (error instanceof ParseError) {
                logger.warn('[Analysis] Reply was not a JSON object', {
                    model: reply.model,
                    preview: reply.content.substring(0, 200),
                });
            }
            throw error;
        }
    }
}
