import { z } from 'zod';
import type { AnalysisRequest } from '../types/analysis';

const jobPostingSchema = z.string({ required_error: 'Job posting is required' });

// A null or empty model id means "use the provider default"
const modelIdSchema = z.string()
    .nullish()
    .transform((val) => (val ? val : undefined));

const analysisRequestSchema = z.object({
    resume_text: z.string({ required_error: 'Resume text is required' }),
    job_posting: jobPostingSchema,
    model_id: modelIdSchema,
});

const analysisFileFieldsSchema = z.object({
    job_posting: jobPostingSchema,
    model_id: modelIdSchema,
});

const pricingValueSchema = z.union([z.string(), z.number()])
    .nullish()
    .transform((val) => (val === null || val === undefined ? null : String(val)));

const upstreamPricingSchema = z.object({
    prompt: pricingValueSchema,
    completion: pricingValueSchema,
    request: pricingValueSchema,
    image: pricingValueSchema,
    web_search: pricingValueSchema,
    internal_reasoning: pricingValueSchema,
    input_cache_read: pricingValueSchema,
    input_cache_write: pricingValueSchema,
});

const upstreamModelSchema = z.object({
    id: z.string(),
    name: z.string().nullish(),
    description: z.string().nullish(),
    context_length: z.number().nullish(),
    pricing: upstreamPricingSchema.nullish(),
});

const upstreamModelListSchema = z.object({
    data: z.array(upstreamModelSchema).nullish(),
});

const chatCompletionSchema = z.object({
    model: z.string().nullish(),
    choices: z.array(
        z.object({
            message: z.object({
                content: z.string().nullish(),
            }).nullish(),
        })
    ).nullish(),
});

export type UpstreamModel = z.infer<typeof upstreamModelSchema>;
export type UpstreamModelList = z.infer<typeof upstreamModelListSchema>;
export type ChatCompletion = z.infer<typeof chatCompletionSchema>;
export type AnalysisFileFields = z.infer<typeof analysisFileFieldsSchema>;

export function validateAnalysisRequest(payload: unknown): AnalysisRequest {
    return analysisRequestSchema.parse(payload);
}

export function validateAnalysisFileFields(payload: unknown): AnalysisFileFields {
    return analysisFileFieldsSchema.parse(payload);
}

export function validateModelList(payload: unknown): UpstreamModelList {
    return upstreamModelListSchema.parse(payload);
}

export function validateChatCompletion(payload: unknown): ChatCompletion {
    return chatCompletionSchema.parse(payload);
}

export function formatValidationErrors(error: z.ZodError): string[] {
    return error.issues.map((issue: z.ZodIssue) => `${issue.path.join('.')}: ${issue.message}`);
}
