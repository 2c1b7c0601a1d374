import { z } from 'zod';

export const DEFAULT_OPENROUTER_BASE = 'https://openrouter.ai/api/v1';
export const MODELS_TIMEOUT_MS = 30_000;
export const ANALYSIS_TIMEOUT_MS = 60_000;

const envSchema = z.object({
    PORT: z.coerce.number().int().positive().default(8000),
    OPENROUTER_API_KEY: z.string().default(''),
    OPENROUTER_BASE_URL: z.string().url().default(DEFAULT_OPENROUTER_BASE),
    NODE_ENV: z.string().default('development'),
});

export interface OpenRouterConfig {
    apiKey: string;
    baseUrl: string;
    modelsTimeoutMs: number;
    analysisTimeoutMs: number;
}

export interface AppConfig {
    port: number;
    environment: string;
    openRouter: OpenRouterConfig;
}

/**
 * Build the app configuration from environment variables.
 * A missing API key is allowed; the upstream rejects the first call instead.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = envSchema.parse(env);
    return {
        port: parsed.PORT,
        environment: parsed.NODE_ENV,
        openRouter: {
            apiKey: parsed.OPENROUTER_API_KEY,
            baseUrl: parsed.OPENROUTER_BASE_URL.replace(/\/+$/, ''),
            modelsTimeoutMs: MODELS_TIMEOUT_MS,
            analysisTimeoutMs: ANALYSIS_TIMEOUT_MS,
        },
    };
}
