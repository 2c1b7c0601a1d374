/**
 * OpenRouter transport - the only code that talks to the upstream provider.
 *
 * Failures come out as UpstreamError subclasses:
 * - UpstreamStatusError: non-2xx status
 * - UpstreamNetworkError / TimeoutError: the request never completed
 * - ParseError / MALFORMED_RESPONSE: a 2xx body we could not read
 */

import type { OpenRouterConfig } from '../config';
import {
    ParseError,
    TimeoutError,
    UpstreamError,
    UpstreamNetworkError,
    UpstreamStatusError,
} from '../utils/errors';
import { logUpstreamCall } from '../utils/logger';
import { type ChatCompletion, validateChatCompletion } from '../utils/validators';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export const SYSTEM_PROMPT = 'You are a helpful resume analysis AI.';
export const ANALYSIS_TEMPERATURE = 0.3;

export interface CompletionRequest {
    prompt: string;
    modelId?: string;
}

export interface CompletionReply {
    content: string;
    model: string | null;
}

/** Narrow seam the analysis service depends on. */
export interface CompletionTransport {
    complete(request: CompletionRequest): Promise<CompletionReply>;
}

export interface ModelListSource {
    fetchModels(): Promise<unknown>;
}

interface ChatMessage {
    role: 'system' | 'user';
    content: string;
}

interface ChatRequestBody {
    messages: ChatMessage[];
    temperature: number;
    model?: string;
}

interface SendOptions {
    method: 'GET' | 'POST';
    body?: string;
    timeoutMs: number;
    meta?: Record<string, unknown>;
}

interface RawResponse {
    status: number;
    body: string;
}

function isTimeout(error: unknown): boolean {
    return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

function describeNetworkError(error: unknown): string {
    if (error instanceof Error) {
        const cause = error.cause instanceof Error ? ` (${error.cause.message})` : '';
        return `${error.message}${cause}`;
    }
    return String(error);
}

export class OpenRouterClient implements CompletionTransport, ModelListSource {
    private readonly config: OpenRouterConfig;
    private readonly fetchImpl: FetchLike;

    constructor(config: OpenRouterConfig, fetchImpl: FetchLike = (input, init) => fetch(input, init)) {
        this.config = config;
        this.fetchImpl = fetchImpl;
    }

    async fetchModels(): Promise<unknown> {
        const { body, status } = await this.send('models', '/models', {
            method: 'GET',
            timeoutMs: this.config.modelsTimeoutMs,
        });
        try {
            return JSON.parse(body);
        } catch {
            throw new UpstreamError('Model list response was not valid JSON', 'MALFORMED_RESPONSE', status, false);
        }
    }

    async complete(request: CompletionRequest): Promise<CompletionReply> {
        const payload: ChatRequestBody = {
            messages: [
                { role: 'system', content: SYSTEM_PROMPT },
                { role: 'user', content: request.prompt },
            ],
            temperature: ANALYSIS_TEMPERATURE,
        };
        // Without a model the provider picks its account default
        if (request.modelId) {
            payload.model = request.modelId;
        }

        const { body } = await this.send('chat/completions', '/chat/completions', {
            method: 'POST',
            body: JSON.stringify(payload),
            timeoutMs: this.config.analysisTimeoutMs,
            meta: { model: request.modelId ?? 'default', promptLength: request.prompt.length },
        });

        let completion: ChatCompletion;
        try {
            completion = validateChatCompletion(JSON.parse(body));
        } catch {
            throw new ParseError('Upstream returned an unreadable chat completion', body);
        }

        return {
            content: completion.choices?.[0]?.message?.content ?? '',
            model: completion.model ?? null,
        };
    }

    private async send(operation: string, path: string, options: SendOptions): Promise<RawResponse> {
        const { timeoutMs, meta = {} } = options;
        const headers: Record<string, string> = {
            'Authorization': `Bearer ${this.config.apiKey}`,
        };
        if (options.body !== undefined) {
            headers['Content-Type'] = 'application/json';
        }
        const startTime = Date.now();
        logUpstreamCall(operation, 'start', meta);

        let status: number;
        let ok: boolean;
        let body: string;
        try {
            const response = await this.fetchImpl(`${this.config.baseUrl}${path}`, {
                method: options.method,
                headers,
                body: options.body,
                signal: AbortSignal.timeout(timeoutMs),
            });
            status = response.status;
            ok = response.ok;
            body = await response.text();
        } catch (error) {
            const failure = isTimeout(error)
                ? new TimeoutError(timeoutMs)
                : new UpstreamNetworkError(describeNetworkError(error));
            logUpstreamCall(operation, 'error', {
                ...meta,
                code: failure.code,
                message: failure.message,
                durationMs: Date.now() - startTime,
            });
            throw failure;
        }

        if (!ok) {
            logUpstreamCall(operation, 'error', {
                ...meta,
                statusCode: status,
                error: body.substring(0, 200),
                durationMs: Date.now() - startTime,
            });
            throw new UpstreamStatusError(status, body);
        }

        logUpstreamCall(operation, 'success', { ...meta, statusCode: status, durationMs: Date.now() - startTime });
        return { status, body };
    }
}
