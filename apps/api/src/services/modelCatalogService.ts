/**
 * Model Catalog Service - reshapes the upstream model list and flags free models
 */

import { ZodError } from 'zod';
import { type ModelInfo, type ModelPricing, PRICING_FIELDS } from '../types/models';
import { UpstreamError } from '../utils/errors';
import { formatValidationErrors, type UpstreamModel, validateModelList } from '../utils/validators';
import type { ModelListSource } from './openRouterClient';

// Only these literals count as a zero price; "0.00" or "free" do not.
const FREE_PRICE_VALUES = new Set(['0', '0.0']);

/**
 * A model is free when no pricing dimension carries a non-zero price.
 */
export function isFreePricing(pricing: ModelPricing): boolean {
    return PRICING_FIELDS.every((field) => {
        const value = pricing[field];
        return value === null || FREE_PRICE_VALUES.has(value);
    });
}

export function toModelInfo(model: UpstreamModel): ModelInfo {
    const source = model.pricing;
    const pricing: ModelPricing = {
        prompt: source?.prompt ?? null,
        completion: source?.completion ?? null,
        request: source?.request ?? null,
        image: source?.image ?? null,
        web_search: source?.web_search ?? null,
        internal_reasoning: source?.internal_reasoning ?? null,
        input_cache_read: source?.input_cache_read ?? null,
        input_cache_write: source?.input_cache_write ?? null,
    };

    return {
        id: model.id,
        name: model.name ?? null,
        description: model.description ?? null,
        context_length: model.context_length ?? null,
        pricing,
        is_free: isFreePricing(pricing),
    };
}

export class ModelCatalogService {
    private readonly source: ModelListSource;

    constructor(source: ModelListSource) {
        this.source = source;
    }

    /**
     * Fetch every model the provider offers. No filtering, sorting or caching.
     */
    async listModels(): Promise<ModelInfo[]> {
        const payload = await this.source.fetchModels();

        let models: UpstreamModel[];
        try {
            models = validateModelList(payload).data ?? [];
        } catch (error) {
            if (error instanceof ZodError) {
                throw new UpstreamError(
                    `Model list has unexpected shape: ${formatValidationErrors(error).join('; ')}`,
                    'MALFORMED_RESPONSE',
                    undefined,
                    false
                );
            }
            throw error;
        }

        return models.map(toModelInfo);
    }
}
