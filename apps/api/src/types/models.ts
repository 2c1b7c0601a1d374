export const PRICING_FIELDS = [
    'prompt',
    'completion',
    'request',
    'image',
    'web_search',
    'internal_reasoning',
    'input_cache_read',
    'input_cache_write',
] as const;

export type PricingField = (typeof PRICING_FIELDS)[number];

export type ModelPricing = Record<PricingField, string | null>;

export interface ModelInfo {
    id: string;
    name: string | null;
    description: string | null;
    context_length: number | null;
    pricing: ModelPricing;
    is_free: boolean;
}
