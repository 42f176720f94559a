/**
 * Cost-aware TTL policy for cached provider responses.
 *
 * TTL = baseTtl × contentFactor × costFactor × clamp(confidence, 0.5, 1.5)
 */

export type ContentType = 'critical' | 'standard' | 'static' | 'temporary';

export type CostTier = 'low' | 'medium' | 'high' | 'very_high';

export const CONTENT_TYPE_FACTORS: Record<ContentType, number> = {
    critical: 0.5,
    standard: 1.0,
    static: 7.0,
    temporary: 0.25
};

export const COST_TIER_FACTORS: Record<CostTier, number> = {
    low: 0.8,
    medium: 1.0,
    high: 1.5,
    very_high: 2.0
};

export const PROVIDER_COST_TIERS: Record<string, Record<string, CostTier>> = {
    openai: {
        'gpt-3.5-turbo': 'low',
        'gpt-4': 'high',
        'gpt-4-turbo': 'high',
        'gpt-4o': 'high',
        'gpt-4o-mini': 'medium'
    },
    anthropic: {
        'claude-instant': 'medium',
        'claude-2': 'high',
        'claude-3-opus': 'very_high',
        'claude-3-sonnet': 'high',
        'claude-3-haiku': 'medium',
        'claude-3-5-sonnet': 'high',
        'claude-3-5-haiku': 'medium'
    },
    mistral: {
        'mistral-tiny': 'low',
        'mistral-small': 'medium',
        'mistral-medium': 'medium',
        'mistral-large': 'high',
        'mistral-7b-instruct': 'low',
        'mixtral-8x7b-instruct': 'medium'
    },
    deepseek: {
        'deepseek-coder': 'medium',
        'deepseek-chat': 'medium',
        'deepseek-v2': 'medium'
    }
};

export const DEFAULT_RESPONSE_TTL_SECONDS = 86400;

/**
 * Unknown providers and models are priced as medium.
 */
export function getCostTier(provider: string, model: string): CostTier {
    const models = PROVIDER_COST_TIERS[provider.toLowerCase()];
    return models?.[model.toLowerCase()] ?? 'medium';
}

export function clampConfidence(confidence: number): number {
    return Math.max(0.5, Math.min(1.5, confidence));
}

export interface TtlInput {
    provider: string;
    model: string;
    contentType?: ContentType;
    confidence?: number;
}

export function calculateTtl(baseTtlSeconds: number, input: TtlInput): number {
    const contentFactor = CONTENT_TYPE_FACTORS[input.contentType ?? 'standard'];
    const costFactor = COST_TIER_FACTORS[getCostTier(input.provider, input.model)];
    const confidenceFactor = clampConfidence(input.confidence ?? 1.0);

    return Math.max(1, Math.floor(baseTtlSeconds * contentFactor * costFactor * confidenceFactor));
}
