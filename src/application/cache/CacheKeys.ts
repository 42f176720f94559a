/**
 * Cache key layout. Hashes only shorten keys; they are not security
 * primitives.
 */

import { ContentValue } from '../../domain/entities/ContentValue';
import { canonicalJson, digest } from '../../domain/services/Hashing';

export const CACHE_VERSION = 1;

export type HitOrMiss = 'hits' | 'misses';

export interface ResponseKeyParts {
    provider: string;
    model: string;
    sourceLang: string;
    targetLang: string;
    text: string;
    context?: string;
    collection?: string;
}

export interface ResponseKeyFilter {
    provider?: string;
    model?: string;
    language?: string;
    collection?: string;
}

const RESPONSE_PREFIX = `ai_response:v${CACHE_VERSION}`;

export function responseKey(parts: ResponseKeyParts): string {
    const contentHash = digest(`${parts.sourceLang}:${parts.targetLang}:${parts.context ?? ''}:${parts.text}`);
    const base = `${RESPONSE_PREFIX}:${parts.provider}:${parts.model}:${parts.targetLang}:${contentHash}`;
    return parts.collection ? `${base}:collection:${parts.collection}` : base;
}

/**
 * Glob over response keys; omitted parts match anything.
 */
export function responseKeyPattern(filter: ResponseKeyFilter = {}): string {
    const base = [
        RESPONSE_PREFIX,
        filter.provider ?? '*',
        filter.model ?? '*',
        filter.language ?? '*',
        '*'
    ].join(':');
    return filter.collection ? `${base}:collection:${filter.collection}` : base;
}

export function allResponseKeysPattern(): string {
    return `${RESPONSE_PREFIX}:*`;
}

export function responseStatsKey(provider: string, model: string, kind: HitOrMiss): string {
    return `cache_stats:${provider}:${model}:${kind}`;
}

export function responseStatsPattern(provider?: string, model?: string): string {
    return `cache_stats:${provider ?? '*'}:${model ?? '*'}:*`;
}

export function fieldConfigKey(clientId: string, collectionName: string): string {
    return `field_config:v${CACHE_VERSION}:${clientId}:${collectionName}`;
}

export function fieldExtractionKey(configHash: string, content: ContentValue, language?: string): string {
    const contentHash = digest(canonicalJson(content));
    const suffix = language ? `:${language}` : '';
    return `field_extraction:v${CACHE_VERSION}:${configHash}:${contentHash}${suffix}`;
}

export function fieldExtractionPattern(configHash?: string): string {
    return `field_extraction:v${CACHE_VERSION}:${configHash ?? '*'}:*`;
}

/**
 * A validation report depends on both the paths and the sample content.
 */
export function fieldValidationKey(clientId: string, collectionName: string, paths: string[], content: ContentValue): string {
    const hash = digest(canonicalJson({ paths, content }));
    return `field_validation:v${CACHE_VERSION}:${clientId}:${collectionName}:${hash}`;
}

export function fieldValidationPattern(clientId: string, collectionName?: string): string {
    return `field_validation:v${CACHE_VERSION}:${clientId}:${collectionName ?? '*'}:*`;
}

export type FieldCacheKind = 'config' | 'extraction' | 'validation';

export function fieldCacheStatsKey(kind: FieldCacheKind, outcome: HitOrMiss): string {
    return `field_cache_stats:${kind}:${outcome}`;
}
