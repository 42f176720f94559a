/**
 * Response Cache
 *
 * Content-addressed cache of provider responses. Entries live in an
 * IKeyValueStore with a cost-aware TTL; large values are deflated.
 * Every store failure is logged and treated as a miss or no-op.
 */

import zlib from 'zlib';
import { IKeyValueStore } from '../../domain/ports/IKeyValueStore';
import { IMetricsPort, METRICS } from '../../domain/ports/IMetricsPort';
import {
    allResponseKeysPattern,
    HitOrMiss,
    ResponseKeyFilter,
    responseKey,
    ResponseKeyParts,
    responseKeyPattern,
    responseStatsKey,
    responseStatsPattern
} from './CacheKeys';
import { calculateTtl, ContentType, DEFAULT_RESPONSE_TTL_SECONDS } from './CachePolicy';

export const DEFAULT_COMPRESSION_THRESHOLD_BYTES = 1000;
const COMPRESSION_LEVEL = 6;
const ZLIB_HEADER_BYTE = 0x78;

export interface ResponseCacheOptions {
    defaultTtlSeconds?: number;
    compressionThresholdBytes?: number;
    metrics?: IMetricsPort;
}

export interface CacheWriteOptions {
    contentType?: ContentType;
    confidence?: number;
}

export interface WarmItem extends ResponseKeyParts, CacheWriteOptions {
    response: string;
}

export interface HitStats {
    hits: number;
    misses: number;
    totalRequests: number;
    hitRate: number;
}

export interface ProviderHitStats extends HitStats {
    models: Record<string, HitStats>;
}

export interface ResponseCacheStats {
    providers: Record<string, ProviderHitStats>;
    overall: HitStats;
}

export function encodeCacheValue(value: string, thresholdBytes: number): Buffer | string {
    if (Buffer.byteLength(value, 'utf8') > thresholdBytes) {
        return zlib.deflateSync(Buffer.from(value, 'utf8'), { level: COMPRESSION_LEVEL });
    }
    return value;
}

/**
 * Inflates deflated entries; anything that does not inflate is raw UTF-8.
 */
export function decodeCacheValue(stored: Buffer): string {
    const inflated = stored[0] === ZLIB_HEADER_BYTE ? tryInflate(stored) : null;
    return inflated ?? stored.toString('utf8');
}

function tryInflate(stored: Buffer): string | null {
    try {
        return zlib.inflateSync(stored).toString('utf8');
    } catch {
        return null;
    }
}

function hitStats(hits: number, misses: number): HitStats {
    const totalRequests = hits + misses;
    const hitRate = totalRequests > 0 ? Math.round((hits / totalRequests) * 1000) / 1000 : 0;
    return { hits, misses, totalRequests, hitRate };
}

export class ResponseCache {
    private readonly defaultTtlSeconds: number;
    private readonly compressionThresholdBytes: number;
    private readonly metrics?: IMetricsPort;

    constructor(private readonly store: IKeyValueStore, options: ResponseCacheOptions = {}) {
        this.defaultTtlSeconds = options.defaultTtlSeconds ?? DEFAULT_RESPONSE_TTL_SECONDS;
        this.compressionThresholdBytes = options.compressionThresholdBytes ?? DEFAULT_COMPRESSION_THRESHOLD_BYTES;
        this.metrics = options.metrics;
    }

    private reportFailure(operation: string, error: unknown): void {
        console.error(`[ResponseCache] ${operation} failed:`, error);
        this.metrics?.incrementCounter(METRICS.CACHE_ERRORS, { operation });
    }

    private async countRequest(parts: ResponseKeyParts, kind: HitOrMiss): Promise<void> {
        await this.store.incr(responseStatsKey(parts.provider, parts.model, kind));
        this.metrics?.incrementCounter(kind === 'hits' ? METRICS.CACHE_HITS : METRICS.CACHE_MISSES, {
            provider: parts.provider,
            model: parts.model
        });
    }

    private async read(parts: ResponseKeyParts): Promise<string | null> {
        const stored = await this.store.get(responseKey(parts));
        return stored ? decodeCacheValue(stored) : null;
    }

    /**
     * Cached response for the request, or null. Counts a hit or a miss.
     */
    async get(parts: ResponseKeyParts): Promise<string | null> {
        try {
            const value = await this.read(parts);
            await this.countRequest(parts, value === null ? 'misses' : 'hits');
            return value;
        } catch (error) {
            this.reportFailure('get', error);
            return null;
        }
    }

    /**
     * @returns false when the store rejected the write
     */
    async set(parts: ResponseKeyParts, response: string, options: CacheWriteOptions = {}): Promise<boolean> {
        try {
            const ttl = this.ttlFor(parts, options);
            await this.store.set(responseKey(parts), encodeCacheValue(response, this.compressionThresholdBytes), ttl);
            return true;
        } catch (error) {
            this.reportFailure('set', error);
            return false;
        }
    }

    ttlFor(parts: Pick<ResponseKeyParts, 'provider' | 'model'>, options: CacheWriteOptions = {}): number {
        return calculateTtl(this.defaultTtlSeconds, {
            provider: parts.provider,
            model: parts.model,
            contentType: options.contentType,
            confidence: options.confidence
        });
    }

    /**
     * Removes the single entry of one request.
     */
    async invalidateKey(parts: ResponseKeyParts): Promise<number> {
        try {
            return await this.store.delete(responseKey(parts));
        } catch (error) {
            this.reportFailure('invalidateKey', error);
            return 0;
        }
    }

    /**
     * Removes every entry matching the filter; an empty filter removes all responses.
     */
    async invalidate(filter: ResponseKeyFilter = {}): Promise<number> {
        const pattern = responseKeyPattern(filter);
        try {
            const deleted = await this.store.deleteMatching(pattern);
            console.log(`[ResponseCache] Invalidated ${deleted} entries matching ${pattern}`);
            return deleted;
        } catch (error) {
            this.reportFailure('invalidate', error);
            return 0;
        }
    }

    /**
     * Removes all responses and hit/miss counters.
     */
    async flush(): Promise<number> {
        try {
            const deleted = await this.store.deleteMatching(allResponseKeysPattern())
                + await this.store.deleteMatching(responseStatsPattern());
            console.warn(`[ResponseCache] Flushed ${deleted} keys`);
            return deleted;
        } catch (error) {
            this.reportFailure('flush', error);
            return 0;
        }
    }

    /**
     * Stores responses that are not cached yet.
     * @returns Number of entries written
     */
    async warm(items: WarmItem[]): Promise<number> {
        let warmed = 0;
        for (const item of items) {
            try {
                if (await this.read(item) !== null) continue;
                if (await this.set(item, item.response, item)) warmed++;
            } catch (error) {
                this.reportFailure('warm', error);
            }
        }
        console.log(`[ResponseCache] Warmed ${warmed} of ${items.length} entries`);
        return warmed;
    }

    async getStats(provider?: string, model?: string): Promise<ResponseCacheStats> {
        const stats: ResponseCacheStats = { providers: {}, overall: hitStats(0, 0) };

        try {
            const counters = new Map<string, { providerName: string; modelName: string; hits: number; misses: number }>();
            for (const key of await this.store.keys(responseStatsPattern(provider, model))) {
                const parsed = parseStatsKey(key);
                if (!parsed) continue;

                const id = `${parsed.providerName}\u0000${parsed.modelName}`;
                const entry = counters.get(id) ?? { providerName: parsed.providerName, modelName: parsed.modelName, hits: 0, misses: 0 };
                entry[parsed.kind] = await this.readCounter(key);
                counters.set(id, entry);
            }

            let totalHits = 0;
            let totalMisses = 0;
            for (const [, counts] of [...counters.entries()].sort(([a], [b]) => a.localeCompare(b))) {
                const { providerName, modelName } = counts;
                const providerStats = stats.providers[providerName] ?? { ...hitStats(0, 0), models: {} };
                providerStats.models[modelName] = hitStats(counts.hits, counts.misses);
                stats.providers[providerName] = {
                    ...hitStats(providerStats.hits + counts.hits, providerStats.misses + counts.misses),
                    models: providerStats.models
                };
                totalHits += counts.hits;
                totalMisses += counts.misses;
            }
            stats.overall = hitStats(totalHits, totalMisses);
        } catch (error) {
            this.reportFailure('getStats', error);
        }

        return stats;
    }

    private async readCounter(key: string): Promise<number> {
        const stored = await this.store.get(key);
        const value = stored ? Number.parseInt(stored.toString('utf8'), 10) : 0;
        return Number.isNaN(value) ? 0 : value;
    }
}

/**
 * `cache_stats:{provider}:{model}:{kind}`; the model may itself contain
 * colons (`llama3:8b`), so provider and kind are read from the ends.
 */
function parseStatsKey(key: string): { providerName: string; modelName: string; kind: 'hits' | 'misses' } | null {
    const parts = key.split(':');
    if (parts.length < 4) return null;

    const providerName = parts[1];
    const modelName = parts.slice(2, -1).join(':');
    const kind = parts[parts.length - 1];
    if (!providerName || !modelName || (kind !== 'hits' && kind !== 'misses')) return null;
    return { providerName, modelName, kind };
}
