/**
 * Field Mapping Cache
 *
 * Caches field mapping configs, extraction results and path validation
 * reports. Stored entries are JSON and are validated on the way out; an
 * entry that fails validation counts as a miss.
 */

import Ajv from 'ajv';
import { ContentMap } from '../../domain/entities/ContentValue';
import { computeConfigHash, ExtractionResult, FieldMappingConfig } from '../../domain/entities/FieldMapping';
import { IKeyValueStore } from '../../domain/ports/IKeyValueStore';
import { parseFieldMappingConfig } from '../../domain/services/FieldMappingConfigParser';
import { PathValidationReport } from '../../domain/services/FieldExtractor';
import {
    CACHE_VERSION,
    FieldCacheKind,
    fieldCacheStatsKey,
    fieldConfigKey,
    fieldExtractionKey,
    fieldExtractionPattern,
    fieldValidationKey,
    fieldValidationPattern,
    HitOrMiss
} from './CacheKeys';

export interface FieldMappingCacheOptions {
    configTtlSeconds?: number;
    extractionTtlSeconds?: number;
    validationTtlSeconds?: number;
    /** Extractions of content whose JSON is longer than this are not cached. */
    maxContentSize?: number;
}

interface StoredConfig {
    config: unknown;
    configHash: string;
    storedAt: number;
    version: number;
}

interface StoredExtraction {
    result: ExtractionResult;
    configHash: string;
    storedAt: number;
    language: string | null;
}

interface StoredValidation {
    result: PathValidationReport;
    storedAt: number;
}

export interface FieldCacheStats {
    configs: { hits: number; misses: number };
    extractions: { hits: number; misses: number };
    validations: { hits: number; misses: number };
}

const ajv = new Ajv({ allowUnionTypes: true });

const isStoredConfig = ajv.compile<StoredConfig>({
    type: 'object',
    required: ['config', 'configHash', 'storedAt', 'version'],
    properties: {
        config: { type: 'object' },
        configHash: { type: 'string' },
        storedAt: { type: 'number' },
        version: { type: 'number' }
    }
});

const isStoredExtraction = ajv.compile<StoredExtraction>({
    type: 'object',
    required: ['result', 'configHash', 'storedAt'],
    properties: {
        result: {
            type: 'object',
            required: ['fields'],
            properties: {
                fields: {
                    type: 'object',
                    additionalProperties: {
                        type: 'object',
                        required: ['path', 'type', 'metadata'],
                        properties: {
                            path: { type: 'string' },
                            type: { type: 'string' },
                            metadata: { type: 'object' },
                            batchIndex: { type: 'integer' }
                        }
                    }
                },
                batch: {
                    type: 'object',
                    required: ['texts', 'mapping'],
                    properties: {
                        texts: { type: 'array', items: { type: 'string' } },
                        mapping: { type: 'object' }
                    }
                }
            }
        },
        configHash: { type: 'string' },
        storedAt: { type: 'number' },
        language: { type: ['string', 'null'] }
    }
});

const isStoredValidation = ajv.compile<StoredValidation>({
    type: 'object',
    required: ['result', 'storedAt'],
    properties: {
        result: {
            type: 'object',
            required: ['results', 'totalValid', 'totalTested'],
            properties: {
                results: { type: 'object' },
                totalValid: { type: 'integer' },
                totalTested: { type: 'integer' }
            }
        },
        storedAt: { type: 'number' }
    }
});

function parseStored(bytes: Buffer): unknown {
    return JSON.parse(bytes.toString('utf8'));
}

export class FieldMappingCache {
    private readonly configTtlSeconds: number;
    private readonly extractionTtlSeconds: number;
    private readonly validationTtlSeconds: number;
    private readonly maxContentSize: number;

    constructor(private readonly store: IKeyValueStore, options: FieldMappingCacheOptions = {}) {
        this.configTtlSeconds = options.configTtlSeconds ?? 1800;
        this.extractionTtlSeconds = options.extractionTtlSeconds ?? 600;
        this.validationTtlSeconds = options.validationTtlSeconds ?? 3600;
        this.maxContentSize = options.maxContentSize ?? 50000;
    }

    private async count(kind: FieldCacheKind, outcome: HitOrMiss): Promise<void> {
        await this.store.incr(fieldCacheStatsKey(kind, outcome));
    }

    private isTooLarge(content: ContentMap): boolean {
        return JSON.stringify(content).length > this.maxContentSize;
    }

    private async readJson(key: string): Promise<unknown> {
        const bytes = await this.store.get(key);
        return bytes ? parseStored(bytes) : null;
    }

    async getConfig(clientId: string, collectionName: string): Promise<FieldMappingConfig | null> {
        try {
            const stored = await this.readJson(fieldConfigKey(clientId, collectionName));
            if (!isStoredConfig(stored)) {
                await this.count('config', 'misses');
                return null;
            }
            const config = parseFieldMappingConfig(stored.config);
            await this.count('config', 'hits');
            return config;
        } catch (error) {
            console.error(`[FieldMappingCache] Config read failed for ${clientId}:${collectionName}:`, error);
            return null;
        }
    }

    async setConfig(config: FieldMappingConfig): Promise<boolean> {
        try {
            const entry: StoredConfig = {
                config,
                configHash: computeConfigHash(config),
                storedAt: Date.now(),
                version: CACHE_VERSION
            };
            await this.store.set(
                fieldConfigKey(config.clientId, config.collectionName),
                JSON.stringify(entry),
                this.configTtlSeconds
            );
            return true;
        } catch (error) {
            console.error(`[FieldMappingCache] Config write failed for ${config.clientId}:${config.collectionName}:`, error);
            return false;
        }
    }

    /**
     * Cached extraction for this content under this exact config; entries
     * written under another config are ignored.
     */
    async getExtraction(content: ContentMap, config: FieldMappingConfig, language?: string): Promise<ExtractionResult | null> {
        if (this.isTooLarge(content)) return null;

        try {
            const configHash = computeConfigHash(config);
            const stored = await this.readJson(fieldExtractionKey(configHash, content, language));
            if (isStoredExtraction(stored) && stored.configHash === configHash) {
                await this.count('extraction', 'hits');
                return stored.result;
            }
            await this.count('extraction', 'misses');
            return null;
        } catch (error) {
            console.error('[FieldMappingCache] Extraction read failed:', error);
            return null;
        }
    }

    /**
     * @returns false when the content is too large to cache or the write failed
     */
    async setExtraction(
        content: ContentMap,
        config: FieldMappingConfig,
        result: ExtractionResult,
        language?: string
    ): Promise<boolean> {
        if (this.isTooLarge(content)) {
            console.log(`[FieldMappingCache] Skipping extraction cache for large content (over ${this.maxContentSize} chars)`);
            return false;
        }

        try {
            const configHash = computeConfigHash(config);
            const entry: StoredExtraction = {
                result,
                configHash,
                storedAt: Date.now(),
                language: language ?? null
            };
            await this.store.set(fieldExtractionKey(configHash, content, language), JSON.stringify(entry), this.extractionTtlSeconds);
            return true;
        } catch (error) {
            console.error('[FieldMappingCache] Extraction write failed:', error);
            return false;
        }
    }

    async getValidation(
        clientId: string,
        collectionName: string,
        paths: string[],
        content: ContentMap
    ): Promise<PathValidationReport | null> {
        try {
            const stored = await this.readJson(fieldValidationKey(clientId, collectionName, paths, content));
            if (isStoredValidation(stored)) {
                await this.count('validation', 'hits');
                return stored.result;
            }
            await this.count('validation', 'misses');
            return null;
        } catch (error) {
            console.error('[FieldMappingCache] Validation read failed:', error);
            return null;
        }
    }

    async setValidation(
        clientId: string,
        collectionName: string,
        paths: string[],
        content: ContentMap,
        report: PathValidationReport
    ): Promise<boolean> {
        try {
            const entry: StoredValidation = { result: report, storedAt: Date.now() };
            await this.store.set(
                fieldValidationKey(clientId, collectionName, paths, content),
                JSON.stringify(entry),
                this.validationTtlSeconds
            );
            return true;
        } catch (error) {
            console.error('[FieldMappingCache] Validation write failed:', error);
            return false;
        }
    }

    /**
     * Drops cached configs and validation reports of a client, or of one of
     * its collections.
     */
    async invalidateClient(clientId: string, collectionName?: string): Promise<number> {
        try {
            const configPattern = collectionName
                ? fieldConfigKey(clientId, collectionName)
                : fieldConfigKey(clientId, '*');
            const deleted = await this.store.deleteMatching(configPattern)
                + await this.store.deleteMatching(fieldValidationPattern(clientId, collectionName));
            console.log(`[FieldMappingCache] Invalidated ${deleted} entries for client ${clientId}`);
            return deleted;
        } catch (error) {
            console.error(`[FieldMappingCache] Invalidation failed for client ${clientId}:`, error);
            return 0;
        }
    }

    async invalidateExtractions(configHash?: string): Promise<number> {
        try {
            return await this.store.deleteMatching(fieldExtractionPattern(configHash));
        } catch (error) {
            console.error('[FieldMappingCache] Extraction invalidation failed:', error);
            return 0;
        }
    }

    async getStats(): Promise<FieldCacheStats> {
        const read = async (kind: FieldCacheKind, outcome: HitOrMiss): Promise<number> => {
            try {
                const bytes = await this.store.get(fieldCacheStatsKey(kind, outcome));
                const value = bytes ? Number.parseInt(bytes.toString('utf8'), 10) : 0;
                return Number.isNaN(value) ? 0 : value;
            } catch (error) {
                console.error('[FieldMappingCache] Stats read failed:', error);
                return 0;
            }
        };

        return {
            configs: { hits: await read('config', 'hits'), misses: await read('config', 'misses') },
            extractions: { hits: await read('extraction', 'hits'), misses: await read('extraction', 'misses') },
            validations: { hits: await read('validation', 'hits'), misses: await read('validation', 'misses') }
        };
    }
}
