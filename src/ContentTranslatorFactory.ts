import { FieldMappingCache } from './application/cache/FieldMappingCache';
import { ResponseCache } from './application/cache/ResponseCache';
import { FieldMappingService } from './application/FieldMappingService';
import { RelationshipTraversalService } from './application/RelationshipTraversalService';
import { StructuredTranslationService } from './application/StructuredTranslationService';
import { Config, getConfig } from './config';
import { IFieldConfigRepository } from './domain/ports/IFieldConfigRepository';
import { IKeyValueStore } from './domain/ports/IKeyValueStore';
import { IMetricsPort } from './domain/ports/IMetricsPort';
import { IRelationshipCatalog } from './domain/ports/IRelationshipCatalog';
import { ITranslationPort } from './domain/ports/ITranslationPort';
import { FieldExtractor } from './domain/services/FieldExtractor';
import { InMemoryKeyValueStore } from './infrastructure/cache/InMemoryKeyValueStore';
import { RedisKeyValueStore } from './infrastructure/cache/RedisKeyValueStore';
import { ConsoleMetricsAdapter, NoOpMetricsAdapter } from './infrastructure/metrics/ConsoleMetricsAdapter';
import { PrometheusMetricsAdapter } from './infrastructure/metrics/PrometheusMetricsAdapter';
import { InMemoryFieldConfigRepository } from './infrastructure/persistence/InMemoryFieldConfigRepository';
import { StaticRelationshipCatalog } from './infrastructure/persistence/StaticRelationshipCatalog';

/**
 * Adapters supplied by the host. Anything left out gets an in-process default.
 */
export interface ContentTranslatorDependencies {
    translator?: ITranslationPort;
    repository?: IFieldConfigRepository;
    catalog?: IRelationshipCatalog;
    store?: IKeyValueStore;
    metrics?: IMetricsPort;
}

export interface ContentTranslator {
    fieldMapping: FieldMappingService;
    translation: StructuredTranslationService;
    relationships: RelationshipTraversalService;
    responseCache: ResponseCache;
    fieldCache: FieldMappingCache;
    store: IKeyValueStore;
    metrics: IMetricsPort;
    /** Flushes metrics and closes a Redis connection the factory opened. */
    shutdown(): Promise<void>;
}

/**
 * Wires the translation core from configuration.
 */
export function createContentTranslator(
    config: Config = getConfig(),
    deps: ContentTranslatorDependencies = {}
): ContentTranslator {
    const store = deps.store ?? createKeyValueStore(config);
    const metrics = deps.metrics ?? createMetrics(config);

    const responseCache = new ResponseCache(store, {
        defaultTtlSeconds: config.cacheDefaultTtlSeconds,
        compressionThresholdBytes: config.cacheCompressionThresholdBytes,
        metrics
    });

    const fieldCache = new FieldMappingCache(store, {
        configTtlSeconds: config.fieldConfigCacheTtlSeconds,
        extractionTtlSeconds: config.fieldExtractionCacheTtlSeconds,
        validationTtlSeconds: config.fieldValidationCacheTtlSeconds,
        maxContentSize: config.maxExtractionContentSize
    });

    const fieldMapping = new FieldMappingService(
        deps.repository ?? new InMemoryFieldConfigRepository(),
        new FieldExtractor(metrics),
        fieldCache
    );

    const translation = new StructuredTranslationService(fieldMapping, deps.translator, {
        maxTextLength: config.maxTextLength,
        maxContextLength: config.maxContextLength,
        supportedLanguages: config.supportedLanguages,
        rtlDisplayOptions: config.rtlDisplayOptions,
        responseCache,
        metrics
    });

    const relationships = new RelationshipTraversalService(
        translation,
        deps.catalog ?? new StaticRelationshipCatalog([]),
        {
            defaultMaxDepth: config.relationshipMaxDepth,
            analysisMaxDepth: config.relationshipAnalysisMaxDepth,
            metrics
        }
    );

    console.log(`[ContentTranslator] Initialized (${config.environment}, store: ${store.constructor.name}, metrics: ${config.metricsBackend})`);

    const shutdown = async (): Promise<void> => {
        await metrics.flush();
        if (!deps.store && store instanceof RedisKeyValueStore) {
            await store.disconnect();
        }
        console.log('[ContentTranslator] Shut down');
    };

    return { fieldMapping, translation, relationships, responseCache, fieldCache, store, metrics, shutdown };
}

function createKeyValueStore(config: Config): IKeyValueStore {
    if (config.redisUrl) {
        return new RedisKeyValueStore(config.redisUrl);
    }
    return new InMemoryKeyValueStore();
}

function createMetrics(config: Config): IMetricsPort {
    switch (config.metricsBackend) {
        case 'prometheus':
            return new PrometheusMetricsAdapter();
        case 'none':
            return new NoOpMetricsAdapter();
        default:
            return new ConsoleMetricsAdapter({ enabled: config.environment !== 'test' });
    }
}
