export * from './domain/entities/ContentValue';
export * from './domain/entities/FieldMapping';
export * from './domain/entities/FieldTranslation';
export * from './domain/entities/Language';
export * from './domain/entities/Relationship';
export * from './domain/errors/TranslationErrors';
export * from './domain/ports/IFieldConfigRepository';
export * from './domain/ports/IKeyValueStore';
export * from './domain/ports/IMetricsPort';
export * from './domain/ports/IRelationshipCatalog';
export * from './domain/ports/ITranslationPort';
export * from './domain/services/PathResolver';
export * from './domain/services/FieldExtractor';
export * from './domain/services/FieldMappingConfigParser';
export * from './domain/services/ReconstructionEngine';
export * as HtmlTextNodeCodec from './domain/services/HtmlTextNodeCodec';
export * from './domain/services/RtlDisplay';
export { sanitizeText, sanitizeContext, TextSanitizer } from './domain/services/TextSanitizer';

export * from './application/cache/CachePolicy';
export { ResponseCache, ResponseCacheOptions, ResponseCacheStats, WarmItem } from './application/cache/ResponseCache';
export { FieldMappingCache, FieldMappingCacheOptions, FieldCacheStats } from './application/cache/FieldMappingCache';
export { CachedTranslationAdapter } from './application/cache/CachedTranslationAdapter';
export * from './application/FieldMappingService';
export * from './application/StructuredTranslationService';
export * from './application/RelationshipTraversalService';

export { InMemoryKeyValueStore } from './infrastructure/cache/InMemoryKeyValueStore';
export { RedisKeyValueStore } from './infrastructure/cache/RedisKeyValueStore';
export { ConsoleMetricsAdapter, NoOpMetricsAdapter } from './infrastructure/metrics/ConsoleMetricsAdapter';
export { PrometheusMetricsAdapter } from './infrastructure/metrics/PrometheusMetricsAdapter';
export { InMemoryFieldConfigRepository } from './infrastructure/persistence/InMemoryFieldConfigRepository';
export { StaticRelationshipCatalog } from './infrastructure/persistence/StaticRelationshipCatalog';
export { FallbackTranslationAdapter, NoOpTranslationAdapter } from './infrastructure/translation/FallbackTranslationAdapter';
export { MockTranslationAdapter } from './infrastructure/translation/MockTranslationAdapter';

export { Config, loadConfig, validateConfig, getConfig, resetConfig } from './config';
export * from './ContentTranslatorFactory';
