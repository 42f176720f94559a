import dotenv from 'dotenv';
import { DEFAULT_SUPPORTED_LANGUAGES } from '../domain/entities/Language';

// Load environment variables
dotenv.config();

export type MetricsBackend = 'console' | 'prometheus' | 'none';

const METRICS_BACKENDS: readonly MetricsBackend[] = ['console', 'prometheus', 'none'];

/**
 * Application configuration loaded from environment variables.
 */
export interface Config {
    environment: string;

    // Redis (in-memory store when unset)
    redisUrl?: string;

    // Response cache
    cacheDefaultTtlSeconds: number;
    cacheCompressionThresholdBytes: number;

    // Field mapping cache
    fieldConfigCacheTtlSeconds: number;
    fieldExtractionCacheTtlSeconds: number;
    fieldValidationCacheTtlSeconds: number;
    maxExtractionContentSize: number;

    // Relationships
    relationshipMaxDepth: number;
    relationshipAnalysisMaxDepth: number;

    // Text sent to providers
    maxTextLength: number;
    maxContextLength: number;
    supportedLanguages: string[];
    rtlDisplayOptions: boolean;

    metricsBackend: MetricsBackend;
}

function getEnvVar(key: string, defaultValue?: string): string {
    let value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }

    // Trim whitespace and remove wrapping quotes
    value = value.trim();
    if (value.startsWith('"') && value.endsWith('"')) {
        value = value.substring(1, value.length - 1);
    } else if (value.startsWith("'") && value.endsWith("'")) {
        value = value.substring(1, value.length - 1);
    }

    return value;
}

function getOptionalEnvVar(key: string): string | undefined {
    const value = getEnvVar(key, '');
    return value === '' ? undefined : value;
}

function getEnvVarNumber(key: string, defaultValue?: number): number {
    const value = getEnvVar(key, defaultValue?.toString());
    const parsed = parseFloat(value);
    if (isNaN(parsed)) {
        throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
    }
    return parsed;
}

function getEnvVarList(key: string, defaultValue: readonly string[]): string[] {
    const value = getOptionalEnvVar(key);
    if (value === undefined) return [...defaultValue];
    return value.split(',').map(item => item.trim().toLowerCase()).filter(Boolean);
}

function isMetricsBackend(value: string): value is MetricsBackend {
    return METRICS_BACKENDS.some(backend => backend === value);
}

function getMetricsBackend(): MetricsBackend {
    const value = getEnvVar('METRICS_BACKEND', 'console').toLowerCase();
    if (!isMetricsBackend(value)) {
        throw new Error(`METRICS_BACKEND must be one of ${METRICS_BACKENDS.join(', ')}, got: ${value}`);
    }
    return value;
}

/**
 * Loads configuration from environment variables.
 */
export function loadConfig(): Config {
    return {
        environment: getEnvVar('NODE_ENV', 'development'),

        redisUrl: getOptionalEnvVar('REDIS_URL'),

        cacheDefaultTtlSeconds: getEnvVarNumber('CACHE_DEFAULT_TTL_SECONDS', 86400),
        cacheCompressionThresholdBytes: getEnvVarNumber('CACHE_COMPRESSION_THRESHOLD_BYTES', 1000),

        fieldConfigCacheTtlSeconds: getEnvVarNumber('FIELD_CONFIG_CACHE_TTL_SECONDS', 1800),
        fieldExtractionCacheTtlSeconds: getEnvVarNumber('FIELD_EXTRACTION_CACHE_TTL_SECONDS', 600),
        fieldValidationCacheTtlSeconds: getEnvVarNumber('FIELD_VALIDATION_CACHE_TTL_SECONDS', 3600),
        maxExtractionContentSize: getEnvVarNumber('MAX_EXTRACTION_CONTENT_SIZE', 50000),

        relationshipMaxDepth: getEnvVarNumber('RELATIONSHIP_MAX_DEPTH', 3),
        relationshipAnalysisMaxDepth: getEnvVarNumber('RELATIONSHIP_ANALYSIS_MAX_DEPTH', 5),

        maxTextLength: getEnvVarNumber('MAX_TEXT_LENGTH', 2000),
        maxContextLength: getEnvVarNumber('MAX_CONTEXT_LENGTH', 500),
        supportedLanguages: getEnvVarList('SUPPORTED_LANGUAGES', DEFAULT_SUPPORTED_LANGUAGES),
        rtlDisplayOptions: getEnvVar('RTL_DISPLAY_OPTIONS', 'false').toLowerCase() === 'true',

        metricsBackend: getMetricsBackend()
    };
}

/**
 * Returns the list of problems with a loaded config; empty when usable.
 */
export function validateConfig(config: Config): string[] {
    const errors: string[] = [];

    const positive: Array<[string, number]> = [
        ['CACHE_DEFAULT_TTL_SECONDS', config.cacheDefaultTtlSeconds],
        ['CACHE_COMPRESSION_THRESHOLD_BYTES', config.cacheCompressionThresholdBytes],
        ['FIELD_CONFIG_CACHE_TTL_SECONDS', config.fieldConfigCacheTtlSeconds],
        ['FIELD_EXTRACTION_CACHE_TTL_SECONDS', config.fieldExtractionCacheTtlSeconds],
        ['FIELD_VALIDATION_CACHE_TTL_SECONDS', config.fieldValidationCacheTtlSeconds],
        ['MAX_EXTRACTION_CONTENT_SIZE', config.maxExtractionContentSize],
        ['MAX_TEXT_LENGTH', config.maxTextLength],
        ['MAX_CONTEXT_LENGTH', config.maxContextLength]
    ];
    for (const [name, value] of positive) {
        if (value <= 0) {
            errors.push(`${name} must be greater than 0`);
        }
    }

    if (!Number.isInteger(config.relationshipMaxDepth) || config.relationshipMaxDepth < 1) {
        errors.push('RELATIONSHIP_MAX_DEPTH must be a positive integer');
    }
    if (!Number.isInteger(config.relationshipAnalysisMaxDepth) || config.relationshipAnalysisMaxDepth < 1) {
        errors.push('RELATIONSHIP_ANALYSIS_MAX_DEPTH must be a positive integer');
    }
    if (config.supportedLanguages.length === 0) {
        errors.push('SUPPORTED_LANGUAGES must name at least one language');
    }

    return errors;
}

// Singleton config instance (lazy loaded)
let cachedConfig: Config | null = null;

export function getConfig(): Config {
    if (!cachedConfig) {
        cachedConfig = loadConfig();
    }
    return cachedConfig;
}

export function resetConfig(): void {
    cachedConfig = null;
}
