/**
 * Metrics Port Interface
 *
 * Defines the contract for observability and metrics collection.
 * Implementations: Console, Prometheus, NoOp.
 */

export interface MetricTags {
    [key: string]: string | number | boolean;
}

export interface IMetricsPort {
    /**
     * Increment a counter metric.
     * @param name - Metric name (e.g., 'field_mapping.extractions')
     * @param tags - Optional tags for filtering/grouping
     * @param value - Increment amount (default: 1)
     */
    incrementCounter(name: string, tags?: MetricTags, value?: number): void;

    /**
     * Record a duration/timing metric.
     * @param name - Metric name (e.g., 'field_mapping.extract_duration_ms')
     * @param durationMs - Duration in milliseconds
     */
    recordDuration(name: string, durationMs: number, tags?: MetricTags): void;

    /**
     * Record a gauge metric (current value at a point in time).
     */
    recordGauge(name: string, value: number, tags?: MetricTags): void;

    /**
     * Record a histogram metric (distribution of values).
     */
    recordHistogram(name: string, value: number, tags?: MetricTags): void;

    /**
     * Start a timer and return a function to stop it.
     */
    startTimer(name: string, tags?: MetricTags): () => void;

    /**
     * Flush any buffered metrics (for batch sending implementations).
     */
    flush(): Promise<void>;
}

/**
 * Standard metric names for the translation pipeline.
 */
export const METRICS = {
    // Counters
    EXTRACTIONS: 'field_mapping.extractions',
    FIELDS_TRANSLATED: 'translation.fields_translated',
    FIELDS_FAILED: 'translation.fields_failed',
    BATCH_FALLBACKS: 'translation.batch_fallbacks',
    CACHE_HITS: 'response_cache.hits',
    CACHE_MISSES: 'response_cache.misses',
    CACHE_ERRORS: 'response_cache.errors',
    RELATIONSHIP_CYCLES: 'relationships.cycles_detected',
    RELATIONSHIP_DEPTH_LIMITS: 'relationships.depth_limits_reached',

    // Durations
    EXTRACT_DURATION: 'field_mapping.extract_duration_ms',
    TRANSLATE_DURATION: 'translation.duration_ms',

    // Gauges
    BATCH_SIZE: 'translation.batch_size',

    // Histograms
    QUALITY_SCORE: 'translation.quality_score'
} as const;
