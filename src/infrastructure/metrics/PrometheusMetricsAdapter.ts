import { Registry, Counter, Histogram, Gauge, collectDefaultMetrics } from 'prom-client';
import { IMetricsPort, METRICS, MetricTags } from '../../domain/ports/IMetricsPort';

export interface PrometheusMetricsOptions {
    /** Prefix for default process metrics. */
    prefix?: string;
    /** Collect Node.js process metrics (starts background timers). */
    collectDefaults?: boolean;
    defaultLabels?: Record<string, string>;
    /** Histogram buckets by metric name (before sanitizing). */
    buckets?: Record<string, number[]>;
}

const DURATION_BUCKETS_MS = [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 30000];
const QUALITY_BUCKETS = [0.1, 0.2, 0.3, 0.4, 0.5, 0.6, 0.7, 0.8, 0.9, 1];

const DEFAULT_BUCKETS: Record<string, number[]> = {
    [METRICS.EXTRACT_DURATION]: DURATION_BUCKETS_MS,
    [METRICS.TRANSLATE_DURATION]: DURATION_BUCKETS_MS,
    [METRICS.QUALITY_SCORE]: QUALITY_BUCKETS
};

/**
 * Prometheus Metrics Adapter
 *
 * Metrics are registered on first use; their label names are the keys of
 * the tags passed that time. Dots in names become underscores.
 */
export class PrometheusMetricsAdapter implements IMetricsPort {
    private readonly registry = new Registry();
    private readonly counters = new Map<string, Counter<string>>();
    private readonly histograms = new Map<string, Histogram<string>>();
    private readonly gauges = new Map<string, Gauge<string>>();
    private readonly buckets: Record<string, number[]>;

    constructor(options: PrometheusMetricsOptions = {}) {
        this.registry.setDefaultLabels(options.defaultLabels ?? { app: 'cms-field-translator' });
        this.buckets = { ...DEFAULT_BUCKETS, ...options.buckets };

        if (options.collectDefaults) {
            collectDefaultMetrics({ register: this.registry, prefix: options.prefix ?? 'cms_field_translator_' });
        }
    }

    incrementCounter(name: string, tags: MetricTags = {}, value: number = 1): void {
        const counter = this.getOrCreate(this.counters, name, tags, (metricName, labelNames) => new Counter({
            name: metricName,
            help: `Total count of ${name}`,
            labelNames,
            registers: [this.registry]
        }));
        counter.inc(toLabels(tags), value);
    }

    /** Durations are histograms in milliseconds. */
    recordDuration(name: string, durationMs: number, tags?: MetricTags): void {
        this.recordHistogram(name, durationMs, tags);
    }

    recordGauge(name: string, value: number, tags: MetricTags = {}): void {
        const gauge = this.getOrCreate(this.gauges, name, tags, (metricName, labelNames) => new Gauge({
            name: metricName,
            help: `Current value of ${name}`,
            labelNames,
            registers: [this.registry]
        }));
        gauge.set(toLabels(tags), value);
    }

    recordHistogram(name: string, value: number, tags: MetricTags = {}): void {
        const buckets = this.buckets[name];
        const histogram = this.getOrCreate(this.histograms, name, tags, (metricName, labelNames) => new Histogram({
            name: metricName,
            help: `Distribution of ${name}`,
            labelNames,
            registers: [this.registry],
            ...(buckets ? { buckets } : {})
        }));
        histogram.observe(toLabels(tags), value);
    }

    startTimer(name: string, tags?: MetricTags): () => void {
        const startTime = Date.now();
        return () => this.recordDuration(name, Date.now() - startTime, tags);
    }

    /** Prometheus pulls; nothing is buffered. */
    async flush(): Promise<void> { }

    /**
     * Prometheus exposition text for a /metrics endpoint.
     */
    async getMetrics(): Promise<string> {
        return this.registry.metrics();
    }

    private getOrCreate<T>(
        metrics: Map<string, T>,
        name: string,
        tags: MetricTags,
        create: (metricName: string, labelNames: string[]) => T
    ): T {
        const metricName = sanitizeName(name);
        let metric = metrics.get(metricName);
        if (!metric) {
            metric = create(metricName, Object.keys(tags));
            metrics.set(metricName, metric);
        }
        return metric;
    }
}

function sanitizeName(name: string): string {
    return name.replace(/\./g, '_');
}

function toLabels(tags: MetricTags): Record<string, string> {
    const labels: Record<string, string> = {};
    for (const [key, value] of Object.entries(tags)) {
        labels[key] = String(value);
    }
    return labels;
}
