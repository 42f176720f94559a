/**
 * Console Metrics Adapter
 *
 * Writes each metric as one JSON line tagged `[Metrics]` and keeps running
 * totals per metric name, so a caller (or a test) can read them back.
 */

import { IMetricsPort, MetricTags } from '../../domain/ports/IMetricsPort';

export type MetricKind = 'counter' | 'duration' | 'gauge' | 'histogram';

export interface ConsoleMetricsOptions {
    /** Prefix for all metric names */
    prefix?: string;
    /** When false nothing is logged; totals are still kept. */
    enabled?: boolean;
    logLevel?: 'debug' | 'info';
    /** Oldest records are dropped past this count (default 10000). */
    maxRecords?: number;
}

export interface MetricRecord {
    kind: MetricKind;
    name: string;
    value: number;
    tags: MetricTags;
}

export class ConsoleMetricsAdapter implements IMetricsPort {
    private readonly prefix: string;
    private readonly enabled: boolean;
    private readonly logLevel: 'debug' | 'info';
    private readonly maxRecords: number;
    private readonly records: MetricRecord[] = [];

    constructor(options?: ConsoleMetricsOptions) {
        this.prefix = options?.prefix || '';
        this.enabled = options?.enabled ?? true;
        this.logLevel = options?.logLevel || 'info';
        this.maxRecords = options?.maxRecords ?? 10000;
    }

    private formatMetricName(name: string): string {
        return this.prefix ? `${this.prefix}.${name}` : name;
    }

    private record(kind: MetricKind, name: string, value: number, tags: MetricTags = {}): void {
        const metric: MetricRecord = { kind, name: this.formatMetricName(name), value, tags };
        this.records.push(metric);
        if (this.records.length > this.maxRecords) this.records.shift();

        if (!this.enabled) return;
        const logFn = this.logLevel === 'debug' ? console.debug : console.log;
        logFn(`[Metrics] ${JSON.stringify({ ...metric, timestamp: new Date().toISOString() })}`);
    }

    incrementCounter(name: string, tags?: MetricTags, value: number = 1): void {
        this.record('counter', name, value, tags);
    }

    recordDuration(name: string, durationMs: number, tags?: MetricTags): void {
        this.record('duration', name, durationMs, tags);
    }

    recordGauge(name: string, value: number, tags?: MetricTags): void {
        this.record('gauge', name, value, tags);
    }

    recordHistogram(name: string, value: number, tags?: MetricTags): void {
        this.record('histogram', name, value, tags);
    }

    startTimer(name: string, tags?: MetricTags): () => void {
        const startTime = Date.now();
        return () => {
            this.recordDuration(name, Date.now() - startTime, tags);
        };
    }

    async flush(): Promise<void> {
        // Console adapter writes immediately, nothing to flush
    }

    /**
     * Sum of a counter, optionally restricted to records carrying `tags`.
     */
    getCounterTotal(name: string, tags: MetricTags = {}): number {
        return this.getRecords('counter', name)
            .filter(record => Object.entries(tags).every(([key, value]) => record.tags[key] === value))
            .reduce((sum, record) => sum + record.value, 0);
    }

    getRecords(kind?: MetricKind, name?: string): MetricRecord[] {
        const fullName = name === undefined ? undefined : this.formatMetricName(name);
        return this.records.filter(record =>
            (kind === undefined || record.kind === kind) && (fullName === undefined || record.name === fullName));
    }

    reset(): void {
        this.records.length = 0;
    }
}

/**
 * No-op Metrics Adapter for when metrics are disabled.
 */
export class NoOpMetricsAdapter implements IMetricsPort {
    incrementCounter(): void { }
    recordDuration(): void { }
    recordGauge(): void { }
    recordHistogram(): void { }
    startTimer(): () => void { return () => { }; }
    async flush(): Promise<void> { }
}
