/**
 * Sync Bridge - Metrics
 * @module lib/sync-bridge/metrics/sync-metrics
 *
 * In-process counters and histograms for sync runs.
 */

export const SYNC_METRICS = {
    runsTotal: 'sync.runs.total',
    runsFailed: 'sync.runs.failed',
    itemsSynced: 'sync.items.synced',
    itemsFailed: 'sync.items.failed',
    conflictsDetected: 'sync.conflicts.detected',
    conflictsResolved: 'sync.conflicts.resolved',
    rollbacksTotal: 'sync.rollbacks.total',
    leaseSkipped: 'sync.lease.skipped',
    runDurationMs: 'sync.run.duration_ms',
} as const;

export interface HistogramSnapshot {
    count: number;
    sum: number;
    min: number;
    max: number;
    avg: number;
}

export interface MetricsSnapshot {
    counters: Record<string, number>;
    histograms: Record<string, HistogramSnapshot>;
}

interface Histogram {
    count: number;
    sum: number;
    min: number;
    max: number;
}

export class SyncMetrics {
    private counters: Map<string, number> = new Map();
    private histograms: Map<string, Histogram> = new Map();

    increment(name: string, by: number = 1): void {
        this.counters.set(name, (this.counters.get(name) ?? 0) + by);
    }

    observe(name: string, value: number): void {
        const current = this.histograms.get(name);
        if (!current) {
            this.histograms.set(name, { count: 1, sum: value, min: value, max: value });
            return;
        }
        current.count++;
        current.sum += value;
        current.min = Math.min(current.min, value);
        current.max = Math.max(current.max, value);
    }

    getCounter(name: string): number {
        return this.counters.get(name) ?? 0;
    }

    getHistogram(name: string): HistogramSnapshot {
        const h = this.histograms.get(name);
        if (!h) {
            return { count: 0, sum: 0, min: 0, max: 0, avg: 0 };
        }
        return { ...h, avg: h.sum / h.count };
    }

    snapshot(): MetricsSnapshot {
        const counters: Record<string, number> = {};
        for (const [name, value] of this.counters) {
            counters[name] = value;
        }
        const histograms: Record<string, HistogramSnapshot> = {};
        for (const name of this.histograms.keys()) {
            histograms[name] = this.getHistogram(name);
        }
        return { counters, histograms };
    }

    reset(): void {
        this.counters.clear();
        this.histograms.clear();
    }
}
