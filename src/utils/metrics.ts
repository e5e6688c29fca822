/**
 * Run statistics, accumulated one Result at a time in whatever order they
 * complete.
 */
import type { Result } from '../scheduler/types';

export interface SourceTypeStats {
    total: number;
    succeeded: number;
    failed: number;
    records: number;
}

export interface ProcessingTimeStats {
    meanMs: number;
    minMs: number;
    maxMs: number;
    p50Ms: number;
    p95Ms: number;
}

export interface RunStats {
    total: number;
    succeeded: number;
    failed: number;
    /** Percentage, 0-100. */
    successRate: number;
    totalRecords: number;
    processingTime: ProcessingTimeStats;
    bySourceType: Record<string, SourceTypeStats>;
    startedAt: string;
    finishedAt: string;
    durationMs: number;
    peakActiveWorkers: number;
}

export const percentile = (arr: number[], p: number): number => {
    if (arr.length === 0) return 0;
    const sorted = [...arr].sort((a, b) => a - b);
    const index = Math.ceil((p / 100) * sorted.length) - 1;
    return sorted[Math.max(0, index)];
};

export const mean = (arr: number[]): number => {
    if (arr.length === 0) return 0;
    return arr.reduce((a, b) => a + b, 0) / arr.length;
};

export class RunStatsCollector {
    private processingTimes: number[] = [];
    private bySourceType: Map<string, SourceTypeStats> = new Map();
    private succeeded = 0;
    private failed = 0;
    private totalRecords = 0;
    private startedAt: number | null = null;
    private finishedAt: number | null = null;

    start(at: number = Date.now()) {
        this.startedAt = at;
        this.finishedAt = null;
    }

    finish(at: number = Date.now()) {
        this.finishedAt = at;
    }

    record(result: Result) {
        this.processingTimes.push(result.processingTimeMs);
        this.totalRecords += result.data.length;

        const entry = this.bySourceType.get(result.sourceType) ?? { total: 0, succeeded: 0, failed: 0, records: 0 };
        entry.total++;
        entry.records += result.data.length;

        if (result.success) {
            this.succeeded++;
            entry.succeeded++;
        } else {
            this.failed++;
            entry.failed++;
        }

        this.bySourceType.set(result.sourceType, entry);
    }

    get count(): number {
        return this.succeeded + this.failed;
    }

    summarize(peakActiveWorkers = 0): RunStats {
        const total = this.count;
        const startedAt = this.startedAt ?? Date.now();
        const finishedAt = this.finishedAt ?? Date.now();

        const bySourceType: Record<string, SourceTypeStats> = {};
        for (const [type, entry] of this.bySourceType.entries()) {
            bySourceType[type] = { ...entry };
        }

        return {
            total,
            succeeded: this.succeeded,
            failed: this.failed,
            successRate: total > 0 ? (this.succeeded / total) * 100 : 0,
            totalRecords: this.totalRecords,
            processingTime: {
                meanMs: mean(this.processingTimes),
                minMs: this.processingTimes.length > 0 ? Math.min(...this.processingTimes) : 0,
                maxMs: this.processingTimes.length > 0 ? Math.max(...this.processingTimes) : 0,
                p50Ms: percentile(this.processingTimes, 50),
                p95Ms: percentile(this.processingTimes, 95)
            },
            bySourceType,
            startedAt: new Date(startedAt).toISOString(),
            finishedAt: new Date(finishedAt).toISOString(),
            durationMs: finishedAt - startedAt,
            peakActiveWorkers
        };
    }
}

export function formatStats(stats: RunStats): string {
    const lines = [
        `Tasks: ${stats.total} (✅ ${stats.succeeded} succeeded, ❌ ${stats.failed} failed, ${stats.successRate.toFixed(2)}%)`,
        `Records: ${stats.totalRecords}`,
        `Processing time: mean ${stats.processingTime.meanMs.toFixed(2)}ms, p50 ${stats.processingTime.p50Ms.toFixed(2)}ms, p95 ${stats.processingTime.p95Ms.toFixed(2)}ms`,
        `Duration: ${stats.durationMs}ms with up to ${stats.peakActiveWorkers} workers`
    ];
    for (const [type, entry] of Object.entries(stats.bySourceType)) {
        lines.push(`  ${type}: ${entry.succeeded}/${entry.total} ok, ${entry.records} records`);
    }
    return lines.join('\n');
}
