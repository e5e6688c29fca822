import type { FetchError, ResolutionError } from '../errors';

export const SCRAPER_KINDS = ['news', 'rss', 'blog'] as const;

export type ScraperKind = typeof SCRAPER_KINDS[number];

export function isScraperKind(value: unknown): value is ScraperKind {
    return typeof value === 'string' && (SCRAPER_KINDS as readonly string[]).includes(value);
}

/**
 * Task as supplied by configuration, before the Master assigns an id.
 * Higher `priority` is dispatched sooner.
 */
export interface TaskInput {
    priority: number;
    url: string;
    type: ScraperKind;
    searchWord?: string;
}

export interface Task extends Readonly<TaskInput> {
    readonly id: number;
    readonly createdAt: number;
}

export type ScrapedRecord = Record<string, unknown>;

export interface Result {
    readonly taskId: number;
    readonly workerName: string;
    readonly sourceType: ScraperKind;
    readonly data: readonly ScrapedRecord[];
    readonly success: boolean;
    readonly errorMessage?: string;
    readonly attempts: number;
    readonly errors: readonly string[];
    readonly dispatchedAt: number;
    readonly processingTimeMs: number;
    readonly scrapedAt: number;
}

export type WorkerState = 'starting' | 'idle' | 'busy' | 'stopped' | 'dead';

export interface WorkerStatus {
    name: string;
    state: WorkerState;
    currentTaskId: number | null;
    tasksCompleted: number;
    tasksFailed: number;
    startedAt: number;
}

export type FetchOutcome =
    | { ok: true; records: ScrapedRecord[] }
    | { ok: false; error: FetchError };

export interface Scraper {
    fetch(url: string, searchWord?: string): Promise<FetchOutcome>;
}

export type ResolveOutcome =
    | { ok: true; scraper: Scraper }
    | { ok: false; error: ResolutionError };

export interface ScraperSelector {
    resolve(type: ScraperKind, searchWord?: string): ResolveOutcome;
}

/**
 * Acquires and releases whatever a worker needs to run (a browser, a
 * session). A rejected `setUp` means the worker cannot start.
 */
export interface WorkerProvisioner {
    setUp(workerName: string): Promise<void>;
    tearDown(workerName: string): Promise<void>;
}

export type RunState = 'pending' | 'running' | 'cancelling' | 'finished';

export interface RunSnapshot {
    state: RunState;
    total: number;
    completed: number;
    succeeded: number;
    failed: number;
    queueDepth: number;
    inFlight: number;
    activeWorkers: number;
    /** Results sent by workers and not yet collected. */
    resultBacklog: number;
    /** Fetch attempts let through by the rate limiter so far. */
    rateLimitGrants: number;
    workers: WorkerStatus[];
}
