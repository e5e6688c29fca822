import { FetchError, ResolutionError, WorkerCrashedError, WorkerFault, errorMessage } from '../errors';
import { sleep, withTimeout } from '../utils/time';
import type { Channel } from './Channel';
import type { RateLimiter } from './RateLimiter';
import type { TaskQueue } from './TaskQueue';
import type {
    FetchOutcome,
    ResolveOutcome,
    Result,
    ScrapedRecord,
    Scraper,
    ScraperSelector,
    Task,
    WorkerStatus
} from './types';

export interface WorkerOptions {
    /** Scraper invocations per task, first attempt included. */
    maxAttempts: number;
    retryDelayMs: number;
    /** Per-attempt ceiling. Unset leaves timeouts to the scraper. */
    attemptTimeoutMs?: number;
}

export interface WorkerDeps {
    queue: TaskQueue;
    results: Channel<Result>;
    selector: ScraperSelector;
    rateLimiter: RateLimiter;
}

interface Outcome {
    success: boolean;
    data: ScrapedRecord[];
    attempts: number;
    errors: string[];
}

export class Worker {
    readonly name: string;
    private readonly deps: WorkerDeps;
    private readonly options: WorkerOptions;
    private readonly status: WorkerStatus;
    private inFlight: Task | null = null;

    constructor(name: string, deps: WorkerDeps, options: WorkerOptions) {
        this.name = name;
        this.deps = deps;
        this.options = options;
        this.status = {
            name,
            state: 'starting',
            currentTaskId: null,
            tasksCompleted: 0,
            tasksFailed: 0,
            startedAt: Date.now()
        };
    }

    getStatus(): WorkerStatus {
        return { ...this.status };
    }

    get isAlive(): boolean {
        return this.status.state !== 'dead' && this.status.state !== 'stopped';
    }

    /**
     * Pull tasks until the queue closes or the signal aborts. The signal is
     * checked between tasks only; a task in progress always runs to its Result.
     */
    async run(signal: AbortSignal): Promise<void> {
        console.log(`[Worker ${this.name}] 🟢 Started`);

        try {
            while (!signal.aborted) {
                this.status.state = 'idle';
                const task = await this.deps.queue.take();
                if (!task) break;

                this.inFlight = task;
                this.status.state = 'busy';
                this.status.currentTaskId = task.id;
                console.log(`[Worker ${this.name}] ▶️ Task ${task.id} (${task.type}, priority ${task.priority}) ${task.url || '(default feed)'}`);

                const result = await this.execute(task);
                if (result.success) {
                    this.status.tasksCompleted++;
                } else {
                    this.status.tasksFailed++;
                }

                this.deps.results.send(result);
                this.inFlight = null;
                this.status.currentTaskId = null;
            }
        } catch (err) {
            this.status.state = 'dead';
            const orphan = this.inFlight;
            this.inFlight = null;
            console.error(`[Worker ${this.name}] 💀 Crashed${orphan ? ` holding task ${orphan.id}` : ''}: ${errorMessage(err)}`);
            throw new WorkerCrashedError(this.name, orphan, err);
        }

        this.status.state = 'stopped';
        this.status.currentTaskId = null;
        console.log(`[Worker ${this.name}] ⏹️ Finished (${this.status.tasksCompleted} ok, ${this.status.tasksFailed} failed)`);
    }

    /**
     * Turn one task into one Result. Resolution failures are final; fetch
     * failures are retried up to `maxAttempts`, each attempt behind the shared
     * rate limiter.
     */
    async execute(task: Task): Promise<Result> {
        const dispatchedAt = Date.now();

        const resolved = this.resolve(task);
        if (!resolved.ok) {
            console.warn(`[Worker ${this.name}] ⚠️ Task ${task.id}: ${resolved.error.message}. Not retrying.`);
            return this.buildResult(task, dispatchedAt, {
                success: false,
                data: [],
                attempts: 0,
                errors: [resolved.error.message]
            });
        }

        const errors: string[] = [];
        let attempts = 0;

        while (attempts < this.options.maxAttempts) {
            attempts++;
            await this.deps.rateLimiter.acquire();

            const outcome = await this.attempt(resolved.scraper, task);
            if (outcome.ok) {
                console.log(`[Worker ${this.name}] ✅ Task ${task.id} returned ${outcome.records.length} records (attempt ${attempts})`);
                return this.buildResult(task, dispatchedAt, {
                    success: true,
                    data: outcome.records,
                    attempts,
                    errors
                });
            }

            errors.push(outcome.error.message);
            console.warn(`[Worker ${this.name}] Task ${task.id} failed attempt ${attempts}/${this.options.maxAttempts}: ${outcome.error.message}`);

            if (!outcome.error.transient) {
                console.log(`[Worker ${this.name}] ⚠️ Task ${task.id} failure is not transient. Failing fast.`);
                break;
            }

            if (attempts < this.options.maxAttempts && this.options.retryDelayMs > 0) {
                console.log(`[Worker ${this.name}] ♻️ Retrying task ${task.id} in ${this.options.retryDelayMs}ms...`);
                await sleep(this.options.retryDelayMs);
            }
        }

        console.error(`[Worker ${this.name}] Task ${task.id} permanently failed after ${attempts} attempts.`);
        return this.buildResult(task, dispatchedAt, { success: false, data: [], attempts, errors });
    }

    private resolve(task: Task): ResolveOutcome {
        try {
            return this.deps.selector.resolve(task.type, task.searchWord);
        } catch (err) {
            return { ok: false, error: new ResolutionError(task.type, `Selector failed for type '${task.type}': ${errorMessage(err)}`) };
        }
    }

    private async attempt(scraper: Scraper, task: Task): Promise<FetchOutcome> {
        const timeoutMs = this.options.attemptTimeoutMs;

        try {
            const pending = scraper.fetch(task.url, task.searchWord);
            if (timeoutMs === undefined) return await pending;
            return await withTimeout(pending, timeoutMs, () => new FetchError(`Attempt timed out after ${timeoutMs}ms`));
        } catch (err) {
            if (err instanceof WorkerFault) throw err;
            if (err instanceof FetchError) return { ok: false, error: err };
            return { ok: false, error: new FetchError(errorMessage(err), { cause: err }) };
        }
    }

    private buildResult(task: Task, dispatchedAt: number, outcome: Outcome): Result {
        const now = Date.now();
        const lastError = outcome.errors[outcome.errors.length - 1];

        return Object.freeze({
            taskId: task.id,
            workerName: this.name,
            sourceType: task.type,
            data: Object.freeze(outcome.data.map(record => Object.freeze({ ...record }))),
            success: outcome.success,
            ...(outcome.success ? {} : { errorMessage: lastError ?? 'Task failed' }),
            attempts: outcome.attempts,
            errors: Object.freeze([...outcome.errors]),
            dispatchedAt,
            processingTimeMs: now - dispatchedAt,
            scrapedAt: now
        });
    }
}
