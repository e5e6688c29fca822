import { ConfigurationError, PoolExhaustionError, WorkerCrashedError, errorMessage } from '../errors';
import { RunStatsCollector, RunStats, formatStats } from '../utils/metrics';
import { Channel } from './Channel';
import { RateLimiter } from './RateLimiter';
import { TaskQueue } from './TaskQueue';
import { Worker } from './Worker';
import {
    isScraperKind,
    Result,
    RunSnapshot,
    RunState,
    ScraperSelector,
    Task,
    TaskInput,
    WorkerProvisioner
} from './types';

/** Task shape accepted by `submit`; `type` is checked against the known kinds. */
export interface RawTaskInput {
    priority: number;
    url: string;
    type: string;
    searchWord?: string;
}

export interface MasterOptions {
    selector: ScraperSelector;
    rateLimiter: RateLimiter;
    provisioner?: WorkerProvisioner;
    maxAttempts?: number;
    retryDelayMs?: number;
    attemptTimeoutMs?: number;
    /** How many times a task orphaned by a crashed worker goes back on the queue. */
    maxTaskRequeues?: number;
    /** Progress log period; 0 disables it. */
    monitorIntervalMs?: number;
}

const DEFAULTS = {
    maxAttempts: 3,
    retryDelayMs: 2000,
    maxTaskRequeues: 1,
    monitorIntervalMs: 0
};

const noopProvisioner: WorkerProvisioner = {
    setUp: async () => undefined,
    tearDown: async () => undefined
};

export class Master {
    private readonly selector: ScraperSelector;
    private readonly rateLimiter: RateLimiter;
    private readonly provisioner: WorkerProvisioner;
    private readonly maxAttempts: number;
    private readonly retryDelayMs: number;
    private readonly attemptTimeoutMs?: number;
    private readonly maxTaskRequeues: number;
    private readonly monitorIntervalMs: number;

    private readonly queue = new TaskQueue();
    private readonly results = new Channel<Result>();
    private readonly abort = new AbortController();
    private readonly stats = new RunStatsCollector();

    private tasks: Map<number, Task> = new Map();
    private completed: Map<number, Result> = new Map();
    private completionOrder: Result[] = [];
    private requeues: Map<number, number> = new Map();
    private workers: Map<string, Worker> = new Map();
    private workerLoops: Map<string, Promise<void>> = new Map();
    private provisioned: Set<string> = new Set();

    private state: RunState = 'pending';
    private nextTaskId = 1;
    private workerSeq = 0;
    private peakActiveWorkers = 0;
    private succeeded = 0;
    private failed = 0;
    private monitorTimer: NodeJS.Timeout | null = null;

    constructor(options: MasterOptions) {
        this.selector = options.selector;
        this.rateLimiter = options.rateLimiter;
        this.provisioner = options.provisioner ?? noopProvisioner;
        this.maxAttempts = options.maxAttempts ?? DEFAULTS.maxAttempts;
        this.retryDelayMs = options.retryDelayMs ?? DEFAULTS.retryDelayMs;
        this.attemptTimeoutMs = options.attemptTimeoutMs;
        this.maxTaskRequeues = options.maxTaskRequeues ?? DEFAULTS.maxTaskRequeues;
        this.monitorIntervalMs = options.monitorIntervalMs ?? DEFAULTS.monitorIntervalMs;

        if (!Number.isInteger(this.maxAttempts) || this.maxAttempts < 1) {
            throw new ConfigurationError(`maxAttempts must be a positive integer, got ${this.maxAttempts}`);
        }
    }

    /**
     * Admit tasks to the queue, assigning ids in submission order. The whole
     * batch is validated before any of it is admitted.
     */
    submit(inputs: ReadonlyArray<RawTaskInput>): Task[] {
        if (this.state !== 'pending') {
            throw new ConfigurationError('Tasks cannot be submitted once a run has started');
        }
        if (inputs.length === 0) {
            throw new ConfigurationError('Task list is empty');
        }

        const validated: TaskInput[] = inputs.map((input, index) => {
            if (!isScraperKind(input.type)) {
                throw new ConfigurationError(`Task #${index}: unrecognized type '${input.type}'`);
            }
            if (!Number.isInteger(input.priority)) {
                throw new ConfigurationError(`Task #${index}: priority must be an integer, got ${input.priority}`);
            }
            if (typeof input.url !== 'string') {
                throw new ConfigurationError(`Task #${index}: url must be a string`);
            }
            return { priority: input.priority, url: input.url, type: input.type, searchWord: input.searchWord };
        });

        const admitted: Task[] = [];
        for (const input of validated) {
            const task: Task = Object.freeze({
                id: this.nextTaskId++,
                priority: input.priority,
                url: input.url,
                type: input.type,
                ...(input.searchWord !== undefined ? { searchWord: input.searchWord } : {}),
                createdAt: Date.now()
            });
            this.tasks.set(task.id, task);
            this.queue.push(task);
            admitted.push(task);
        }

        console.log(`[Master] ➕ Added ${admitted.length} tasks (${this.tasks.size} total)`);
        return admitted;
    }

    /**
     * Start a pool of `clamp(taskCount, minWorkers, maxWorkers)` workers, wait
     * for one Result per task, then shut the pool down.
     */
    async run(minWorkers: number, maxWorkers: number): Promise<RunStats> {
        if (!Number.isInteger(minWorkers) || !Number.isInteger(maxWorkers) || minWorkers < 1 || minWorkers > maxWorkers) {
            throw new ConfigurationError(`Worker bounds must satisfy 1 <= min <= max, got min=${minWorkers} max=${maxWorkers}`);
        }
        if (this.state !== 'pending') {
            throw new ConfigurationError('This master has already run');
        }
        if (this.tasks.size === 0) {
            throw new ConfigurationError('No tasks submitted');
        }

        const poolSize = Math.min(maxWorkers, Math.max(minWorkers, this.tasks.size));
        console.log(`[Master] 🔧 Config: MIN_WORKERS=${minWorkers}, MAX_WORKERS=${maxWorkers}, pool=${poolSize}, RATE=${this.rateLimiter.requestsPerSecond}/s, ATTEMPTS=${this.maxAttempts}`);

        this.state = 'running';
        this.stats.start();

        const started = await this.provision(poolSize);
        if (started.length < minWorkers) {
            await Promise.all(started.map(name => this.tearDown(name)));
            this.state = 'finished';
            this.queue.close();
            throw new PoolExhaustionError(started.length, minWorkers);
        }

        started.forEach(name => this.launch(name));
        console.log(`[Master] 🚀 ${started.length} workers running for ${this.tasks.size} tasks`);
        this.startMonitor();

        try {
            while (this.completed.size < this.tasks.size) {
                this.collect(await this.results.receive());
            }
        } finally {
            await this.shutdown();
        }

        this.stats.finish();
        const summary = this.stats.summarize(this.peakActiveWorkers);
        console.log(`[Master] 🏁 Run finished\n${formatStats(summary)}`);
        return summary;
    }

    /**
     * Stop dispatching. Queued tasks are recorded as failed; tasks already on a
     * worker run to completion.
     */
    cancel(reason = 'cancelled'): void {
        if (this.state !== 'running') return;

        this.state = 'cancelling';
        const dropped = this.queue.drain();
        console.warn(`[Master] 🛑 Cancelling run (${reason}): ${dropped.length} queued tasks dropped`);
        dropped.forEach(task => this.results.send(this.failedResult(task, 'master', `Run cancelled: ${reason}`)));
    }

    /** Results in completion order. */
    getResults(): Result[] {
        return [...this.completionOrder];
    }

    getStats(): RunStats {
        return this.stats.summarize(this.peakActiveWorkers);
    }

    getState(): RunState {
        return this.state;
    }

    snapshot(): RunSnapshot {
        const workers = Array.from(this.workers.values()).map(worker => worker.getStatus());
        return {
            state: this.state,
            total: this.tasks.size,
            completed: this.completed.size,
            succeeded: this.succeeded,
            failed: this.failed,
            queueDepth: this.queue.size,
            inFlight: workers.filter(w => w.state === 'busy').length,
            activeWorkers: this.liveWorkerCount(),
            resultBacklog: this.results.pending,
            rateLimitGrants: this.rateLimiter.grantedCount,
            workers
        };
    }

    private async provision(count: number): Promise<string[]> {
        const names = Array.from({ length: count }, () => this.nextWorkerName());
        const outcomes = await Promise.allSettled(names.map(name => this.provisioner.setUp(name)));

        const started: string[] = [];
        outcomes.forEach((outcome, i) => {
            if (outcome.status === 'fulfilled') {
                this.provisioned.add(names[i]);
                started.push(names[i]);
            } else {
                console.error(`[Master] ❌ Failed to start worker ${names[i]}: ${errorMessage(outcome.reason)}`);
            }
        });
        return started;
    }

    private launch(name: string): void {
        const worker = new Worker(name, {
            queue: this.queue,
            results: this.results,
            selector: this.selector,
            rateLimiter: this.rateLimiter
        }, {
            maxAttempts: this.maxAttempts,
            retryDelayMs: this.retryDelayMs,
            attemptTimeoutMs: this.attemptTimeoutMs
        });

        this.workers.set(name, worker);
        const loop = worker.run(this.abort.signal).catch(err => this.handleCrash(name, err));
        this.workerLoops.set(name, loop);
        this.peakActiveWorkers = Math.max(this.peakActiveWorkers, this.liveWorkerCount());
    }

    /**
     * A dead worker's task is requeued while it has requeues left, otherwise
     * recorded as failed. The pool is topped back up while work remains.
     */
    private async handleCrash(name: string, err: unknown): Promise<void> {
        const orphan = err instanceof WorkerCrashedError ? err.orphanedTask : null;
        console.error(`[Master] 💀 Worker ${name} died: ${errorMessage(err)}`);
        await this.tearDown(name);

        let requeued = false;
        if (orphan) {
            const count = this.requeues.get(orphan.id) ?? 0;
            if (this.state === 'running' && !this.queue.isClosed && count < this.maxTaskRequeues) {
                this.requeues.set(orphan.id, count + 1);
                console.log(`[Master] ♻️ Re-queuing task ${orphan.id} (requeue ${count + 1}/${this.maxTaskRequeues})`);
                this.queue.push(orphan);
                requeued = true;
            } else {
                this.results.send(this.failedResult(orphan, name, `WorkerFault: ${errorMessage(err)}`));
            }
        }

        // Only top up while something is still waiting to be taken.
        if (this.state === 'running' && (requeued || this.queue.size > 0)) {
            await this.replace();
        }
    }

    private async replace(): Promise<void> {
        const [name] = await this.provision(1);

        if (name !== undefined && this.state === 'running') {
            console.log(`[Master] 🔁 Replacement worker ${name} started`);
            this.launch(name);
            return;
        }
        if (name !== undefined) {
            await this.tearDown(name);
        }

        if (this.liveWorkerCount() === 0) {
            const stranded = this.queue.drain();
            console.error(`[Master] ❌ No live workers remain, failing ${stranded.length} queued tasks`);
            stranded.forEach(task => this.results.send(this.failedResult(task, 'master', 'No live workers remain')));
        }
    }

    private collect(result: Result): void {
        if (!this.tasks.has(result.taskId) || this.completed.has(result.taskId)) {
            console.error(`[Master] Ignoring duplicate or unknown result for task ${result.taskId} from ${result.workerName}`);
            return;
        }

        this.completed.set(result.taskId, result);
        this.completionOrder.push(result);
        this.stats.record(result);

        if (result.success) {
            this.succeeded++;
            console.log(`[Master] Task ${result.taskId} completed successfully by worker ${result.workerName} (${result.data.length} items)`);
        } else {
            this.failed++;
            console.warn(`[Master] Task ${result.taskId} failed: ${result.errorMessage}`);
        }
    }

    private async shutdown(): Promise<void> {
        console.log('[Master] Stopping workers');
        this.stopMonitor();
        this.abort.abort();
        this.queue.close();

        await Promise.all(this.workerLoops.values());
        await Promise.all(Array.from(this.provisioned).map(name => this.tearDown(name)));
        this.state = 'finished';
    }

    private async tearDown(name: string): Promise<void> {
        if (!this.provisioned.delete(name)) return;
        try {
            await this.provisioner.tearDown(name);
        } catch (err) {
            console.error(`[Master] ❌ Failed to tear down worker ${name}: ${errorMessage(err)}`);
        }
    }

    private liveWorkerCount(): number {
        let live = 0;
        this.workers.forEach(worker => {
            if (worker.isAlive) live++;
        });
        return live;
    }

    private nextWorkerName(): string {
        this.workerSeq++;
        return `w${this.workerSeq}`;
    }

    private failedResult(task: Task, workerName: string, message: string): Result {
        const now = Date.now();
        return Object.freeze({
            taskId: task.id,
            workerName,
            sourceType: task.type,
            data: Object.freeze([]),
            success: false,
            errorMessage: message,
            attempts: 0,
            errors: Object.freeze([message]),
            dispatchedAt: now,
            processingTimeMs: 0,
            scrapedAt: now
        });
    }

    private startMonitor(): void {
        if (this.monitorIntervalMs <= 0) return;
        this.monitorTimer = setInterval(() => this.logProgress(), this.monitorIntervalMs);
        this.monitorTimer.unref();
    }

    private stopMonitor(): void {
        if (this.monitorTimer) {
            clearInterval(this.monitorTimer);
            this.monitorTimer = null;
        }
    }

    private logProgress(): void {
        const snap = this.snapshot();
        const completion = snap.total > 0 ? (snap.completed / snap.total) * 100 : 0;
        console.log(`[Master] 📊 ${completion.toFixed(1)}% completed (${snap.completed}/${snap.total}), queue=${snap.queueDepth}, in flight=${snap.inFlight}`);
        console.log(`[Master]    Successful tasks: ${snap.succeeded}, Failed tasks: ${snap.failed}`);
        snap.workers.forEach(w => {
            console.log(`[Master]    Worker ${w.name}: ${w.state}${w.currentTaskId !== null ? ` (task ${w.currentTaskId})` : ''}`);
        });
    }
}
