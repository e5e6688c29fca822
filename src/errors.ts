import type { Task } from './scheduler/types';

/**
 * Invalid task list, worker bounds or settings. Fatal to a run, raised before
 * anything executes.
 */
export class ConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

/**
 * Fewer than the minimum number of workers could be started.
 */
export class PoolExhaustionError extends Error {
    readonly started: number;
    readonly required: number;

    constructor(started: number, required: number, cause?: unknown) {
        super(`Only ${started} of ${required} required workers could be started`);
        this.name = 'PoolExhaustionError';
        this.started = started;
        this.required = required;
        if (cause !== undefined) {
            this.cause = cause;
        }
    }
}

/**
 * The selector has no scraper for a task. Never retried.
 */
export class ResolutionError extends Error {
    readonly taskType: string;

    constructor(taskType: string, message?: string) {
        super(message ?? `No scraper available for type '${taskType}'`);
        this.name = 'ResolutionError';
        this.taskType = taskType;
    }
}

/**
 * A single fetch attempt failed. Transient failures are retried up to the
 * attempt ceiling.
 */
export class FetchError extends Error {
    readonly transient: boolean;

    constructor(message: string, options: { transient?: boolean; cause?: unknown } = {}) {
        super(message);
        this.name = 'FetchError';
        this.transient = options.transient ?? true;
        if (options.cause !== undefined) {
            this.cause = options.cause;
        }
    }
}

/**
 * Thrown by a scraper whose own runtime state is gone (dead browser, closed
 * session). Takes the worker down with it.
 */
export class WorkerFault extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'WorkerFault';
    }
}

/**
 * A worker loop terminated abnormally. Carries the task it was holding, if any.
 */
export class WorkerCrashedError extends Error {
    readonly workerName: string;
    readonly orphanedTask: Task | null;

    constructor(workerName: string, orphanedTask: Task | null, cause: unknown) {
        super(`Worker ${workerName} crashed: ${errorMessage(cause)}`);
        this.name = 'WorkerCrashedError';
        this.workerName = workerName;
        this.orphanedTask = orphanedTask;
        this.cause = cause;
    }
}

export function errorMessage(err: unknown): string {
    if (err instanceof Error) return err.message;
    return String(err);
}
