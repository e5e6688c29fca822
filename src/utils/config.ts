import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ConfigurationError } from '../errors';
import { SCRAPER_KINDS, TaskInput } from '../scheduler/types';

const optionalNumber = z.preprocess(
    val => (val === '' || val === undefined ? undefined : val),
    z.coerce.number().int().positive().optional()
);

const envSchema = z.object({
    MIN_WORKERS: z.coerce.number().int().min(1).default(1),
    MAX_WORKERS: z.coerce.number().int().min(1).default(3),
    RATE_LIMIT_RPS: z.coerce.number().positive().default(1),
    MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
    RETRY_DELAY_MS: z.coerce.number().int().min(0).default(2000),
    ATTEMPT_TIMEOUT_MS: optionalNumber,
    MAX_TASK_REQUEUES: z.coerce.number().int().min(0).default(1),
    MONITOR_INTERVAL_MS: z.coerce.number().int().min(0).default(4000),
    MONITOR_PORT: optionalNumber,
    TASKS_FILE: z.string().default('config/tasks.json'),
    DATA_DIR: z.string().default('data'),
    ENABLED_SCRAPERS: z.string().default(SCRAPER_KINDS.join(','))
        .transform(val => val.split(',').map(kind => kind.trim().toLowerCase()).filter(kind => kind.length > 0))
        .pipe(z.array(z.enum(SCRAPER_KINDS))),
    HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
    RSS_DEFAULT_FEED: z.string().url().default('https://feeds.npr.org/1001/rss.xml'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info')
});

export const taskInputSchema = z.object({
    priority: z.number().int(),
    url: z.string().default(''),
    type: z.enum(SCRAPER_KINDS),
    searchWord: z.string().min(1).optional()
});

export const taskFileSchema = z.object({
    minWorkers: z.number().int().min(1).optional(),
    maxWorkers: z.number().int().min(1).optional(),
    tasks: z.array(taskInputSchema).min(1)
});

export type EnvConfig = z.infer<typeof envSchema>;

export interface AppConfig {
    minWorkers: number;
    maxWorkers: number;
    rateLimitRps: number;
    maxAttempts: number;
    retryDelayMs: number;
    attemptTimeoutMs?: number;
    maxTaskRequeues: number;
    monitorIntervalMs: number;
    monitorPort?: number;
    tasksFile: string;
    dataDir: string;
    enabledScrapers: EnvConfig['ENABLED_SCRAPERS'];
    httpTimeoutMs: number;
    rssDefaultFeed: string;
    logLevel: EnvConfig['LOG_LEVEL'];
}

function describeIssues(error: z.ZodError): string {
    return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigurationError(`Invalid environment: ${describeIssues(parsed.error)}`);
    }

    const e = parsed.data;
    if (e.MIN_WORKERS > e.MAX_WORKERS) {
        throw new ConfigurationError(`MIN_WORKERS (${e.MIN_WORKERS}) exceeds MAX_WORKERS (${e.MAX_WORKERS})`);
    }

    return {
        minWorkers: e.MIN_WORKERS,
        maxWorkers: e.MAX_WORKERS,
        rateLimitRps: e.RATE_LIMIT_RPS,
        maxAttempts: e.MAX_ATTEMPTS,
        retryDelayMs: e.RETRY_DELAY_MS,
        attemptTimeoutMs: e.ATTEMPT_TIMEOUT_MS,
        maxTaskRequeues: e.MAX_TASK_REQUEUES,
        monitorIntervalMs: e.MONITOR_INTERVAL_MS,
        monitorPort: e.MONITOR_PORT,
        tasksFile: e.TASKS_FILE,
        dataDir: e.DATA_DIR,
        enabledScrapers: e.ENABLED_SCRAPERS,
        httpTimeoutMs: e.HTTP_TIMEOUT_MS,
        rssDefaultFeed: e.RSS_DEFAULT_FEED,
        logLevel: e.LOG_LEVEL
    };
}

export interface TaskFile {
    minWorkers?: number;
    maxWorkers?: number;
    tasks: TaskInput[];
}

export function parseTaskFile(raw: unknown): TaskFile {
    const parsed = taskFileSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ConfigurationError(`Invalid task file: ${describeIssues(parsed.error)}`);
    }
    return parsed.data;
}

export function loadTaskFile(filePath: string): TaskFile {
    const resolved = path.resolve(process.cwd(), filePath);
    if (!fs.existsSync(resolved)) {
        throw new ConfigurationError(`Task file not found: ${resolved}`);
    }

    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(resolved, 'utf-8'));
    } catch (e: unknown) {
        throw new ConfigurationError(`Task file ${resolved} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
    }
    return parseTaskFile(raw);
}

/**
 * Worker bounds from the task file win over the environment.
 */
export function resolveWorkerBounds(config: AppConfig, file: TaskFile): { minWorkers: number; maxWorkers: number } {
    const minWorkers = file.minWorkers ?? config.minWorkers;
    const maxWorkers = file.maxWorkers ?? config.maxWorkers;
    if (minWorkers > maxWorkers) {
        throw new ConfigurationError(`minWorkers (${minWorkers}) exceeds maxWorkers (${maxWorkers})`);
    }
    return { minWorkers, maxWorkers };
}
