import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import type { Result, ScrapedRecord } from '../scheduler/types';
import type { RunStats } from '../utils/metrics';

export interface StoredRun {
    runId: string;
    startedAt: string;
    finishedAt: string;
    stats: RunStats;
}

export interface StoredResult {
    taskId: number;
    workerName: string;
    sourceType: string;
    success: boolean;
    errorMessage: string | null;
    attempts: number;
    processingTimeMs: number;
    recordCount: number;
}

interface RunRow {
    run_id: string;
    started_at: string;
    finished_at: string;
    stats: string;
}

interface ResultRow {
    task_id: number;
    worker_name: string;
    source_type: string;
    success: number;
    error_message: string | null;
    attempts: number;
    processing_time_ms: number;
    record_count: number;
}

/**
 * SQLite persistence for finished runs: one row per run, per result and per
 * scraped record.
 */
export class ResultStore {
    private db: Database.Database;

    constructor(dbPath?: string) {
        const resolved = dbPath ?? ResultStore.defaultPath();

        if (resolved !== ':memory:') {
            const dbDir = path.dirname(resolved);
            if (!fs.existsSync(dbDir)) {
                console.log(`[ResultStore] 🔧 Creating data directory: ${dbDir}`);
                fs.mkdirSync(dbDir, { recursive: true });
            }
            console.log(`[ResultStore] 📂 Using database path: ${resolved}`);
        }

        this.db = new Database(resolved);
        this.initialize();
    }

    static defaultPath(dataDir: string = process.env.DATA_DIR || path.join(process.cwd(), 'data')): string {
        return path.join(dataDir, 'results.db');
    }

    private initialize() {
        this.db.pragma('foreign_keys = ON');
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS runs (
                run_id TEXT PRIMARY KEY,
                started_at TEXT NOT NULL,
                finished_at TEXT NOT NULL,
                stats TEXT NOT NULL
            );
            CREATE TABLE IF NOT EXISTS results (
                run_id TEXT NOT NULL REFERENCES runs(run_id) ON DELETE CASCADE,
                task_id INTEGER NOT NULL,
                worker_name TEXT NOT NULL,
                source_type TEXT NOT NULL,
                success INTEGER NOT NULL,
                error_message TEXT,
                attempts INTEGER NOT NULL,
                processing_time_ms REAL NOT NULL,
                record_count INTEGER NOT NULL,
                scraped_at INTEGER NOT NULL,
                PRIMARY KEY (run_id, task_id)
            );
            CREATE TABLE IF NOT EXISTS records (
                id INTEGER PRIMARY KEY AUTOINCREMENT,
                run_id TEXT NOT NULL REFERENCES runs(run_id) ON DELETE CASCADE,
                task_id INTEGER NOT NULL,
                source_type TEXT NOT NULL,
                data TEXT NOT NULL
            );
            CREATE INDEX IF NOT EXISTS idx_records_source_type ON records(source_type);
        `);
    }

    /**
     * Write a run with all of its results and records in one transaction.
     */
    saveRun(runId: string, results: readonly Result[], stats: RunStats): void {
        const insertRun = this.db.prepare('INSERT INTO runs (run_id, started_at, finished_at, stats) VALUES (?, ?, ?, ?)');
        const insertResult = this.db.prepare(`
            INSERT INTO results (run_id, task_id, worker_name, source_type, success, error_message, attempts, processing_time_ms, record_count, scraped_at)
            VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        `);
        const insertRecord = this.db.prepare('INSERT INTO records (run_id, task_id, source_type, data) VALUES (?, ?, ?, ?)');

        const write = this.db.transaction(() => {
            insertRun.run(runId, stats.startedAt, stats.finishedAt, JSON.stringify(stats));
            for (const result of results) {
                insertResult.run(
                    runId,
                    result.taskId,
                    result.workerName,
                    result.sourceType,
                    result.success ? 1 : 0,
                    result.errorMessage ?? null,
                    result.attempts,
                    result.processingTimeMs,
                    result.data.length,
                    result.scrapedAt
                );
                for (const record of result.data) {
                    insertRecord.run(runId, result.taskId, result.sourceType, JSON.stringify(record));
                }
            }
        });

        write();
        console.log(`[ResultStore] 💾 Saved run ${runId}: ${results.length} results, ${stats.totalRecords} records`);
    }

    getRun(runId: string): StoredRun | null {
        const row = this.db.prepare<[string], RunRow>('SELECT run_id, started_at, finished_at, stats FROM runs WHERE run_id = ?').get(runId);
        if (!row) return null;

        const stats: RunStats = JSON.parse(row.stats);
        return {
            runId: row.run_id,
            startedAt: row.started_at,
            finishedAt: row.finished_at,
            stats
        };
    }

    getResults(runId: string): StoredResult[] {
        const rows = this.db.prepare<[string], ResultRow>(`
            SELECT task_id, worker_name, source_type, success, error_message, attempts, processing_time_ms, record_count
            FROM results WHERE run_id = ? ORDER BY task_id
        `).all(runId);

        return rows.map(row => ({
            taskId: row.task_id,
            workerName: row.worker_name,
            sourceType: row.source_type,
            success: row.success === 1,
            errorMessage: row.error_message,
            attempts: row.attempts,
            processingTimeMs: row.processing_time_ms,
            recordCount: row.record_count
        }));
    }

    getRecords(sourceType: string, limit = 100): ScrapedRecord[] {
        const rows = this.db.prepare<[string, number], { data: string }>('SELECT data FROM records WHERE source_type = ? ORDER BY id LIMIT ?')
            .all(sourceType, limit);
        return rows.map((row): ScrapedRecord => JSON.parse(row.data));
    }

    getSourceTypeCounts(): Record<string, number> {
        const rows = this.db.prepare<[], { source_type: string; count: number }>('SELECT source_type, COUNT(*) AS count FROM records GROUP BY source_type ORDER BY source_type')
            .all();

        const counts: Record<string, number> = {};
        rows.forEach(row => {
            counts[row.source_type] = row.count;
        });
        return counts;
    }

    close() {
        this.db.close();
    }
}
