import 'dotenv/config';
import { randomUUID } from 'crypto';
import type { FastifyInstance } from 'fastify';
import { ConfigurationError, PoolExhaustionError, errorMessage } from './errors';
import { Master } from './scheduler/Master';
import { RateLimiter } from './scheduler/RateLimiter';
import { FetchHttpClient } from './scrapers/HttpClient';
import { DefaultScraperSelector } from './scrapers/ScraperSelector';
import { buildServer } from './server';
import { ResultStore } from './services/ResultStore';
import { loadConfig, loadTaskFile, resolveWorkerBounds } from './utils/config';

const start = async () => {
    const config = loadConfig();
    const taskFile = loadTaskFile(config.tasksFile);
    const { minWorkers, maxWorkers } = resolveWorkerBounds(config, taskFile);

    const selector = new DefaultScraperSelector({
        http: new FetchHttpClient({ timeoutMs: config.httpTimeoutMs }),
        defaultFeedUrl: config.rssDefaultFeed,
        enabled: config.enabledScrapers
    });

    const master = new Master({
        selector,
        rateLimiter: new RateLimiter(config.rateLimitRps),
        maxAttempts: config.maxAttempts,
        retryDelayMs: config.retryDelayMs,
        attemptTimeoutMs: config.attemptTimeoutMs,
        maxTaskRequeues: config.maxTaskRequeues,
        monitorIntervalMs: config.monitorIntervalMs
    });
    master.submit(taskFile.tasks);

    const store = new ResultStore(ResultStore.defaultPath(config.dataDir));

    let server: FastifyInstance | null = null;
    if (config.monitorPort !== undefined) {
        server = buildServer(master, { logLevel: config.logLevel, history: store });
        await server.listen({ port: config.monitorPort, host: '0.0.0.0' });
        console.log(`Monitor listening on port ${config.monitorPort}`);
    }

    const onSigint = () => master.cancel('SIGINT');
    process.once('SIGINT', onSigint);

    try {
        const stats = await master.run(minWorkers, maxWorkers);
        const runId = randomUUID();
        store.saveRun(runId, master.getResults(), stats);
        console.log(`✅ Run ${runId} stored: ${stats.succeeded}/${stats.total} tasks succeeded`);
    } finally {
        process.removeListener('SIGINT', onSigint);
        if (server) await server.close();
        store.close();
    }
};

start().catch(err => {
    if (err instanceof ConfigurationError || err instanceof PoolExhaustionError) {
        console.error(`❌ ${err.name}: ${err.message}`);
    } else {
        console.error('❌ Run failed:', errorMessage(err));
    }
    process.exit(1);
});
