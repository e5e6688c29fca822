import Fastify, { FastifyInstance } from 'fastify';
import { HistoryController, RunHistory } from './controllers/HistoryController';
import { MonitorController, MonitorSource } from './controllers/MonitorController';
import { errorResponse } from './utils/response';

export interface ServerOptions {
    logLevel?: string;
    /** Enables the `/runs` and `/records` endpoints over stored runs. */
    history?: RunHistory;
}

/**
 * Monitoring API over a running (or finished) pool.
 */
export function buildServer(source: MonitorSource, options: ServerOptions = {}): FastifyInstance {
    const server = Fastify({
        logger: {
            level: options.logLevel || process.env.LOG_LEVEL || 'info'
        }
    });

    // Global Error Handler
    server.setErrorHandler((error, request, reply) => {
        server.log.error(error);
        reply.status(500).send(errorResponse(error.message || 'Internal Server Error', 500));
    });

    const monitor = new MonitorController(source);

    server.get('/', async () => {
        return { status: 'ok', message: 'Fetch pool monitor is running' };
    });

    server.get('/health', async () => {
        return { status: 'ok' };
    });

    server.get('/status', monitor.getStatus);
    server.get('/stats', monitor.getStats);
    server.get<{ Params: { name: string } }>('/workers/:name', monitor.getWorker);
    server.get('/results', monitor.listResults);

    if (options.history) {
        const history = new HistoryController(options.history);
        server.get<{ Params: { id: string } }>('/runs/:id', history.getRun);
        server.get('/records', history.listRecords);
        server.get('/records/counts', history.getRecordCounts);
    }

    return server;
}
