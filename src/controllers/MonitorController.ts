import { FastifyRequest, FastifyReply } from 'fastify';
import { z } from 'zod';
import { SCRAPER_KINDS, Result, RunSnapshot } from '../scheduler/types';
import type { RunStats } from '../utils/metrics';
import { errorResponse, listResponse, successResponse } from '../utils/response';

/** What the monitoring endpoints read from a run. */
export interface MonitorSource {
    snapshot(): RunSnapshot;
    getStats(): RunStats;
    getResults(): Result[];
}

const resultsQuerySchema = z.object({
    success: z.enum(['true', 'false']).optional().transform(val => (val === undefined ? undefined : val === 'true')),
    type: z.enum(SCRAPER_KINDS).optional(),
    limit: z.coerce.number().int().min(1).max(1000).default(100)
});

/**
 * Read-only views of a run: snapshot, running stats, per-worker status and
 * finished results.
 */
export class MonitorController {
    private readonly source: MonitorSource;

    constructor(source: MonitorSource) {
        this.source = source;
    }

    getStatus = async (_req: FastifyRequest, reply: FastifyReply) => {
        return reply.send(successResponse(this.source.snapshot()));
    };

    getStats = async (_req: FastifyRequest, reply: FastifyReply) => {
        return reply.send(successResponse(this.source.getStats()));
    };

    getWorker = async (req: FastifyRequest<{ Params: { name: string } }>, reply: FastifyReply) => {
        const worker = this.source.snapshot().workers.find(w => w.name === req.params.name);
        if (!worker) {
            return reply.status(404).send(errorResponse(`Worker '${req.params.name}' not found`, 404));
        }
        return reply.send(successResponse(worker));
    };

    listResults = async (req: FastifyRequest, reply: FastifyReply) => {
        const parsed = resultsQuerySchema.safeParse(req.query);
        if (!parsed.success) {
            return reply.status(400).send(errorResponse('Validation Failed', 400, parsed.error.issues));
        }

        const { success, type, limit } = parsed.data;
        const matched = this.source.getResults()
            .filter(r => success === undefined || r.success === success)
            .filter(r => type === undefined || r.sourceType === type);
        const results = matched.slice(0, limit);

        req.log.info({ count: results.length, matched: matched.length, msg: 'Listing results' });
        return reply.send(listResponse(results, matched.length));
    };
}
