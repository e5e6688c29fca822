import { FastifyRequest, FastifyReply } from 'fastify';
import { z } from 'zod';
import { SCRAPER_KINDS, ScrapedRecord } from '../scheduler/types';
import type { StoredResult, StoredRun } from '../services/ResultStore';
import { errorResponse, listResponse, successResponse } from '../utils/response';

/** Reads over persisted runs; `ResultStore` provides them. */
export interface RunHistory {
    getRun(runId: string): StoredRun | null;
    getResults(runId: string): StoredResult[];
    getRecords(sourceType: string, limit?: number): ScrapedRecord[];
    getSourceTypeCounts(): Record<string, number>;
}

const recordsQuerySchema = z.object({
    type: z.enum(SCRAPER_KINDS),
    limit: z.coerce.number().int().min(1).max(1000).default(100)
});

export class HistoryController {
    private readonly history: RunHistory;

    constructor(history: RunHistory) {
        this.history = history;
    }

    getRun = async (req: FastifyRequest<{ Params: { id: string } }>, reply: FastifyReply) => {
        const run = this.history.getRun(req.params.id);
        if (!run) {
            return reply.status(404).send(errorResponse(`Run '${req.params.id}' not found`, 404));
        }
        return reply.send(successResponse({ run, results: this.history.getResults(run.runId) }));
    };

    listRecords = async (req: FastifyRequest, reply: FastifyReply) => {
        const parsed = recordsQuerySchema.safeParse(req.query);
        if (!parsed.success) {
            return reply.status(400).send(errorResponse('Validation Failed', 400, parsed.error.issues));
        }

        const { type, limit } = parsed.data;
        const counts = this.history.getSourceTypeCounts();
        const records = this.history.getRecords(type, limit);
        return reply.send(listResponse(records, counts[type] ?? 0));
    };

    getRecordCounts = async (_req: FastifyRequest, reply: FastifyReply) => {
        return reply.send(successResponse(this.history.getSourceTypeCounts()));
    };
}
