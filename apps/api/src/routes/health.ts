import { FastifyInstance } from 'fastify';
import type { HealthResponse, PublicSummaryV1 } from '@facility-pulse/contracts';

export interface PublicRoutesOptions {
    serviceName: string;
}

export default async function publicRoutes(fastify: FastifyInstance, opts: PublicRoutesOptions) {
    fastify.get('/health', async (request, reply) => {
        try {
            await fastify.store.ping();
        } catch (error) {
            request.log.warn({ err: error }, 'Health check: store unreachable');
            return reply.code(503).send({
                status: 'unhealthy',
                error: error instanceof Error ? error.message : String(error),
            });
        }

        const body: HealthResponse = {
            status: 'healthy',
            service: opts.serviceName,
            database: 'connected',
            scheduler_running: fastify.jobController.status().scheduler_running,
            timestamp: new Date().toISOString(),
        };
        return body;
    });

    fastify.get('/api/v1/public/summary', async (): Promise<PublicSummaryV1> => {
        const [totalSnapshots, totalRecords] = await Promise.all([
            fastify.store.countExecutions(),
            fastify.store.countMetrics(),
        ]);
        return {
            service: opts.serviceName,
            total_snapshots: totalSnapshots,
            total_records: totalRecords,
        };
    });
}
