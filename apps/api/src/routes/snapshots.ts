import { FastifyInstance } from 'fastify';
import {
    NotFoundError,
    type LatestSnapshotV1,
    type SnapshotCountV1,
    type SnapshotSummaryV1,
} from '@facility-pulse/contracts';
import { toFacilityMetric, toSnapshotSummary } from './mappers';

const RECENT_SNAPSHOTS_LIMIT = 20;

export default async function snapshotRoutes(fastify: FastifyInstance) {
    fastify.addHook('preHandler', fastify.requireAuth(['basic', 'apikey']));

    // GET /snapshots/count
    fastify.get('/snapshots/count', async (): Promise<SnapshotCountV1> => {
        return { total_executions: await fastify.store.countExecutions() };
    });

    // GET /snapshots/latest
    fastify.get('/snapshots/latest', async (): Promise<LatestSnapshotV1> => {
        const snapshot = await fastify.store.latestExecution();
        if (!snapshot) {
            throw new NotFoundError('No data available');
        }

        const metrics = await fastify.store.listMetricsForExecution(snapshot.id);
        return {
            version: 'v1',
            snapshot_id: snapshot.id,
            execution_time: snapshot.execution_time.toISOString(),
            status: snapshot.status,
            facilities: metrics.map(toFacilityMetric),
        };
    });

    // GET /snapshots
    fastify.get('/snapshots', async (): Promise<SnapshotSummaryV1[]> => {
        const snapshots = await fastify.store.listExecutions(RECENT_SNAPSHOTS_LIMIT);
        return snapshots.map(toSnapshotSummary);
    });
}
