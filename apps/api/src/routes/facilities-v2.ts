import { FastifyInstance } from 'fastify';
import { NotFoundError, type FacilityMetricsV2 } from '@facility-pulse/contracts';
import { roundTo2 } from './mappers';

export default async function facilityV2Routes(fastify: FastifyInstance) {
    fastify.addHook('preHandler', fastify.requireAuth(['basic', 'apikey', 'bearer']));

    // GET /facilities/:facilityId/metrics: the facility's row in the latest snapshot
    fastify.get<{ Params: { facilityId: string } }>(
        '/facilities/:facilityId/metrics',
        async (request): Promise<FacilityMetricsV2> => {
            const snapshot = await fastify.store.latestExecution();
            if (!snapshot) {
                throw new NotFoundError('No data available');
            }

            const metric = await fastify.store.findMetric(snapshot.id, request.params.facilityId);
            if (!metric) {
                throw new NotFoundError('Facility not found');
            }

            return {
                version: 'v2',
                metadata: {
                    snapshot_id: snapshot.id,
                    execution_time: snapshot.execution_time.toISOString(),
                },
                operational: {
                    occupancy: metric.occupancy,
                    open_tickets: metric.open_tickets,
                },
                utilities: {
                    energy_kwh: metric.energy_kwh,
                    water_liters: metric.water_liters,
                    energy_per_person: metric.occupancy > 0 ? roundTo2(metric.energy_kwh / metric.occupancy) : null,
                },
            };
        },
    );
}
