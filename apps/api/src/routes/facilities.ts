import { FastifyInstance } from 'fastify';
import { z } from 'zod';
import {
    ValidationError,
    type FacilityAggregateV1,
    type FacilityHistoryV1,
} from '@facility-pulse/contracts';
import { roundTo2, toHistoryRecord } from './mappers';

const HISTORY_LIMIT = 50;

interface FacilityParams {
    facilityId: string;
}

interface AggregateQuery {
    from_time?: string;
    to_time?: string;
}

// ISO 8601 only: a full date-time with or without an offset, or a bare date.
const isoTimestamp = z.union([z.string().datetime({ offset: true, local: true }), z.string().date()]);

const aggregateQuerySchema = z.object({
    from_time: isoTimestamp,
    to_time: isoTimestamp,
});

const ZONE_SUFFIX = /(?:Z|[+-]\d{2}(?::?\d{2})?)$/;
const OFFSET_SUFFIX = /([+-]\d{2}):?(\d{2})?$/;

/**
 * Converts a value accepted by `isoTimestamp` to a Date. Values without a
 * zone are read as UTC, never in the host's local time.
 */
export function parseIsoTimestamp(value: string): Date {
    if (!value.includes('T')) {
        return new Date(`${value}T00:00:00Z`);
    }
    if (!ZONE_SUFFIX.test(value)) {
        return new Date(`${value}Z`);
    }
    // Date.parse only takes the +HH:MM offset form.
    return new Date(value.replace(OFFSET_SUFFIX, (_match, hours: string, minutes?: string) => `${hours}:${minutes ?? '00'}`));
}

function parseAggregateQuery(query: unknown): { from: Date; to: Date } {
    const parsed = aggregateQuerySchema.safeParse(query);
    if (!parsed.success) {
        throw new ValidationError('Invalid datetime format.');
    }
    const from = parseIsoTimestamp(parsed.data.from_time);
    const to = parseIsoTimestamp(parsed.data.to_time);
    if (isNaN(from.getTime()) || isNaN(to.getTime())) {
        throw new ValidationError('Invalid datetime format.');
    }
    return { from, to };
}

export default async function facilityRoutes(fastify: FastifyInstance) {
    // GET /facilities/:facilityId/history
    fastify.get<{ Params: FacilityParams }>(
        '/facilities/:facilityId/history',
        { preHandler: fastify.requireAuth(['basic', 'apikey']) },
        async (request): Promise<FacilityHistoryV1> => {
            const { facilityId } = request.params;
            const records = await fastify.store.facilityHistory(facilityId, HISTORY_LIMIT);
            return {
                facility_id: facilityId,
                records: records.map(toHistoryRecord),
            };
        },
    );

    // GET /facilities/:facilityId/aggregate?from_time=...&to_time=...
    fastify.get<{ Params: FacilityParams; Querystring: AggregateQuery }>(
        '/facilities/:facilityId/aggregate',
        { preHandler: fastify.requireAuth(['basic', 'apikey', 'bearer']) },
        async (request): Promise<FacilityAggregateV1> => {
            const { facilityId } = request.params;
            const { from, to } = parseAggregateQuery(request.query);

            const averages = await fastify.store.facilityAverages(facilityId, from, to);
            return {
                facility_id: facilityId,
                from_time: from.toISOString(),
                to_time: to.toISOString(),
                averages: {
                    avg_occupancy: roundTo2(averages.occupancy ?? 0),
                    avg_energy_kwh: roundTo2(averages.energy_kwh ?? 0),
                    avg_water_liters: roundTo2(averages.water_liters ?? 0),
                    avg_open_tickets: roundTo2(averages.open_tickets ?? 0),
                },
            };
        },
    );
}
