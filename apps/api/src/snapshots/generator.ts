import type { BaseLogger } from 'pino';
import { ConfigError } from '@facility-pulse/contracts';
import {
    SNAPSHOT_RETENTION_LIMIT,
    type Facility,
    type HvacStatus,
    type MetricStore,
    type NewFacilityMetric,
} from '@facility-pulse/database';
import { mathRandom, pickOne, randomFloat, randomInt, type RandomSource } from './random';

export const ENERGY_KWH_RANGE = [10_000, 30_000] as const;
export const WATER_LITERS_RANGE = [20_000, 60_000] as const;
export const OPEN_TICKETS_RANGE = [0, 20] as const;

export type GenerationResult =
    | {
          status: 'success';
          executionId: number;
          metricCount: number;
          durationMs: number;
          purged: number;
      }
    | {
          status: 'failed';
          // null when the execution row itself could not be created
          executionId: number | null;
          error: Error;
      };

export interface SnapshotGeneratorOptions {
    store: MetricStore;
    logger: BaseLogger;
    retentionLimit?: number;
    random?: RandomSource;
    clock?: () => Date;
}

/** Occupancy bounds for a facility: [floor(0.4 * capacity), floor(0.9 * capacity)]. */
export function occupancyRange(capacity: number): [number, number] {
    return [Math.floor(0.4 * capacity), Math.floor(0.9 * capacity)];
}

function toError(err: unknown): Error {
    return err instanceof Error ? err : new Error(String(err));
}

/**
 * Produces one snapshot execution plus one metric row per active facility.
 *
 * `run()` never rejects: any failure is recorded on the execution row as
 * `failed` and returned, so the recurring trigger keeps firing.
 */
export class SnapshotGenerator {
    private readonly store: MetricStore;
    private readonly logger: BaseLogger;
    private readonly retentionLimit: number;
    private readonly random: RandomSource;
    private readonly clock: () => Date;

    constructor(opts: SnapshotGeneratorOptions) {
        this.store = opts.store;
        this.logger = opts.logger;
        this.retentionLimit = opts.retentionLimit ?? SNAPSHOT_RETENTION_LIMIT;
        this.random = opts.random ?? mathRandom;
        this.clock = opts.clock ?? (() => new Date());
    }

    async run(): Promise<GenerationResult> {
        const startedAt = this.clock();

        const created = await this.store.createExecution(startedAt).then(
            (handle) => ({ ok: true as const, id: handle.id }),
            (err: unknown) => ({ ok: false as const, error: toError(err) }),
        );
        if (!created.ok) {
            this.logger.error({ err: created.error }, 'Could not create snapshot execution');
            return { status: 'failed', executionId: null, error: created.error };
        }
        const executionId = created.id;

        let outcome: { metricCount: number; durationMs: number };
        try {
            const [facilities, statuses] = await Promise.all([
                this.store.listActiveFacilities(),
                this.store.listHvacStatuses(),
            ]);
            if (statuses.length === 0) {
                throw new ConfigError('No HVAC statuses configured');
            }

            outcome = await this.store.withTransaction(async (tx) => {
                for (const facility of facilities) {
                    await tx.recordMetric(this.synthesize(executionId, facility, statuses));
                }
                const elapsed = this.elapsedSince(startedAt);
                await tx.finalizeExecution(executionId, 'success', elapsed);
                return { metricCount: facilities.length, durationMs: elapsed };
            });
        } catch (err) {
            return this.fail(executionId, startedAt, toError(err));
        }

        const { metricCount, durationMs } = outcome;
        let purged = 0;
        try {
            purged = await this.store.enforceRetention(this.retentionLimit);
        } catch (err) {
            // The snapshot is already committed; retention catches up on the next run.
            this.logger.warn({ err, executionId }, 'Retention pass failed');
        }

        this.logger.info({ executionId, metricCount, durationMs, purged }, 'Snapshot generated');
        return { status: 'success', executionId, metricCount, durationMs, purged };
    }

    private synthesize(snapshotId: number, facility: Facility, statuses: readonly HvacStatus[]): NewFacilityMetric {
        const [minOccupancy, maxOccupancy] = occupancyRange(facility.capacity);
        return {
            snapshot_id: snapshotId,
            facility_id: facility.id,
            hvac_status_id: pickOne(this.random, statuses).id,
            occupancy: randomInt(this.random, minOccupancy, maxOccupancy),
            energy_kwh: randomFloat(this.random, ...ENERGY_KWH_RANGE),
            water_liters: randomFloat(this.random, ...WATER_LITERS_RANGE),
            open_tickets: randomInt(this.random, ...OPEN_TICKETS_RANGE),
            recorded_at: this.clock(),
        };
    }

    private async fail(executionId: number, startedAt: Date, error: Error): Promise<GenerationResult> {
        this.logger.error({ err: error, executionId }, 'Snapshot generation failed');
        try {
            await this.store.finalizeExecution(executionId, 'failed', this.elapsedSince(startedAt));
        } catch (finalizeErr) {
            this.logger.error({ err: finalizeErr, executionId }, 'Could not mark snapshot execution as failed');
        }
        return { status: 'failed', executionId, error };
    }

    private elapsedSince(startedAt: Date): number {
        return Math.max(0, this.clock().getTime() - startedAt.getTime());
    }
}
