import { readFile } from 'fs/promises';
import path from 'path';
import { Pool, type PoolConfig } from 'pg';
import { and, asc, avg, count, desc, eq, gte, inArray, lte, sql } from 'drizzle-orm';
import { drizzle, type NodePgQueryResultHKT } from 'drizzle-orm/node-postgres';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import { StorageError } from '@facility-pulse/contracts';
import * as schema from './schema';
import { facilities, facilityMetrics, hvacStatuses, snapshotExecutions } from './schema';
import { selectExpiredExecutions } from './retention';
import type {
    ExecutionHandle,
    Facility,
    FacilityAverages,
    FacilityMetric,
    HvacStatus,
    MetricStore,
    MetricWriter,
    NewFacilityMetric,
    ReferenceData,
    SeedResult,
    SnapshotExecution,
    TerminalStatus,
} from './types';

// Both the pooled database and a transaction handle satisfy this.
type Executor = PgDatabase<NodePgQueryResultHKT, typeof schema>;

/**
 * Location of the bootstrap DDL. Resolved through the package's own
 * package.json so it is the same from `src/` under tsx and from a `dist/` build.
 */
export function schemaSqlPath(): string {
    const packageRoot = path.dirname(require.resolve('@facility-pulse/database/package.json'));
    return path.join(packageRoot, 'sql', 'schema.sql');
}

/**
 * Wraps driver failures in `StorageError`, keeping the original as `cause`.
 */
async function guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
        return await fn();
    } catch (err) {
        if (err instanceof StorageError) throw err;
        const detail = err instanceof Error ? err.message : String(err);
        throw new StorageError(`${operation} failed: ${detail}`, { cause: err });
    }
}

function toFacility(row: typeof facilities.$inferSelect): Facility {
    return {
        id: row.id,
        name: row.name,
        city: row.city,
        capacity: row.capacity,
        is_active: row.is_active,
    };
}

function toExecution(row: typeof snapshotExecutions.$inferSelect): SnapshotExecution {
    return {
        id: row.id,
        execution_time: row.execution_time,
        status: row.status,
        execution_duration_ms: row.execution_duration_ms,
    };
}

function toMetric(row: typeof facilityMetrics.$inferSelect): FacilityMetric {
    return {
        id: row.id,
        snapshot_id: row.snapshot_id,
        facility_id: row.facility_id,
        hvac_status_id: row.hvac_status_id,
        occupancy: row.occupancy,
        energy_kwh: row.energy_kwh,
        water_liters: row.water_liters,
        open_tickets: row.open_tickets,
        recorded_at: row.recorded_at,
    };
}

// avg() comes back from pg as a numeric string
function toNumberOrNull(value: string | null): number | null {
    return value === null ? null : Number(value);
}

async function insertMetric(db: Executor, input: NewFacilityMetric): Promise<FacilityMetric> {
    const [row] = await db.insert(facilityMetrics).values(input).returning();
    if (!row) {
        throw new StorageError(`Metric for facility ${input.facility_id} was not inserted`);
    }
    return toMetric(row);
}

async function markFinished(
    db: Executor,
    executionId: number,
    status: TerminalStatus,
    durationMs: number | null,
): Promise<void> {
    const updated = await db
        .update(snapshotExecutions)
        .set({ status, execution_duration_ms: durationMs })
        .where(eq(snapshotExecutions.id, executionId))
        .returning({ id: snapshotExecutions.id });

    if (updated.length === 0) {
        throw new StorageError(`Snapshot execution ${executionId} does not exist`);
    }
}

export class PostgresMetricStore implements MetricStore {
    private readonly db: Executor;

    constructor(private readonly pool: Pool) {
        this.db = drizzle(pool, { schema });
    }

    static fromConnectionString(connectionString: string, options: PoolConfig = {}): PostgresMetricStore {
        return new PostgresMetricStore(new Pool({ ...options, connectionString }));
    }

    /** Creates tables and indexes if they do not exist yet. */
    async ensureSchema(): Promise<void> {
        const ddl = await readFile(schemaSqlPath(), 'utf8');
        await guard('ensureSchema', () => this.pool.query(ddl));
    }

    createExecution(executionTime: Date): Promise<ExecutionHandle> {
        return guard('createExecution', async () => {
            const [row] = await this.db
                .insert(snapshotExecutions)
                .values({ execution_time: executionTime, status: 'running' })
                .returning({ id: snapshotExecutions.id, execution_time: snapshotExecutions.execution_time });
            if (!row) {
                throw new StorageError('Snapshot execution was not inserted');
            }
            return row;
        });
    }

    recordMetric(input: NewFacilityMetric): Promise<FacilityMetric> {
        return guard('recordMetric', () => insertMetric(this.db, input));
    }

    finalizeExecution(executionId: number, status: TerminalStatus, durationMs: number | null): Promise<void> {
        return guard('finalizeExecution', () => markFinished(this.db, executionId, status, durationMs));
    }

    withTransaction<T>(fn: (tx: MetricWriter) => Promise<T>): Promise<T> {
        return guard('transaction', () =>
            this.db.transaction(async (tx) => {
                const writer: MetricWriter = {
                    recordMetric: (input) => guard('recordMetric', () => insertMetric(tx, input)),
                    finalizeExecution: (executionId, status, durationMs) =>
                        guard('finalizeExecution', () => markFinished(tx, executionId, status, durationMs)),
                };
                return fn(writer);
            }),
        );
    }

    enforceRetention(limit: number): Promise<number> {
        return guard('enforceRetention', () =>
            this.db.transaction(async (tx) => {
                // Read inside the transaction; rows inserted afterwards are never in the purge set.
                const rows = await tx
                    .select({ id: snapshotExecutions.id, execution_time: snapshotExecutions.execution_time })
                    .from(snapshotExecutions);

                const expired = selectExpiredExecutions(rows, limit);
                if (expired.length === 0) return 0;

                await tx.delete(facilityMetrics).where(inArray(facilityMetrics.snapshot_id, expired));
                await tx.delete(snapshotExecutions).where(inArray(snapshotExecutions.id, expired));

                return expired.length;
            }),
        );
    }

    listActiveFacilities(): Promise<Facility[]> {
        return guard('listActiveFacilities', async () => {
            const rows = await this.db
                .select()
                .from(facilities)
                .where(eq(facilities.is_active, true))
                .orderBy(asc(facilities.id));
            return rows.map(toFacility);
        });
    }

    listHvacStatuses(): Promise<HvacStatus[]> {
        return guard('listHvacStatuses', () =>
            this.db
                .select({ id: hvacStatuses.id, code: hvacStatuses.code, description: hvacStatuses.description })
                .from(hvacStatuses)
                .orderBy(asc(hvacStatuses.id)),
        );
    }

    findFacility(id: string): Promise<Facility | null> {
        return guard('findFacility', async () => {
            const [row] = await this.db.select().from(facilities).where(eq(facilities.id, id)).limit(1);
            return row ? toFacility(row) : null;
        });
    }

    seedReferenceData(data: ReferenceData): Promise<SeedResult> {
        return guard('seedReferenceData', () =>
            this.db.transaction(async (tx) => {
                const result: SeedResult = { facilities: 0, hvacStatuses: 0 };

                const [hvac] = await tx.select({ value: count() }).from(hvacStatuses);
                if ((hvac?.value ?? 0) === 0 && data.hvacStatuses.length > 0) {
                    await tx.insert(hvacStatuses).values(data.hvacStatuses);
                    result.hvacStatuses = data.hvacStatuses.length;
                }

                const [fac] = await tx.select({ value: count() }).from(facilities);
                if ((fac?.value ?? 0) === 0 && data.facilities.length > 0) {
                    await tx.insert(facilities).values(data.facilities);
                    result.facilities = data.facilities.length;
                }

                return result;
            }),
        );
    }

    countExecutions(): Promise<number> {
        return guard('countExecutions', async () => {
            const [row] = await this.db.select({ value: count() }).from(snapshotExecutions);
            return row?.value ?? 0;
        });
    }

    countMetrics(): Promise<number> {
        return guard('countMetrics', async () => {
            const [row] = await this.db.select({ value: count() }).from(facilityMetrics);
            return row?.value ?? 0;
        });
    }

    listExecutions(limit: number): Promise<SnapshotExecution[]> {
        return guard('listExecutions', async () => {
            const rows = await this.db
                .select()
                .from(snapshotExecutions)
                .orderBy(desc(snapshotExecutions.execution_time), desc(snapshotExecutions.id))
                .limit(limit);
            return rows.map(toExecution);
        });
    }

    async latestExecution(): Promise<SnapshotExecution | null> {
        const [latest] = await this.listExecutions(1);
        return latest ?? null;
    }

    listMetricsForExecution(executionId: number): Promise<FacilityMetric[]> {
        return guard('listMetricsForExecution', async () => {
            const rows = await this.db
                .select()
                .from(facilityMetrics)
                .where(eq(facilityMetrics.snapshot_id, executionId))
                .orderBy(asc(facilityMetrics.id));
            return rows.map(toMetric);
        });
    }

    findMetric(executionId: number, facilityId: string): Promise<FacilityMetric | null> {
        return guard('findMetric', async () => {
            const [row] = await this.db
                .select()
                .from(facilityMetrics)
                .where(and(eq(facilityMetrics.snapshot_id, executionId), eq(facilityMetrics.facility_id, facilityId)))
                .limit(1);
            return row ? toMetric(row) : null;
        });
    }

    facilityHistory(facilityId: string, limit: number): Promise<FacilityMetric[]> {
        return guard('facilityHistory', async () => {
            const rows = await this.db
                .select()
                .from(facilityMetrics)
                .where(eq(facilityMetrics.facility_id, facilityId))
                .orderBy(desc(facilityMetrics.recorded_at), desc(facilityMetrics.id))
                .limit(limit);
            return rows.map(toMetric);
        });
    }

    facilityAverages(facilityId: string, from: Date, to: Date): Promise<FacilityAverages> {
        return guard('facilityAverages', async () => {
            const [row] = await this.db
                .select({
                    occupancy: avg(facilityMetrics.occupancy),
                    energy_kwh: avg(facilityMetrics.energy_kwh),
                    water_liters: avg(facilityMetrics.water_liters),
                    open_tickets: avg(facilityMetrics.open_tickets),
                })
                .from(facilityMetrics)
                .where(
                    and(
                        eq(facilityMetrics.facility_id, facilityId),
                        gte(facilityMetrics.recorded_at, from),
                        lte(facilityMetrics.recorded_at, to),
                    ),
                );

            return {
                occupancy: toNumberOrNull(row?.occupancy ?? null),
                energy_kwh: toNumberOrNull(row?.energy_kwh ?? null),
                water_liters: toNumberOrNull(row?.water_liters ?? null),
                open_tickets: toNumberOrNull(row?.open_tickets ?? null),
            };
        });
    }

    async ping(): Promise<void> {
        await guard('ping', () => this.db.execute(sql`select 1`));
    }

    async close(): Promise<void> {
        await this.pool.end();
    }
}
