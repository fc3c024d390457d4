import { StorageError } from '@facility-pulse/contracts';
import { compareNewestFirst, selectExpiredExecutions } from './retention';
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

type PendingWrite =
    | { kind: 'metric'; row: FacilityMetric }
    | { kind: 'finalize'; executionId: number; status: TerminalStatus; durationMs: number | null };

/**
 * In-process store with the same contract as the Postgres one. Each method
 * completes synchronously inside its promise, so a commit is never
 * interleaved with another caller's writes.
 */
export class MemoryMetricStore implements MetricStore {
    private readonly facilities = new Map<string, Facility>();
    private readonly hvacStatuses = new Map<number, HvacStatus>();
    private readonly executions = new Map<number, SnapshotExecution>();
    private readonly metrics = new Map<number, FacilityMetric>();

    private nextHvacId = 1;
    private nextExecutionId = 1;
    private nextMetricId = 1;
    private closed = false;

    async createExecution(executionTime: Date): Promise<ExecutionHandle> {
        this.assertOpen();
        const row: SnapshotExecution = {
            id: this.nextExecutionId++,
            execution_time: new Date(executionTime),
            status: 'running',
            execution_duration_ms: null,
        };
        this.executions.set(row.id, row);
        return { id: row.id, execution_time: new Date(row.execution_time) };
    }

    async recordMetric(input: NewFacilityMetric): Promise<FacilityMetric> {
        this.assertOpen();
        const row = this.prepareMetric(input);
        this.metrics.set(row.id, row);
        return { ...row };
    }

    async finalizeExecution(executionId: number, status: TerminalStatus, durationMs: number | null): Promise<void> {
        this.assertOpen();
        this.applyFinalize(executionId, status, durationMs);
    }

    async withTransaction<T>(fn: (tx: MetricWriter) => Promise<T>): Promise<T> {
        this.assertOpen();
        const pending: PendingWrite[] = [];
        const stagedMetricExecutions = new Set<number>();

        const tx: MetricWriter = {
            recordMetric: async (input) => {
                const row = this.prepareMetric(input);
                pending.push({ kind: 'metric', row });
                stagedMetricExecutions.add(row.snapshot_id);
                return { ...row };
            },
            finalizeExecution: async (executionId, status, durationMs) => {
                if (!this.executions.has(executionId)) {
                    throw new StorageError(`Snapshot execution ${executionId} does not exist`);
                }
                pending.push({ kind: 'finalize', executionId, status, durationMs });
            },
        };

        const result = await fn(tx);

        // Retention may have removed the parent while the transaction was open.
        for (const executionId of stagedMetricExecutions) {
            if (!this.executions.has(executionId)) {
                throw new StorageError(`Snapshot execution ${executionId} does not exist`);
            }
        }

        for (const write of pending) {
            if (write.kind === 'metric') {
                this.metrics.set(write.row.id, write.row);
            } else {
                this.applyFinalize(write.executionId, write.status, write.durationMs);
            }
        }
        return result;
    }

    async enforceRetention(limit: number): Promise<number> {
        this.assertOpen();
        const expired = selectExpiredExecutions([...this.executions.values()], limit);
        if (expired.length === 0) return 0;

        const expiredIds = new Set(expired);
        for (const [metricId, metric] of this.metrics) {
            if (expiredIds.has(metric.snapshot_id)) this.metrics.delete(metricId);
        }
        for (const id of expiredIds) this.executions.delete(id);

        return expired.length;
    }

    async listActiveFacilities(): Promise<Facility[]> {
        this.assertOpen();
        return [...this.facilities.values()]
            .filter((f) => f.is_active)
            .sort((a, b) => a.id.localeCompare(b.id))
            .map((f) => ({ ...f }));
    }

    async listHvacStatuses(): Promise<HvacStatus[]> {
        this.assertOpen();
        return [...this.hvacStatuses.values()].map((s) => ({ ...s }));
    }

    async findFacility(id: string): Promise<Facility | null> {
        this.assertOpen();
        const facility = this.facilities.get(id);
        return facility ? { ...facility } : null;
    }

    async seedReferenceData(data: ReferenceData): Promise<SeedResult> {
        this.assertOpen();
        const result: SeedResult = { facilities: 0, hvacStatuses: 0 };

        if (this.hvacStatuses.size === 0) {
            for (const seed of data.hvacStatuses) {
                const id = this.nextHvacId++;
                this.hvacStatuses.set(id, { id, code: seed.code, description: seed.description });
                result.hvacStatuses++;
            }
        }

        if (this.facilities.size === 0) {
            for (const seed of data.facilities) {
                if (!Number.isInteger(seed.capacity) || seed.capacity <= 0) {
                    throw new StorageError(`Facility ${seed.id} must have a positive integer capacity`);
                }
                this.facilities.set(seed.id, { ...seed });
                result.facilities++;
            }
        }

        return result;
    }

    async countExecutions(): Promise<number> {
        this.assertOpen();
        return this.executions.size;
    }

    async countMetrics(): Promise<number> {
        this.assertOpen();
        return this.metrics.size;
    }

    async listExecutions(limit: number): Promise<SnapshotExecution[]> {
        this.assertOpen();
        return [...this.executions.values()]
            .sort(compareNewestFirst)
            .slice(0, limit)
            .map((e) => ({ ...e, execution_time: new Date(e.execution_time) }));
    }

    async latestExecution(): Promise<SnapshotExecution | null> {
        const [latest] = await this.listExecutions(1);
        return latest ?? null;
    }

    async listMetricsForExecution(executionId: number): Promise<FacilityMetric[]> {
        this.assertOpen();
        return [...this.metrics.values()]
            .filter((m) => m.snapshot_id === executionId)
            .map((m) => ({ ...m }));
    }

    async findMetric(executionId: number, facilityId: string): Promise<FacilityMetric | null> {
        this.assertOpen();
        for (const metric of this.metrics.values()) {
            if (metric.snapshot_id === executionId && metric.facility_id === facilityId) {
                return { ...metric };
            }
        }
        return null;
    }

    async facilityHistory(facilityId: string, limit: number): Promise<FacilityMetric[]> {
        this.assertOpen();
        return [...this.metrics.values()]
            .filter((m) => m.facility_id === facilityId)
            .sort((a, b) => b.recorded_at.getTime() - a.recorded_at.getTime() || b.id - a.id)
            .slice(0, limit)
            .map((m) => ({ ...m }));
    }

    async facilityAverages(facilityId: string, from: Date, to: Date): Promise<FacilityAverages> {
        this.assertOpen();
        const rows = [...this.metrics.values()].filter(
            (m) =>
                m.facility_id === facilityId &&
                m.recorded_at.getTime() >= from.getTime() &&
                m.recorded_at.getTime() <= to.getTime(),
        );

        if (rows.length === 0) {
            return { occupancy: null, energy_kwh: null, water_liters: null, open_tickets: null };
        }

        const mean = (pick: (m: FacilityMetric) => number) =>
            rows.reduce((sum, m) => sum + pick(m), 0) / rows.length;

        return {
            occupancy: mean((m) => m.occupancy),
            energy_kwh: mean((m) => m.energy_kwh),
            water_liters: mean((m) => m.water_liters),
            open_tickets: mean((m) => m.open_tickets),
        };
    }

    async ping(): Promise<void> {
        this.assertOpen();
    }

    async close(): Promise<void> {
        this.closed = true;
    }

    // ─── Internals ───────────────────────────────────────────────────────────

    private prepareMetric(input: NewFacilityMetric): FacilityMetric {
        if (!this.executions.has(input.snapshot_id)) {
            throw new StorageError(`Snapshot execution ${input.snapshot_id} does not exist`);
        }
        if (!this.facilities.has(input.facility_id)) {
            throw new StorageError(`Facility ${input.facility_id} does not exist`);
        }
        if (!this.hvacStatuses.has(input.hvac_status_id)) {
            throw new StorageError(`HVAC status ${input.hvac_status_id} does not exist`);
        }
        return { ...input, recorded_at: new Date(input.recorded_at), id: this.nextMetricId++ };
    }

    private applyFinalize(executionId: number, status: TerminalStatus, durationMs: number | null): void {
        const execution = this.executions.get(executionId);
        if (!execution) {
            throw new StorageError(`Snapshot execution ${executionId} does not exist`);
        }
        execution.status = status;
        execution.execution_duration_ms = durationMs;
    }

    private assertOpen(): void {
        if (this.closed) {
            throw new StorageError('Metric store is closed');
        }
    }
}
