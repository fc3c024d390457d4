import type { ExecutionStatus } from '@facility-pulse/contracts';

// ─── Rows ────────────────────────────────────────────────────────────────────

export interface Facility {
    id: string;
    name: string;
    city: string;
    capacity: number;
    is_active: boolean;
}

export interface HvacStatus {
    id: number;
    code: string;
    description: string | null;
}

export interface SnapshotExecution {
    id: number;
    execution_time: Date;
    status: ExecutionStatus;
    execution_duration_ms: number | null;
}

export interface FacilityMetric {
    id: number;
    snapshot_id: number;
    facility_id: string;
    hvac_status_id: number;
    occupancy: number;
    energy_kwh: number;
    water_liters: number;
    open_tickets: number;
    recorded_at: Date;
}

export type NewFacilityMetric = Omit<FacilityMetric, 'id'>;

export type TerminalStatus = Exclude<ExecutionStatus, 'running'>;

export interface ExecutionHandle {
    id: number;
    execution_time: Date;
}

export interface FacilityAverages {
    occupancy: number | null;
    energy_kwh: number | null;
    water_liters: number | null;
    open_tickets: number | null;
}

// ─── Seeding ─────────────────────────────────────────────────────────────────

export type FacilitySeed = Facility;

export interface HvacStatusSeed {
    code: string;
    description: string;
}

export interface ReferenceData {
    facilities: FacilitySeed[];
    hvacStatuses: HvacStatusSeed[];
}

export interface SeedResult {
    facilities: number;
    hvacStatuses: number;
}

// ─── Store contract ──────────────────────────────────────────────────────────

/**
 * Writes that may run inside a transaction. Every method rejects with
 * `StorageError` on connectivity or constraint failure.
 */
export interface MetricWriter {
    recordMetric(input: NewFacilityMetric): Promise<FacilityMetric>;
    /** Sets the terminal status. Callers finalize each execution once. */
    finalizeExecution(executionId: number, status: TerminalStatus, durationMs: number | null): Promise<void>;
}

export interface MetricStore extends MetricWriter {
    createExecution(executionTime: Date): Promise<ExecutionHandle>;

    /**
     * Runs `fn` against a writer whose changes commit together when `fn`
     * resolves and are discarded when it rejects.
     */
    withTransaction<T>(fn: (tx: MetricWriter) => Promise<T>): Promise<T>;

    /**
     * Keeps the `limit` most recent executions (by execution_time, then id)
     * and deletes the rest together with their metric rows, in one
     * transaction. Resolves with the number of executions purged.
     */
    enforceRetention(limit: number): Promise<number>;

    listActiveFacilities(): Promise<Facility[]>;
    listHvacStatuses(): Promise<HvacStatus[]>;
    findFacility(id: string): Promise<Facility | null>;
    seedReferenceData(data: ReferenceData): Promise<SeedResult>;

    countExecutions(): Promise<number>;
    countMetrics(): Promise<number>;
    /** Newest first. */
    listExecutions(limit: number): Promise<SnapshotExecution[]>;
    latestExecution(): Promise<SnapshotExecution | null>;
    listMetricsForExecution(executionId: number): Promise<FacilityMetric[]>;
    findMetric(executionId: number, facilityId: string): Promise<FacilityMetric | null>;
    /** Newest `recorded_at` first, at most `limit` rows. */
    facilityHistory(facilityId: string, limit: number): Promise<FacilityMetric[]>;
    /** Averages over the inclusive [from, to] range; fields are null when nothing matched. */
    facilityAverages(facilityId: string, from: Date, to: Date): Promise<FacilityAverages>;

    ping(): Promise<void>;
    close(): Promise<void>;
}
