export type ExecutionStatus = 'running' | 'success' | 'failed';

// Timestamps are ISO 8601 strings on the wire.

export interface SnapshotSummaryV1 {
    snapshot_id: number;
    execution_time: string;
    status: ExecutionStatus;
    duration_ms: number | null;
}

export interface FacilityMetricV1 {
    facility_id: string;
    occupancy: number;
    energy_kwh: number;
    water_liters: number;
    open_tickets: number;
    recorded_at: string;
}

export interface LatestSnapshotV1 {
    version: 'v1';
    snapshot_id: number;
    execution_time: string;
    status: ExecutionStatus;
    facilities: FacilityMetricV1[];
}

export interface SnapshotCountV1 {
    total_executions: number;
}

export interface PublicSummaryV1 {
    service: string;
    total_snapshots: number;
    total_records: number;
}

export interface FacilityHistoryRecordV1 {
    snapshot_id: number;
    occupancy: number;
    energy_kwh: number;
    water_liters: number;
    open_tickets: number;
    recorded_at: string;
}

export interface FacilityHistoryV1 {
    facility_id: string;
    records: FacilityHistoryRecordV1[];
}

export interface FacilityAveragesV1 {
    avg_occupancy: number;
    avg_energy_kwh: number;
    avg_water_liters: number;
    avg_open_tickets: number;
}

export interface FacilityAggregateV1 {
    facility_id: string;
    from_time: string;
    to_time: string;
    averages: FacilityAveragesV1;
}

export interface FacilityMetricsV2 {
    version: 'v2';
    metadata: {
        snapshot_id: number;
        execution_time: string;
    };
    operational: {
        occupancy: number;
        open_tickets: number;
    };
    utilities: {
        energy_kwh: number;
        water_liters: number;
        // null when the facility reported zero occupancy
        energy_per_person: number | null;
    };
}

export interface HealthResponse {
    status: 'healthy';
    service: string;
    database: 'connected';
    scheduler_running: boolean;
    timestamp: string;
}
