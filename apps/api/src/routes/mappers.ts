import type {
    FacilityHistoryRecordV1,
    FacilityMetricV1,
    SnapshotSummaryV1,
} from '@facility-pulse/contracts';
import type { FacilityMetric, SnapshotExecution } from '@facility-pulse/database';

export function roundTo2(value: number): number {
    return Math.round(value * 100) / 100;
}

export function toSnapshotSummary(execution: SnapshotExecution): SnapshotSummaryV1 {
    return {
        snapshot_id: execution.id,
        execution_time: execution.execution_time.toISOString(),
        status: execution.status,
        duration_ms: execution.execution_duration_ms,
    };
}

export function toFacilityMetric(metric: FacilityMetric): FacilityMetricV1 {
    return {
        facility_id: metric.facility_id,
        occupancy: metric.occupancy,
        energy_kwh: metric.energy_kwh,
        water_liters: metric.water_liters,
        open_tickets: metric.open_tickets,
        recorded_at: metric.recorded_at.toISOString(),
    };
}

export function toHistoryRecord(metric: FacilityMetric): FacilityHistoryRecordV1 {
    return {
        snapshot_id: metric.snapshot_id,
        occupancy: metric.occupancy,
        energy_kwh: metric.energy_kwh,
        water_liters: metric.water_liters,
        open_tickets: metric.open_tickets,
        recorded_at: metric.recorded_at.toISOString(),
    };
}
