import { describe, test, expect } from 'vitest';
import {
    MemoryMetricStore,
    PostgresMetricStore,
    SNAPSHOT_RETENTION_LIMIT,
    selectExpiredExecutions,
    DEFAULT_REFERENCE_DATA,
} from '../index';

describe('Database package exports', () => {
    test('both store implementations are exported', () => {
        expect(typeof MemoryMetricStore).toBe('function');
        expect(typeof PostgresMetricStore).toBe('function');
    });

    test('retention helpers are exported', () => {
        expect(SNAPSHOT_RETENTION_LIMIT).toBe(50);
        expect(typeof selectExpiredExecutions).toBe('function');
    });

    test('default reference data carries the three HVAC statuses', () => {
        expect(DEFAULT_REFERENCE_DATA.hvacStatuses.map((s) => s.code)).toEqual(['healthy', 'warning', 'critical']);
    });
});
