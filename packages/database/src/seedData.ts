import type { ReferenceData } from './types';

export const HVAC_STATUS_SEED = [
    { code: 'healthy', description: 'Normal' },
    { code: 'warning', description: 'Attention required' },
    { code: 'critical', description: 'Immediate action' },
];

export const FACILITY_SEED = [
    { id: 'FAC-001', name: 'Harbor Point Office', city: 'Boston', capacity: 500, is_active: true },
    { id: 'FAC-002', name: 'Riverside Campus', city: 'Chicago', capacity: 1200, is_active: true },
    { id: 'FAC-003', name: 'Summit Data Hall', city: 'Denver', capacity: 80, is_active: true },
    { id: 'FAC-004', name: 'Bayfront Warehouse', city: 'Oakland', capacity: 150, is_active: true },
    { id: 'FAC-005', name: 'Old Mill Annex', city: 'Portland', capacity: 60, is_active: false },
];

export const DEFAULT_REFERENCE_DATA: ReferenceData = {
    facilities: FACILITY_SEED,
    hvacStatuses: HVAC_STATUS_SEED,
};
