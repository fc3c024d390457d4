import {
    boolean,
    doublePrecision,
    index,
    integer,
    pgTable,
    serial,
    timestamp,
    varchar,
} from 'drizzle-orm/pg-core';

export const facilities = pgTable('facilities', {
    id: varchar('id', { length: 20 }).primaryKey(),
    name: varchar('name', { length: 255 }).notNull(),
    city: varchar('city', { length: 100 }).notNull(),
    capacity: integer('capacity').notNull(),
    is_active: boolean('is_active').notNull().default(true),
    created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});

export const hvacStatuses = pgTable('hvac_statuses', {
    id: serial('id').primaryKey(),
    code: varchar('code', { length: 50 }).notNull().unique(),
    description: varchar('description', { length: 255 }),
});

export const snapshotExecutions = pgTable(
    'snapshot_executions',
    {
        id: serial('id').primaryKey(),
        execution_time: timestamp('execution_time', { withTimezone: true }).notNull(),
        status: varchar('status', { length: 50, enum: ['running', 'success', 'failed'] })
            .notNull()
            .default('running'),
        execution_duration_ms: integer('execution_duration_ms'),
        created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    },
    (table) => ({
        executionTimeIdx: index('idx_snapshot_execution_time').on(table.execution_time),
    }),
);

// No ON DELETE CASCADE: retention removes metric rows before their execution.
export const facilityMetrics = pgTable(
    'facility_metrics',
    {
        id: serial('id').primaryKey(),
        snapshot_id: integer('snapshot_id')
            .notNull()
            .references(() => snapshotExecutions.id),
        facility_id: varchar('facility_id', { length: 20 })
            .notNull()
            .references(() => facilities.id),
        hvac_status_id: integer('hvac_status_id')
            .notNull()
            .references(() => hvacStatuses.id),
        occupancy: integer('occupancy').notNull(),
        energy_kwh: doublePrecision('energy_kwh').notNull(),
        water_liters: doublePrecision('water_liters').notNull(),
        open_tickets: integer('open_tickets').notNull(),
        recorded_at: timestamp('recorded_at', { withTimezone: true }).notNull(),
        created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    },
    (table) => ({
        facilitySnapshotIdx: index('idx_facility_snapshot').on(table.facility_id, table.snapshot_id),
        facilityRecordedIdx: index('idx_facility_recorded').on(table.facility_id, table.recorded_at),
        recordedIdx: index('idx_metric_recorded_at').on(table.recorded_at),
    }),
);
