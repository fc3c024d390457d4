import type { Logger } from 'pino';
import {
    DEFAULT_REFERENCE_DATA,
    MemoryMetricStore,
    PostgresMetricStore,
    type MetricStore,
    type ReferenceData,
} from '@facility-pulse/database';
import type { AppConfig } from './config';

/**
 * Opens the configured store, makes sure its schema exists and seeds the
 * reference data (facilities, HVAC statuses) into empty tables.
 */
export async function openMetricStore(
    storage: AppConfig['storage'],
    logger: Logger,
    referenceData: ReferenceData = DEFAULT_REFERENCE_DATA,
): Promise<MetricStore> {
    let store: MetricStore;
    if (storage.driver === 'memory') {
        store = new MemoryMetricStore();
    } else {
        const pg = PostgresMetricStore.fromConnectionString(storage.databaseUrl);
        await pg.ensureSchema();
        store = pg;
    }

    const seeded = await store.seedReferenceData(referenceData);
    logger.info({ driver: storage.driver, seeded }, 'Metric store ready');
    return store;
}
