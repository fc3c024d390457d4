import 'dotenv/config';
import pino from 'pino';
import { loadConfig } from '../config';
import { openMetricStore } from '../storage';
import { createSnapshotJob } from '../snapshots';

/**
 * Seeds reference data into the configured store.
 *
 * Usage: npm run seed [-- --snapshot]
 *   --snapshot   also record one snapshot so the read endpoints have data
 */
async function main() {
    const config = loadConfig();
    const logger = pino({ level: config.logLevel });
    const withSnapshot = process.argv.slice(2).includes('--snapshot');

    const store = await openMetricStore(config.storage, logger);
    try {
        if (withSnapshot) {
            const { controller } = createSnapshotJob(store, config.snapshots, logger);
            const result = await controller.runNow();
            if (result.status === 'failed') {
                throw result.error;
            }
            logger.info({ executionId: result.executionId, metrics: result.metricCount }, 'Snapshot recorded');
        }

        const [executions, metrics] = await Promise.all([store.countExecutions(), store.countMetrics()]);
        logger.info({ executions, metrics }, 'Seed complete');
    } finally {
        await store.close();
    }
}

main().catch((e: unknown) => {
    console.error(e);
    process.exit(1);
});
