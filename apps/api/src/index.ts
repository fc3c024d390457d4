import 'dotenv/config';
import pino from 'pino';
import { CONTRACT_VERSION } from '@facility-pulse/contracts';
import { loadConfig } from './config';
import { openMetricStore } from './storage';
import { createSnapshotJob } from './snapshots';
import { buildApp } from './app';

const start = async () => {
    const config = loadConfig();
    const logger = pino({ level: config.logLevel });

    logger.info(`Starting ${config.serviceName}... contract version: ${CONTRACT_VERSION}`);

    const store = await openMetricStore(config.storage, logger);
    const { controller } = createSnapshotJob(store, config.snapshots, logger);
    const app = await buildApp({ config, store, jobController: controller, logger });

    const address = await app.listen({ port: config.port, host: config.host });
    logger.info(`Server listening on ${address}`);

    if (config.snapshots.autostart) {
        logger.info({ status: controller.start() }, 'Snapshot job autostart');
    }

    // Graceful Shutdown: the store plugin's onClose hook drains the job and closes the store.
    const shutdown = async (signal: string) => {
        logger.info(`[${signal}] Shutting down API...`);
        try {
            await app.close();
            logger.info('API closed');
            process.exit(0);
        } catch (err) {
            logger.error({ err }, 'Error during shutdown');
            process.exit(1);
        }
    };

    process.on('SIGTERM', () => void shutdown('SIGTERM'));
    process.on('SIGINT', () => void shutdown('SIGINT'));
};

start().catch((err: unknown) => {
    console.error('[FATAL] API failed to start:', err);
    process.exit(1);
});
