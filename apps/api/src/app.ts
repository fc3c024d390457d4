import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import type { MetricStore } from '@facility-pulse/database';
import type { AppConfig } from './config';
import type { JobController } from './snapshots/job-controller';

import storePlugin from './plugins/store';
import authPlugin from './plugins/auth';
import adminAuthPlugin from './plugins/admin-auth';
import errorHandlerPlugin from './plugins/error-handler';

import publicRoutes from './routes/health';
import snapshotRoutes from './routes/snapshots';
import facilityRoutes from './routes/facilities';
import facilityV2Routes from './routes/facilities-v2';
import adminCronRoutes from './routes/admin/cron';

export interface BuildAppOptions {
    config: AppConfig;
    store: MetricStore;
    jobController: JobController;
    logger?: FastifyBaseLogger | boolean;
}

export async function buildApp({ config, store, jobController, logger = false }: BuildAppOptions): Promise<FastifyInstance> {
    const app = Fastify({ logger });

    await app.register(cors, {
        origin: true,
        methods: ['GET', 'POST', 'OPTIONS'],
        allowedHeaders: ['Content-Type', 'Authorization', 'X-API-Key', 'X-Admin-Token'],
    });

    await app.register(errorHandlerPlugin);
    await app.register(storePlugin, { store, jobController });
    await app.register(authPlugin, { secrets: config.auth });
    await app.register(adminAuthPlugin, { adminToken: config.adminToken });

    await app.register(publicRoutes, { serviceName: config.serviceName });
    await app.register(snapshotRoutes, { prefix: '/api/v1' });
    await app.register(facilityRoutes, { prefix: '/api/v1' });
    await app.register(facilityV2Routes, { prefix: '/api/v2' });
    await app.register(adminCronRoutes, { prefix: '/admin/cron' });

    return app;
}
