import fp from 'fastify-plugin';
import type { MetricStore } from '@facility-pulse/database';
import type { JobController } from '../snapshots/job-controller';

declare module 'fastify' {
    interface FastifyInstance {
        store: MetricStore;
        jobController: JobController;
    }
}

export interface StorePluginOptions {
    store: MetricStore;
    jobController: JobController;
}

export default fp<StorePluginOptions>(
    async (fastify, opts) => {
        fastify.decorate('store', opts.store);
        fastify.decorate('jobController', opts.jobController);

        // Let an in-flight snapshot finish before the store goes away.
        fastify.addHook('onClose', async () => {
            await opts.jobController.shutdown();
            await opts.store.close();
        });
    },
    { name: 'store' },
);
