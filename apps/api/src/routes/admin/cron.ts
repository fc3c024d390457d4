import { FastifyInstance } from 'fastify';
import type { JobStatusReport, JobStatusResponse } from '@facility-pulse/contracts';

/**
 * POST /cron/{start,pause,resume,stop} and GET /cron/status.
 *
 * Each call returns as soon as the controller state changes; none of them
 * waits for a snapshot run that is in flight.
 */
export default async function adminCronRoutes(fastify: FastifyInstance) {
    fastify.addHook('preHandler', fastify.requireAdminToken);

    const controller = fastify.jobController;

    fastify.post('/start', async (request): Promise<JobStatusResponse> => {
        const status = controller.start();
        request.log.info({ status }, 'cron start requested');
        return { status };
    });

    fastify.post('/pause', async (request): Promise<JobStatusResponse> => {
        const status = controller.pause();
        request.log.info({ status }, 'cron pause requested');
        return { status };
    });

    fastify.post('/resume', async (request): Promise<JobStatusResponse> => {
        const status = controller.resume();
        request.log.info({ status }, 'cron resume requested');
        return { status };
    });

    fastify.post('/stop', async (request): Promise<JobStatusResponse> => {
        const status = controller.stop();
        request.log.info({ status }, 'cron stop requested');
        return { status };
    });

    fastify.get('/status', async (): Promise<JobStatusReport> => {
        return controller.status();
    });
}
