import type { FastifyError, FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import { AuthError, isFacilityPulseError, StorageError } from '@facility-pulse/contracts';

/**
 * Maps the shared error kinds onto `{ error }` bodies. Storage failures and
 * anything unrecognised become a bare 500 after being logged.
 */
const errorHandlerPlugin: FastifyPluginAsync = async (app) => {
    app.setErrorHandler((error: FastifyError | Error, request, reply) => {
        if (error instanceof AuthError) {
            return reply.code(401).send({ error: 'Unauthorized' });
        }

        if (isFacilityPulseError(error) && !(error instanceof StorageError) && error.statusCode < 500) {
            return reply.code(error.statusCode).send({ error: error.message });
        }

        // Fastify's own client errors (bad JSON body, unsupported media type, ...)
        if ('statusCode' in error && typeof error.statusCode === 'number' && error.statusCode < 500) {
            return reply.code(error.statusCode).send({ error: error.message });
        }

        request.log.error({ err: error }, 'Unhandled error');
        return reply.code(500).send({ error: 'Internal Server Error' });
    });

    app.setNotFoundHandler((request, reply) => {
        reply.code(404).send({ error: `Route ${request.method} ${request.url} not found` });
    });
};

export default fp(errorHandlerPlugin, { name: 'error-handler' });
