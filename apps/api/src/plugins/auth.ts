import type { FastifyPluginAsync, FastifyReply, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';
import { AuthError, type AuthScheme } from '@facility-pulse/contracts';
import { authenticate, credentialsFromHeaders } from '../auth/authenticate';
import type { AuthSecrets } from '../config';

declare module 'fastify' {
    interface FastifyInstance {
        requireAuth: (schemes: readonly AuthScheme[]) => (request: FastifyRequest, reply: FastifyReply) => Promise<void>;
    }
}

export interface AuthPluginOptions {
    secrets: AuthSecrets;
}

const authPlugin: FastifyPluginAsync<AuthPluginOptions> = async (app, opts) => {
    app.decorate('requireAuth', (schemes: readonly AuthScheme[]) => {
        return async (request: FastifyRequest, _reply: FastifyReply) => {
            const credentials = credentialsFromHeaders(request.headers);
            if (!authenticate(credentials, schemes, opts.secrets)) {
                request.log.warn({ url: request.url, schemes }, 'Request rejected by auth check');
                throw new AuthError();
            }
        };
    });
};

export default fp(authPlugin, { name: 'auth' });
