import type { FastifyPluginAsync, FastifyReply, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';
import { AuthError } from '@facility-pulse/contracts';
import { secretsMatch } from '../auth/authenticate';

declare module 'fastify' {
    interface FastifyInstance {
        requireAdminToken: (request: FastifyRequest, reply: FastifyReply) => Promise<void>;
    }
}

export interface AdminAuthPluginOptions {
    // Admin routes are open when no token is configured.
    adminToken?: string;
}

const adminAuthPlugin: FastifyPluginAsync<AdminAuthPluginOptions> = async (fastify, opts) => {
    const expected = opts.adminToken;

    fastify.decorate('requireAdminToken', async (request: FastifyRequest, _reply: FastifyReply) => {
        if (!expected) return;

        const adminToken = request.headers['x-admin-token'];
        if (typeof adminToken !== 'string' || adminToken.length === 0) {
            request.log.warn('Missing x-admin-token header');
            throw new AuthError();
        }
        if (!secretsMatch(adminToken, expected)) {
            request.log.warn('Invalid x-admin-token provided');
            throw new AuthError();
        }
    });
};

export default fp(adminAuthPlugin, {
    name: 'admin-auth',
});
