import { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import fastifyJwt from '@fastify/jwt';
import fastifyPlugin from 'fastify-plugin';
import { MemberRole } from '../../domains/membership/membership.types';

export type AuthPluginOptions = {
    secret: string;
};

declare module 'fastify' {
    export interface FastifyInstance {
        authenticate: (request: FastifyRequest, reply: FastifyReply) => Promise<void>;
    }
}

declare module '@fastify/jwt' {
    interface FastifyJWT {
        payload: { id: string; role: MemberRole; groupId?: string };
        user: { id: string; role: MemberRole; groupId?: string };
    }
}

const authPlugin = async (fastify: FastifyInstance, opts: AuthPluginOptions) => {
    await fastify.register(fastifyJwt, {
        secret: opts.secret,
    });

    // A failed verification rejects, which stops the hook chain and reaches the error handler
    fastify.decorate('authenticate', async (request: FastifyRequest, _reply: FastifyReply) => {
        await request.jwtVerify();
    });
};

export default fastifyPlugin(authPlugin);
