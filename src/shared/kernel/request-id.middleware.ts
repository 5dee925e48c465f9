import { FastifyRequest, FastifyReply, HookHandlerDoneFunction } from 'fastify';
import { v4 as uuidv4 } from 'uuid';

/**
 * Echoes the request ID back to the caller.
 * Accepts X-Request-ID header or generates new UUID
 */
export const requestIdMiddleware = (
    req: FastifyRequest,
    reply: FastifyReply,
    done: HookHandlerDoneFunction
) => {
    const header = req.headers['x-request-id'];
    const requestId = typeof header === 'string' && header.length > 0 ? header : uuidv4();
    req.id = requestId;
    reply.header('X-Request-ID', requestId);
    done();
};
