import { FastifyRequest, FastifyReply, HookHandlerDoneFunction } from 'fastify';
import mongoSanitize from 'express-mongo-sanitize';

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null;

/**
 * Sanitizes request body, query params, and URL params to prevent NoSQL injection
 * Removes keys that start with $ or contain .
 */
export const sanitizationMiddleware = (
    req: FastifyRequest,
    reply: FastifyReply,
    done: HookHandlerDoneFunction
) => {
    if (isRecord(req.body)) {
        req.body = mongoSanitize.sanitize(req.body);
    }

    if (isRecord(req.query)) {
        req.query = mongoSanitize.sanitize(req.query);
    }

    if (isRecord(req.params)) {
        req.params = mongoSanitize.sanitize(req.params);
    }

    done();
};
