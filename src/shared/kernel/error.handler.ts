import { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';
import { env } from '../../config/env';

/**
 * Custom application error class with error codes
 */
export class AppError extends Error {
    constructor(
        message: string,
        public statusCode: number = 500,
        public code: string = 'INTERNAL_ERROR',
        public isOperational: boolean = true
    ) {
        super(message);
        this.name = this.constructor.name;
        Error.captureStackTrace(this, this.constructor);
    }
}

export class ValidationError extends AppError {
    constructor(message: string, public details?: unknown) {
        super(message, 400, 'VALIDATION_ERROR');
    }
}

export class UnauthorizedError extends AppError {
    constructor(message: string = 'Authentication required') {
        super(message, 401, 'UNAUTHORIZED');
    }
}

export class ForbiddenError extends AppError {
    constructor(message: string = 'Insufficient role') {
        super(message, 403, 'FORBIDDEN');
    }
}

export class NotFoundError extends AppError {
    constructor(resource: string = 'Resource') {
        super(`${resource} not found`, 404, 'NOT_FOUND');
    }
}

export class ConflictError extends AppError {
    constructor(message: string) {
        super(message, 409, 'CONFLICT');
    }
}

export class RateLimitedError extends AppError {
    constructor(message: string, public retryAfterMs: number) {
        super(message, 429, 'RATE_LIMITED');
    }
}

export class AlreadyVotedError extends AppError {
    constructor(public memberId: string, public proposalId: string) {
        super(`Member ${memberId} already voted on proposal ${proposalId}`, 409, 'ALREADY_VOTED');
    }
}

/**
 * SMS gateway unreachable or rejected the message.
 * Never leaves the SMS service: callers only see `false`.
 */
export class TransportError extends AppError {
    constructor(message: string, public reason?: unknown) {
        super(message, 502, 'TRANSPORT_ERROR');
    }
}

const isMongoDuplicateKey = (error: Error): boolean =>
    (error.name === 'MongoError' || error.name === 'MongoServerError')
    && 'code' in error && error.code === 11000;

export const isDuplicateKeyError = (error: unknown): boolean =>
    error instanceof Error && isMongoDuplicateKey(error);

/**
 * Global error handler
 */
export const errorHandler = (
    error: FastifyError | AppError | ZodError | Error,
    request: FastifyRequest,
    reply: FastifyReply
) => {
    // Zod Validation Errors
    if (error instanceof ZodError) {
        return reply.status(400).send({
            success: false,
            error: {
                code: 'VALIDATION_ERROR',
                message: 'Request validation failed',
                details: error.errors.map(e => ({
                    field: e.path.join('.'),
                    message: e.message
                }))
            }
        });
    }

    // Custom App Errors
    if (error instanceof AppError) {
        if (error instanceof RateLimitedError) {
            reply.header('Retry-After', Math.ceil(error.retryAfterMs / 1000));
        }
        return reply.status(error.statusCode).send({
            success: false,
            error: {
                code: error.code,
                message: error.message,
                ...(error instanceof ValidationError && error.details !== undefined && { details: error.details })
            }
        });
    }

    // MongoDB Errors
    if (isMongoDuplicateKey(error)) {
        return reply.status(409).send({
            success: false,
            error: {
                code: 'DUPLICATE_KEY',
                message: 'Resource already exists'
            }
        });
    }

    // Fastify Errors
    if ('statusCode' in error && typeof error.statusCode === 'number') {
        return reply.status(error.statusCode).send({
            success: false,
            error: {
                code: 'code' in error && typeof error.code === 'string' ? error.code : 'FASTIFY_ERROR',
                message: error.message
            }
        });
    }

    // Unknown Errors - Log and hide details in production
    request.log.error({ err: error }, 'UNHANDLED ERROR');

    return reply.status(500).send({
        success: false,
        error: {
            code: 'INTERNAL_ERROR',
            message: env.NODE_ENV === 'production'
                ? 'An unexpected error occurred'
                : error.message,
            ...(env.NODE_ENV !== 'production' && { stack: error.stack })
        }
    });
};
