import fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import compress from '@fastify/compress';
import { env } from './config/env';
import { Container } from './container';
import { isDatabaseConnected } from './database/database.module';
import authPlugin from './shared/kernel/auth.plugin';
import { RateLimitedError, errorHandler } from './shared/kernel/error.handler';
import { healthRoutes } from './shared/kernel/health.routes';
import { resolveLogLevel } from './shared/kernel/logger';
import { requestIdMiddleware } from './shared/kernel/request-id.middleware';
import { sanitizationMiddleware } from './shared/kernel/sanitization.middleware';
import { verificationRoutes } from './domains/verification/verification.routes';
import { VerificationController } from './domains/verification/controllers/verification.controller';
import { proposalRoutes, proposalStatsRoutes } from './domains/membership/membership.routes';
import { ProposalController } from './domains/membership/controllers/proposal.controller';
import { memberVoteRoutes, smsStatsRoutes, smsVotingRoutes, webhookRoutes } from './domains/voting/voting.routes';
import { SmsVotingController } from './domains/voting/controllers/sms-voting.controller';
import { WebhookController } from './domains/voting/controllers/webhook.controller';

/**
 * Builds the HTTP application around a wired container. Does not listen.
 */
export async function buildApp(container: Container): Promise<FastifyInstance> {
    const app = fastify({
        logger: {
            level: resolveLogLevel(),
            transport: env.NODE_ENV === 'development'
                ? { target: 'pino-pretty', options: { colorize: true } }
                : undefined
        },
        requestIdHeader: 'x-request-id',
        requestIdLogLabel: 'reqId',
        disableRequestLogging: env.NODE_ENV === 'test',
        trustProxy: true
    });

    // 1. Security Plugins
    await app.register(helmet, {
        contentSecurityPolicy: {
            directives: {
                defaultSrc: ["'self'"],
                styleSrc: ["'self'", "'unsafe-inline'"],
                scriptSrc: ["'self'"],
                imgSrc: ["'self'", 'data:', 'https:']
            }
        }
    });

    await app.register(cors, {
        origin: env.CORS_ORIGIN === '*' ? true : env.CORS_ORIGIN.split(','),
        credentials: true,
        methods: ['GET', 'POST', 'PUT', 'DELETE', 'PATCH']
    });

    await app.register(rateLimit, {
        max: 100,
        timeWindow: '1 minute',
        // Thrown into the error handler, which answers 429 with Retry-After
        errorResponseBuilder: (_req, context) =>
            new RateLimitedError('Too many requests, please try again later', context.ttl)
    });

    await app.register(compress, { encodings: ['gzip', 'deflate'] });

    // 2. Body parsing: the SMS provider posts form-encoded webhooks
    app.addContentTypeParser('application/x-www-form-urlencoded', { parseAs: 'string' }, (req, body, done) => {
        done(null, Object.fromEntries(new URLSearchParams(body.toString())));
    });

    // 3. Global Middleware
    app.addHook('onRequest', requestIdMiddleware);
    app.addHook('preHandler', sanitizationMiddleware);

    // 4. Auth Plugin (JWT)
    await app.register(authPlugin, { secret: env.JWT_SECRET });

    // 5. Error Handler
    app.setErrorHandler(errorHandler);

    // 6. Health Checks (No auth required)
    await app.register(healthRoutes, {
        isDatabaseReady: () => container.driver === 'memory' || isDatabaseConnected()
    });

    // 7. API Routes (/api/v1)
    const verification = new VerificationController(container.verification);
    const proposals = new ProposalController(container.proposals);
    const smsVoting = new SmsVotingController(container.smsVoting, container.ledger, container.lifecycle);
    const webhooks = new WebhookController(container.smsVoting);

    await app.register(async (api) => {
        api.register(verificationRoutes, { prefix: '/verification', controller: verification });
        api.register(webhookRoutes, { prefix: '/webhooks', controller: webhooks });
        api.register(proposalRoutes, { prefix: '/proposals', controller: proposals });
        api.register(smsVotingRoutes, { prefix: '/proposals', controller: smsVoting });
        api.register(memberVoteRoutes, { prefix: '/members', controller: smsVoting });
        api.register(smsStatsRoutes, { prefix: '/stats', controller: smsVoting });
        api.register(proposalStatsRoutes, { prefix: '/stats', controller: proposals });
    }, { prefix: '/api/v1' });

    return app;
}
