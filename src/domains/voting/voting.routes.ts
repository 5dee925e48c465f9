import { FastifyInstance } from 'fastify';
import { requireLeader } from '../../shared/kernel/permission.middleware';
import { SmsVotingController } from './controllers/sms-voting.controller';
import { WebhookController } from './controllers/webhook.controller';

export type WebhookRoutesOptions = {
    controller: WebhookController;
};

export type VotingRoutesOptions = {
    controller: SmsVotingController;
};

export async function webhookRoutes(fastify: FastifyInstance, opts: WebhookRoutesOptions) {
    // Public: called by the SMS provider, which relays every member's reply from a few addresses
    fastify.post('/sms', {
        config: { rateLimit: false }
    }, opts.controller.handleInboundSms);
}

/** Mounted under /proposals */
export async function smsVotingRoutes(fastify: FastifyInstance, opts: VotingRoutesOptions) {
    const { controller } = opts;

    fastify.get('/:proposalId/sms-voting', controller.getStatus);

    fastify.post('/:proposalId/sms-voting', {
        preHandler: [fastify.authenticate, requireLeader]
    }, controller.start);

    fastify.delete('/:proposalId/sms-voting', {
        preHandler: [fastify.authenticate, requireLeader]
    }, controller.close);

    fastify.post('/resolve-deadlines', {
        preHandler: [fastify.authenticate, requireLeader]
    }, controller.resolveDeadlines);
}

/** Mounted under /members */
export async function memberVoteRoutes(fastify: FastifyInstance, opts: VotingRoutesOptions) {
    fastify.get('/:memberId/votes', {
        preHandler: [fastify.authenticate]
    }, opts.controller.getMemberVotes);
}

/** Mounted under /stats */
export async function smsStatsRoutes(fastify: FastifyInstance, opts: VotingRoutesOptions) {
    fastify.get('/sms', {
        preHandler: [fastify.authenticate, requireLeader]
    }, opts.controller.getSmsStatistics);
}
