import { FastifyInstance } from 'fastify';
import { requireLeader } from '../../shared/kernel/permission.middleware';
import { ProposalController } from './controllers/proposal.controller';

export type ProposalRoutesOptions = {
    controller: ProposalController;
};

/** Mounted under /proposals */
export async function proposalRoutes(fastify: FastifyInstance, opts: ProposalRoutesOptions) {
    const { controller } = opts;

    fastify.post('/', {
        preHandler: [fastify.authenticate, requireLeader]
    }, controller.create);

    fastify.get('/group/:groupId', {
        preHandler: [fastify.authenticate]
    }, controller.listByGroup);

    fastify.get('/status/:status', {
        preHandler: [fastify.authenticate]
    }, controller.listByStatus);

    fastify.get('/:proposalId', {
        preHandler: [fastify.authenticate]
    }, controller.getById);
}

/** Mounted under /stats */
export async function proposalStatsRoutes(fastify: FastifyInstance, opts: ProposalRoutesOptions) {
    fastify.get('/proposals', {
        preHandler: [fastify.authenticate, requireLeader]
    }, opts.controller.getStatistics);
}
