import { FastifyInstance } from 'fastify';
import { requireLeader } from '../../shared/kernel/permission.middleware';
import { VerificationController } from './controllers/verification.controller';

export type VerificationRoutesOptions = {
    controller: VerificationController;
};

export async function verificationRoutes(fastify: FastifyInstance, opts: VerificationRoutesOptions) {
    const { controller } = opts;

    // Public Routes
    fastify.post('/request-otp', controller.requestOtp);
    fastify.post('/verify-otp', controller.verifyOtp);

    // Leader Routes
    fastify.get('/stats', {
        preHandler: [fastify.authenticate, requireLeader]
    }, controller.getStatistics);

    // Public status lookup
    fastify.get('/:phone/status', controller.getStatus);
}
