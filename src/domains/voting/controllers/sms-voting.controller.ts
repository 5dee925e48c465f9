import { FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { NotFoundError } from '../../../shared/kernel/error.handler';
import { ProposalLifecycleService } from '../services/proposal-lifecycle.service';
import { SmsVotingService } from '../services/sms-voting.service';
import { VoteLedger } from '../services/vote-ledger.service';

const ProposalParamsSchema = z.object({ proposalId: z.string().min(1) });
const MemberParamsSchema = z.object({ memberId: z.string().min(1) });

export class SmsVotingController {
    constructor(
        private smsVoting: SmsVotingService,
        private ledger: VoteLedger,
        private lifecycle: ProposalLifecycleService
    ) {}

    start = async (req: FastifyRequest, reply: FastifyReply) => {
        const { proposalId } = ProposalParamsSchema.parse(req.params);
        const result = await this.smsVoting.startSmsVoting(proposalId);

        return reply.status(201).send({
            success: true,
            data: result,
            message: `SMS voting started with code ${result.shortCode}`
        });
    };

    getStatus = async (req: FastifyRequest, reply: FastifyReply) => {
        const { proposalId } = ProposalParamsSchema.parse(req.params);
        const status = await this.smsVoting.getVotingStatus(proposalId);

        return reply.send({ success: true, data: status });
    };

    close = async (req: FastifyRequest, reply: FastifyReply) => {
        const { proposalId } = ProposalParamsSchema.parse(req.params);
        const closed = await this.smsVoting.closeSmsVoting(proposalId);
        if (!closed) throw new NotFoundError('SMS voting for proposal');

        return reply.send({ success: true, data: { proposalId, closed } });
    };

    resolveDeadlines = async (_req: FastifyRequest, reply: FastifyReply) => {
        const resolved = await this.lifecycle.checkVotingDeadlines(new Date());
        return reply.send({ success: true, data: { resolved } });
    };

    getMemberVotes = async (req: FastifyRequest, reply: FastifyReply) => {
        const { memberId } = MemberParamsSchema.parse(req.params);
        const votes = await this.ledger.getMemberHistory(memberId);

        return reply.send({
            success: true,
            data: {
                memberId,
                totalVotes: votes.length,
                votes: votes.map(v => ({
                    proposalId: v.proposalId,
                    vote: v.vote ? 'YES' : 'NO',
                    votedAt: v.votedAt
                }))
            }
        });
    };

    getSmsStatistics = async (_req: FastifyRequest, reply: FastifyReply) => {
        const stats = await this.smsVoting.getSmsStatistics();
        return reply.send({ success: true, data: stats });
    };
}
