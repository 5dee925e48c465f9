import { FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { ProposalStatus } from '../membership.types';
import { ProposalService } from '../services/proposal.service';

const CreateProposalSchema = z.object({
    groupId: z.string().min(1),
    title: z.string().trim().min(5).max(200),
    description: z.string().trim().min(10).max(2000),
    amountRequested: z.number().nonnegative(),
    milestoneDescription: z.string().trim().min(5).max(500),
    deadline: z.coerce.date()
});

const ProposalParamsSchema = z.object({ proposalId: z.string().min(1) });
const GroupParamsSchema = z.object({ groupId: z.string().min(1) });
const StatusParamsSchema = z.object({ status: z.nativeEnum(ProposalStatus) });

export class ProposalController {
    constructor(private proposals: ProposalService) {}

    create = async (req: FastifyRequest, reply: FastifyReply) => {
        const input = CreateProposalSchema.parse(req.body);
        const proposal = await this.proposals.createProposal({ ...input, createdBy: req.user.id });

        return reply.status(201).send({ success: true, data: proposal });
    };

    getById = async (req: FastifyRequest, reply: FastifyReply) => {
        const { proposalId } = ProposalParamsSchema.parse(req.params);
        const proposal = await this.proposals.getProposal(proposalId);

        return reply.send({ success: true, data: proposal });
    };

    listByGroup = async (req: FastifyRequest, reply: FastifyReply) => {
        const { groupId } = GroupParamsSchema.parse(req.params);
        const proposals = await this.proposals.listGroupProposals(groupId);

        return reply.send({ success: true, data: proposals, total: proposals.length });
    };

    listByStatus = async (req: FastifyRequest, reply: FastifyReply) => {
        const { status } = StatusParamsSchema.parse(req.params);
        const proposals = await this.proposals.listProposalsByStatus(status);

        return reply.send({ success: true, data: proposals, total: proposals.length });
    };

    getStatistics = async (_req: FastifyRequest, reply: FastifyReply) => {
        const stats = await this.proposals.getProposalStatistics();
        return reply.send({ success: true, data: stats });
    };
}
