import { NotFoundError, ValidationError } from '../../../shared/kernel/error.handler';
import { AuditAction, AuditLogger } from '../../../shared/kernel/audit.logger';
import {
    MemberDirectory,
    NewProposal,
    Proposal,
    ProposalRegistry,
    ProposalStatus,
    ProposalStatusCounts
} from '../membership.types';

const DEFAULT_VOTING_WINDOW_MS = 7 * 24 * 60 * 60 * 1000;

export interface CreateProposalInput {
    groupId: string;
    title: string;
    description: string;
    amountRequested: number;
    milestoneDescription: string;
    deadline: Date;
    createdBy: string;
}

export interface ProposalStatistics {
    totalProposals: number;
    statusBreakdown: ProposalStatusCounts;
    activeVoting: number;
    passedProposals: number;
    failedProposals: number;
}

export class ProposalService {
    constructor(
        private proposals: ProposalRegistry,
        private directory: MemberDirectory
    ) {}

    /**
     * Create a proposal and open it for voting.
     * A deadline that is not in the future falls back to a 7 day voting window.
     */
    async createProposal(input: CreateProposalInput): Promise<Proposal> {
        const creator = await this.directory.getMemberById(input.createdBy);
        if (!creator || creator.groupId !== input.groupId) {
            throw new ValidationError(`Member ${input.createdBy} does not belong to group ${input.groupId}`);
        }

        const now = Date.now();
        const votingDeadline = input.deadline.getTime() > now
            ? input.deadline
            : new Date(now + DEFAULT_VOTING_WINDOW_MS);

        const record: NewProposal = { ...input, votingDeadline };
        const proposal = await this.proposals.createProposal(record);

        AuditLogger.log({
            action: AuditAction.PROPOSAL_CREATED,
            memberId: input.createdBy,
            resourceId: proposal.proposalId,
            success: true,
            metadata: { groupId: input.groupId, votingDeadline: votingDeadline.toISOString() }
        });

        return proposal;
    }

    async getProposal(proposalId: string): Promise<Proposal> {
        const proposal = await this.proposals.getProposal(proposalId);
        if (!proposal) throw new NotFoundError('Proposal');
        return proposal;
    }

    async listGroupProposals(groupId: string): Promise<Proposal[]> {
        return this.proposals.listGroupProposals(groupId);
    }

    async listProposalsByStatus(status: ProposalStatus): Promise<Proposal[]> {
        return this.proposals.listByStatus(status);
    }

    async getProposalStatistics(): Promise<ProposalStatistics> {
        const statusBreakdown = await this.proposals.countByStatus();
        const totalProposals = Object.values(statusBreakdown).reduce<number>((sum, n) => sum + (n ?? 0), 0);

        return {
            totalProposals,
            statusBreakdown,
            activeVoting: statusBreakdown[ProposalStatus.VOTING] ?? 0,
            passedProposals: statusBreakdown[ProposalStatus.PASSED] ?? 0,
            failedProposals: statusBreakdown[ProposalStatus.FAILED] ?? 0
        };
    }
}
