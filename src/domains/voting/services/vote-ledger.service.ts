import { AlreadyVotedError } from '../../../shared/kernel/error.handler';
import { AuditAction, AuditLogger } from '../../../shared/kernel/audit.logger';
import { Tally } from '../../membership/membership.types';
import { VoteRecord, VoteStore } from '../stores/vote.store';

export class VoteLedger {
    constructor(private votes: VoteStore) {}

    /**
     * Record a member's vote once. Returns the tally including this vote.
     */
    async recordVote(memberId: string, proposalId: string, vote: boolean): Promise<Tally> {
        const inserted = await this.votes.insertIfAbsent({
            proposalId,
            memberId,
            vote,
            votedAt: new Date()
        });

        if (!inserted) {
            AuditLogger.logVote(AuditAction.VOTE_REJECTED, memberId, proposalId, false, { reason: 'already_voted' });
            throw new AlreadyVotedError(memberId, proposalId);
        }

        AuditLogger.logVote(AuditAction.VOTE_RECORDED, memberId, proposalId, true, { vote: vote ? 'YES' : 'NO' });
        return this.votes.tally(proposalId);
    }

    async getTally(proposalId: string): Promise<Tally> {
        return this.votes.tally(proposalId);
    }

    async getMemberHistory(memberId: string): Promise<VoteRecord[]> {
        return this.votes.listByMember(memberId);
    }
}
