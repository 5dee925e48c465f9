import { Tally } from '../../membership/membership.types';

export interface VoteRecord {
    proposalId: string;
    memberId: string;
    vote: boolean;
    votedAt: Date;
}

export interface VoteStore {
    /** Stores the vote unless the member already voted on the proposal. */
    insertIfAbsent(record: VoteRecord): Promise<boolean>;
    tally(proposalId: string): Promise<Tally>;
    /** Newest first */
    listByMember(memberId: string): Promise<VoteRecord[]>;
}

export const tallyVotes = (votes: Iterable<{ vote: boolean }>): Tally => {
    let yes = 0;
    let no = 0;
    for (const { vote } of votes) {
        if (vote) yes++;
        else no++;
    }
    return { yes, no, total: yes + no };
};

const copyVote = (record: VoteRecord): VoteRecord => ({ ...record, votedAt: new Date(record.votedAt) });

/**
 * Votes grouped by proposal, then member. Check and set happen in one
 * synchronous step, so concurrent duplicates cannot both land.
 */
export class InMemoryVoteStore implements VoteStore {
    private votesByProposal = new Map<string, Map<string, VoteRecord>>();

    async insertIfAbsent(record: VoteRecord): Promise<boolean> {
        let votes = this.votesByProposal.get(record.proposalId);
        if (!votes) {
            votes = new Map();
            this.votesByProposal.set(record.proposalId, votes);
        }
        if (votes.has(record.memberId)) return false;

        votes.set(record.memberId, copyVote(record));
        return true;
    }

    async tally(proposalId: string): Promise<Tally> {
        return tallyVotes(this.votesByProposal.get(proposalId)?.values() ?? []);
    }

    async listByMember(memberId: string): Promise<VoteRecord[]> {
        const votes: VoteRecord[] = [];
        for (const byMember of this.votesByProposal.values()) {
            const vote = byMember.get(memberId);
            if (vote) votes.push(copyVote(vote));
        }
        return votes.sort((a, b) => b.votedAt.getTime() - a.votedAt.getTime());
    }
}
