import { isDuplicateKeyError } from '../../../shared/kernel/error.handler';
import { Tally } from '../../membership/membership.types';
import { VoteModel } from '../models/vote.model';
import { VoteRecord, VoteStore } from './vote.store';

interface TallyRow {
    _id: boolean;
    count: number;
}

export class MongoVoteStore implements VoteStore {
    async insertIfAbsent(record: VoteRecord): Promise<boolean> {
        try {
            await VoteModel.create(record);
            return true;
        } catch (error) {
            // Unique (proposalId, memberId) index
            if (isDuplicateKeyError(error)) return false;
            throw error;
        }
    }

    async tally(proposalId: string): Promise<Tally> {
        const rows = await VoteModel.aggregate<TallyRow>([
            { $match: { proposalId } },
            { $group: { _id: '$vote', count: { $sum: 1 } } }
        ]);

        const yes = rows.find(r => r._id === true)?.count ?? 0;
        const no = rows.find(r => r._id === false)?.count ?? 0;
        return { yes, no, total: yes + no };
    }

    async listByMember(memberId: string): Promise<VoteRecord[]> {
        const docs = await VoteModel.find({ memberId }).sort({ votedAt: -1 });
        return docs.map(doc => ({
            proposalId: doc.proposalId,
            memberId: doc.memberId,
            vote: doc.vote,
            votedAt: doc.votedAt
        }));
    }
}
