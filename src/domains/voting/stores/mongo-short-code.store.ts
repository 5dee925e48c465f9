import { isDuplicateKeyError } from '../../../shared/kernel/error.handler';
import { ISmsProposal, SmsProposalModel } from '../models/sms-proposal.model';
import { ShortCodeEntry, ShortCodeStore } from './short-code.store';

const toEntry = (doc: ISmsProposal): ShortCodeEntry => ({
    proposalId: doc.proposalId,
    shortCode: doc.shortCode,
    title: doc.title,
    groupId: doc.groupId,
    votingDeadline: doc.votingDeadline,
    createdAt: doc.createdAt
});

/**
 * Unique indexes on proposalId and shortCode make the insert the allocation point.
 */
export class MongoShortCodeStore implements ShortCodeStore {
    async tryInsert(entry: ShortCodeEntry): Promise<boolean> {
        try {
            await SmsProposalModel.create(entry);
            return true;
        } catch (error) {
            if (isDuplicateKeyError(error)) return false;
            throw error;
        }
    }

    async getByProposal(proposalId: string): Promise<ShortCodeEntry | null> {
        const doc = await SmsProposalModel.findOne({ proposalId });
        return doc ? toEntry(doc) : null;
    }

    async getByCode(shortCode: string): Promise<ShortCodeEntry | null> {
        const doc = await SmsProposalModel.findOne({ shortCode });
        return doc ? toEntry(doc) : null;
    }

    async listCodes(): Promise<string[]> {
        const docs = await SmsProposalModel.find({}, { shortCode: 1 });
        return docs.map(doc => doc.shortCode);
    }

    async remove(proposalId: string): Promise<boolean> {
        const result = await SmsProposalModel.deleteOne({ proposalId });
        return result.deletedCount > 0;
    }

    async count(): Promise<number> {
        return SmsProposalModel.countDocuments({});
    }
}
