import { v4 as uuidv4 } from 'uuid';
import { MemberModel, IMember } from '../models/member.model';
import { ProposalModel, IProposal } from '../models/proposal.model';
import { KycDocumentModel, IKycDocument } from '../models/kyc-document.model';
import {
    KycDocument,
    KycDocumentStore,
    KycStatus,
    Member,
    MemberCounts,
    MemberDirectory,
    NewProposal,
    Proposal,
    ProposalRegistry,
    ProposalStatus,
    ProposalStatusCounts,
    Tally
} from '../membership.types';

interface StatusCountRow {
    _id: ProposalStatus;
    count: number;
}

const toMember = (doc: IMember): Member => ({
    memberId: doc.memberId,
    phoneNumber: doc.phoneNumber,
    fullName: doc.fullName,
    groupId: doc.groupId,
    role: doc.role,
    phoneVerified: doc.phoneVerified,
    kycStatus: doc.kycStatus,
    lastActive: doc.lastActive
});

const toProposal = (doc: IProposal): Proposal => ({
    proposalId: doc.proposalId,
    groupId: doc.groupId,
    title: doc.title,
    description: doc.description,
    amountRequested: doc.amountRequested,
    milestoneDescription: doc.milestoneDescription,
    deadline: doc.deadline,
    createdBy: doc.createdBy,
    createdAt: doc.createdAt,
    votingDeadline: doc.votingDeadline,
    status: doc.status,
    voteCount: {
        yes: doc.voteCount.yes,
        no: doc.voteCount.no,
        total: doc.voteCount.total
    }
});

const toKycDocument = (doc: IKycDocument): KycDocument => ({
    documentId: doc.documentId,
    memberId: doc.memberId,
    documentType: doc.documentType,
    verificationStatus: doc.verificationStatus,
    verifiedAt: doc.verifiedAt
});

export class MongoMemberDirectory implements MemberDirectory {
    async getMemberByPhone(phoneNumber: string): Promise<Member | null> {
        const doc = await MemberModel.findOne({ phoneNumber });
        return doc ? toMember(doc) : null;
    }

    async getMemberById(memberId: string): Promise<Member | null> {
        const doc = await MemberModel.findOne({ memberId });
        return doc ? toMember(doc) : null;
    }

    async setPhoneVerified(memberId: string): Promise<void> {
        await MemberModel.updateOne(
            { memberId },
            { $set: { phoneVerified: true, lastActive: new Date() } }
        );
    }

    async setKycStatus(memberId: string, status: KycStatus): Promise<void> {
        await MemberModel.updateOne(
            { memberId },
            { $set: { kycStatus: status, lastActive: new Date() } }
        );
    }

    async listGroupMembers(groupId: string): Promise<Member[]> {
        const docs = await MemberModel.find({ groupId });
        return docs.map(toMember);
    }

    async countMembers(): Promise<MemberCounts> {
        const [total, phoneVerified] = await Promise.all([
            MemberModel.countDocuments({}),
            MemberModel.countDocuments({ phoneVerified: true })
        ]);
        return { total, phoneVerified };
    }
}

export class MongoProposalRegistry implements ProposalRegistry {
    async createProposal(input: NewProposal): Promise<Proposal> {
        const doc = await ProposalModel.create({
            ...input,
            proposalId: uuidv4(),
            status: ProposalStatus.VOTING,
            voteCount: { yes: 0, no: 0, total: 0 }
        });
        return toProposal(doc);
    }

    async getProposal(proposalId: string): Promise<Proposal | null> {
        const doc = await ProposalModel.findOne({ proposalId });
        return doc ? toProposal(doc) : null;
    }

    async listGroupProposals(groupId: string): Promise<Proposal[]> {
        const docs = await ProposalModel.find({ groupId }).sort({ createdAt: -1 });
        return docs.map(toProposal);
    }

    async listByStatus(status: ProposalStatus): Promise<Proposal[]> {
        const docs = await ProposalModel.find({ status }).sort({ createdAt: -1 });
        return docs.map(toProposal);
    }

    async countByStatus(): Promise<ProposalStatusCounts> {
        const rows = await ProposalModel.aggregate<StatusCountRow>([
            { $group: { _id: '$status', count: { $sum: 1 } } }
        ]);

        const counts: ProposalStatusCounts = {};
        for (const row of rows) {
            counts[row._id] = row.count;
        }
        return counts;
    }

    async listVotingPastDeadline(now: Date): Promise<Proposal[]> {
        const docs = await ProposalModel.find({
            status: ProposalStatus.VOTING,
            votingDeadline: { $lt: now }
        }).sort({ votingDeadline: 1 });
        return docs.map(toProposal);
    }

    async transitionStatus(proposalId: string, expected: ProposalStatus, next: ProposalStatus): Promise<boolean> {
        // Filter on the current status so concurrent sweeps resolve a proposal once
        const result = await ProposalModel.updateOne(
            { proposalId, status: expected },
            { $set: { status: next } }
        );
        return result.modifiedCount > 0;
    }

    async setVoteCount(proposalId: string, tally: Tally): Promise<void> {
        await ProposalModel.updateOne(
            { proposalId },
            { $set: { voteCount: { yes: tally.yes, no: tally.no, total: tally.total } } }
        );
    }
}

export class MongoKycDocumentStore implements KycDocumentStore {
    async listMemberDocuments(memberId: string): Promise<KycDocument[]> {
        const docs = await KycDocumentModel.find({ memberId }).sort({ createdAt: 1 });
        return docs.map(toKycDocument);
    }
}
