import { v4 as uuidv4 } from 'uuid';
import { ConflictError } from '../../../shared/kernel/error.handler';
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

/**
 * In-process membership records for STORE_DRIVER=memory and tests.
 * Every method copies records in and out so callers never share state.
 */
export class InMemoryMemberDirectory implements MemberDirectory {
    private members = new Map<string, Member>();
    private memberIdByPhone = new Map<string, string>();

    addMember(member: Member): Member {
        if (this.memberIdByPhone.has(member.phoneNumber)) {
            throw new ConflictError(`Phone number ${member.phoneNumber} is already registered`);
        }
        this.members.set(member.memberId, { ...member });
        this.memberIdByPhone.set(member.phoneNumber, member.memberId);
        return { ...member };
    }

    async getMemberByPhone(phoneNumber: string): Promise<Member | null> {
        const memberId = this.memberIdByPhone.get(phoneNumber);
        return memberId ? this.getMemberById(memberId) : null;
    }

    async getMemberById(memberId: string): Promise<Member | null> {
        const member = this.members.get(memberId);
        return member ? { ...member } : null;
    }

    async setPhoneVerified(memberId: string): Promise<void> {
        const member = this.members.get(memberId);
        if (!member) return;
        member.phoneVerified = true;
        member.lastActive = new Date();
    }

    async setKycStatus(memberId: string, status: KycStatus): Promise<void> {
        const member = this.members.get(memberId);
        if (!member) return;
        member.kycStatus = status;
        member.lastActive = new Date();
    }

    async listGroupMembers(groupId: string): Promise<Member[]> {
        return [...this.members.values()]
            .filter(m => m.groupId === groupId)
            .map(m => ({ ...m }));
    }

    async countMembers(): Promise<MemberCounts> {
        const all = [...this.members.values()];
        return {
            total: all.length,
            phoneVerified: all.filter(m => m.phoneVerified).length
        };
    }
}

const copyProposal = (proposal: Proposal): Proposal => ({
    ...proposal,
    voteCount: { ...proposal.voteCount }
});

export class InMemoryProposalRegistry implements ProposalRegistry {
    private proposals = new Map<string, Proposal>();

    /** Seeds a proposal with a fixed id and status */
    addProposal(proposal: Proposal): Proposal {
        this.proposals.set(proposal.proposalId, copyProposal(proposal));
        return copyProposal(proposal);
    }

    async createProposal(input: NewProposal): Promise<Proposal> {
        return this.addProposal({
            ...input,
            proposalId: uuidv4(),
            createdAt: new Date(),
            status: ProposalStatus.VOTING,
            voteCount: { yes: 0, no: 0, total: 0 }
        });
    }

    async getProposal(proposalId: string): Promise<Proposal | null> {
        const proposal = this.proposals.get(proposalId);
        return proposal ? copyProposal(proposal) : null;
    }

    async listGroupProposals(groupId: string): Promise<Proposal[]> {
        return [...this.proposals.values()]
            .filter(p => p.groupId === groupId)
            .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
            .map(copyProposal);
    }

    async listByStatus(status: ProposalStatus): Promise<Proposal[]> {
        return [...this.proposals.values()]
            .filter(p => p.status === status)
            .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
            .map(copyProposal);
    }

    async countByStatus(): Promise<ProposalStatusCounts> {
        const counts: ProposalStatusCounts = {};
        for (const { status } of this.proposals.values()) {
            counts[status] = (counts[status] ?? 0) + 1;
        }
        return counts;
    }

    async listVotingPastDeadline(now: Date): Promise<Proposal[]> {
        return [...this.proposals.values()]
            .filter(p => p.status === ProposalStatus.VOTING && p.votingDeadline.getTime() < now.getTime())
            .sort((a, b) => a.votingDeadline.getTime() - b.votingDeadline.getTime())
            .map(copyProposal);
    }

    async transitionStatus(proposalId: string, expected: ProposalStatus, next: ProposalStatus): Promise<boolean> {
        const proposal = this.proposals.get(proposalId);
        if (!proposal || proposal.status !== expected) return false;
        proposal.status = next;
        return true;
    }

    async setVoteCount(proposalId: string, tally: Tally): Promise<void> {
        const proposal = this.proposals.get(proposalId);
        if (proposal) proposal.voteCount = { ...tally };
    }
}

export class InMemoryKycDocumentStore implements KycDocumentStore {
    private documents: KycDocument[] = [];

    addDocument(document: KycDocument): void {
        this.documents.push({ ...document });
    }

    async listMemberDocuments(memberId: string): Promise<KycDocument[]> {
        return this.documents
            .filter(d => d.memberId === memberId)
            .map(d => ({ ...d }));
    }
}
