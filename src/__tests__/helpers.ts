import { SmsGateway } from '../services/sms.service';
import { KycStatus, Member, MemberRole, Proposal, ProposalStatus } from '../domains/membership/membership.types';
import { createContainer, Container, Stores } from '../container';
import { InMemoryMemberDirectory, InMemoryProposalRegistry, InMemoryKycDocumentStore } from '../domains/membership/stores/memory-membership.store';
import { InMemoryOtpStore } from '../domains/verification/stores/otp.store';
import { InMemoryVoteStore } from '../domains/voting/stores/vote.store';
import { InMemoryShortCodeStore } from '../domains/voting/stores/short-code.store';
import { InMemoryInteractionLog } from '../domains/voting/stores/interaction-log.store';

export interface SentSms {
    phone: string;
    message: string;
}

/** Gateway double that records every message; numbers in `failFor` report non-delivery */
export class RecordingSmsGateway implements SmsGateway {
    sent: SentSms[] = [];
    failFor = new Set<string>();

    async sendSMS(phone: string, message: string): Promise<boolean> {
        this.sent.push({ phone, message });
        return !this.failFor.has(phone);
    }

    messagesTo(phone: string): string[] {
        return this.sent.filter(s => s.phone === phone).map(s => s.message);
    }
}

export const makeMember = (overrides: Partial<Member> = {}): Member => ({
    memberId: 'member-1',
    phoneNumber: '+254700000001',
    fullName: 'Test Member',
    groupId: 'group-1',
    role: MemberRole.MEMBER,
    phoneVerified: true,
    kycStatus: KycStatus.PENDING,
    ...overrides
});

export const makeProposal = (overrides: Partial<Proposal> = {}): Proposal => ({
    proposalId: 'proposal-1',
    groupId: 'group-1',
    title: 'Buy seeds',
    description: 'Seeds for the planting season',
    amountRequested: 5000,
    milestoneDescription: 'Seeds delivered',
    deadline: new Date('2030-01-31T00:00:00Z'),
    createdBy: 'member-1',
    createdAt: new Date('2030-01-01T00:00:00Z'),
    votingDeadline: new Date('2030-01-10T12:00:00Z'),
    status: ProposalStatus.VOTING,
    voteCount: { yes: 0, no: 0, total: 0 },
    ...overrides
});

export interface MemoryStores extends Stores {
    otp: InMemoryOtpStore;
    directory: InMemoryMemberDirectory;
    proposals: InMemoryProposalRegistry;
    kycDocuments: InMemoryKycDocumentStore;
    votes: InMemoryVoteStore;
    shortCodes: InMemoryShortCodeStore;
    interactions: InMemoryInteractionLog;
}

export const createMemoryStores = (): MemoryStores => ({
    otp: new InMemoryOtpStore(),
    directory: new InMemoryMemberDirectory(),
    proposals: new InMemoryProposalRegistry(),
    kycDocuments: new InMemoryKycDocumentStore(),
    votes: new InMemoryVoteStore(),
    shortCodes: new InMemoryShortCodeStore(),
    interactions: new InMemoryInteractionLog()
});

export interface TestContext {
    container: Container;
    stores: MemoryStores;
    sms: RecordingSmsGateway;
}

export const createTestContext = (): TestContext => {
    const stores = createMemoryStores();
    const sms = new RecordingSmsGateway();
    const container = createContainer({ driver: 'memory', sms, stores });
    return { container, stores, sms };
};

/** Lets fire-and-forget promises settle */
export const flushPromises = () => new Promise<void>(resolve => setImmediate(resolve));
