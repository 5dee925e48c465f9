export enum MemberRole {
    MEMBER = 'MEMBER',
    LEADER = 'LEADER',
    TREASURER = 'TREASURER'
}

export enum KycStatus {
    PENDING = 'PENDING',
    VERIFIED = 'VERIFIED',
    REJECTED = 'REJECTED',
    REQUIRES_REVIEW = 'REQUIRES_REVIEW'
}

export enum ProposalStatus {
    DRAFT = 'DRAFT',
    VOTING = 'VOTING',
    PASSED = 'PASSED',
    FAILED = 'FAILED',
    EXECUTED = 'EXECUTED'
}

export enum KycDocumentType {
    NATIONAL_ID = 'NATIONAL_ID',
    PASSPORT = 'PASSPORT',
    DRIVERS_LICENSE = 'DRIVERS_LICENSE',
    VOTER_ID = 'VOTER_ID',
    COMMUNITY_ATTESTATION = 'COMMUNITY_ATTESTATION'
}

export enum DocumentVerificationStatus {
    PENDING = 'PENDING',
    VERIFIED = 'VERIFIED',
    FAILED = 'FAILED'
}

export interface Member {
    memberId: string;
    phoneNumber: string;
    fullName: string;
    groupId: string;
    role: MemberRole;
    phoneVerified: boolean;
    kycStatus: KycStatus;
    lastActive?: Date;
}

export interface Tally {
    yes: number;
    no: number;
    total: number;
}

export interface Proposal {
    proposalId: string;
    groupId: string;
    title: string;
    description: string;
    amountRequested: number;
    milestoneDescription: string;
    deadline: Date;
    createdBy: string;
    createdAt: Date;
    votingDeadline: Date;
    status: ProposalStatus;
    voteCount: Tally;
}

export type ProposalStatusCounts = Partial<Record<ProposalStatus, number>>;

export type NewProposal = Omit<Proposal, 'proposalId' | 'createdAt' | 'status' | 'voteCount'>;

export interface KycDocument {
    documentId: string;
    memberId: string;
    documentType: KycDocumentType;
    verificationStatus: DocumentVerificationStatus;
    verifiedAt?: Date;
}

export interface MemberCounts {
    total: number;
    phoneVerified: number;
}

/**
 * Member/group records owned by the membership side of the platform.
 */
export interface MemberDirectory {
    getMemberByPhone(phoneNumber: string): Promise<Member | null>;
    getMemberById(memberId: string): Promise<Member | null>;
    setPhoneVerified(memberId: string): Promise<void>;
    setKycStatus(memberId: string, status: KycStatus): Promise<void>;
    listGroupMembers(groupId: string): Promise<Member[]>;
    countMembers(): Promise<MemberCounts>;
}

export interface ProposalRegistry {
    createProposal(input: NewProposal): Promise<Proposal>;
    getProposal(proposalId: string): Promise<Proposal | null>;
    listGroupProposals(groupId: string): Promise<Proposal[]>;
    /** Newest first */
    listByStatus(status: ProposalStatus): Promise<Proposal[]>;
    countByStatus(): Promise<ProposalStatusCounts>;
    listVotingPastDeadline(now: Date): Promise<Proposal[]>;
    /**
     * Writes the status only while the proposal is still in `expected`.
     * Returns false when another writer got there first.
     */
    transitionStatus(proposalId: string, expected: ProposalStatus, next: ProposalStatus): Promise<boolean>;
    setVoteCount(proposalId: string, tally: Tally): Promise<void>;
}

export interface KycDocumentStore {
    listMemberDocuments(memberId: string): Promise<KycDocument[]>;
}

/** Best-effort KYC upgrade after a phone is verified. */
export interface KycElevator {
    autoElevate(memberId: string): Promise<boolean>;
}
