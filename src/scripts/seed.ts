import mongoose from 'mongoose';
import { v4 as uuidv4 } from 'uuid';
import { env } from '../config/env';
import { MemberModel } from '../domains/membership/models/member.model';
import { ProposalModel } from '../domains/membership/models/proposal.model';
import { KycStatus, MemberRole, ProposalStatus } from '../domains/membership/membership.types';

const DEMO_GROUP_ID = 'group-demo-001';
const VOTING_WINDOW_MS = 3 * 24 * 60 * 60 * 1000;

const membersToSeed = [
    { fullName: 'Demo Leader', phoneNumber: '+254700000001', role: MemberRole.LEADER, phoneVerified: true },
    { fullName: 'Demo Treasurer', phoneNumber: '+254700000002', role: MemberRole.TREASURER, phoneVerified: true },
    { fullName: 'Demo Member One', phoneNumber: '+254700000003', role: MemberRole.MEMBER, phoneVerified: true },
    { fullName: 'Demo Member Two', phoneNumber: '+254700000004', role: MemberRole.MEMBER, phoneVerified: false }
];

const seed = async () => {
    try {
        await mongoose.connect(env.MONGO_URI);
        console.log('Connected to MongoDB for Seeding');

        let leaderId: string | undefined;

        for (const member of membersToSeed) {
            const existing = await MemberModel.findOne({ phoneNumber: member.phoneNumber });
            if (existing) {
                console.log(`Member already exists: ${member.fullName}`);
                if (member.role === MemberRole.LEADER) leaderId = existing.memberId;
                continue;
            }

            const memberId = uuidv4();
            await MemberModel.create({
                ...member,
                memberId,
                groupId: DEMO_GROUP_ID,
                kycStatus: member.phoneVerified ? KycStatus.VERIFIED : KycStatus.PENDING
            });
            if (member.role === MemberRole.LEADER) leaderId = memberId;
            console.log(`Created ${member.role} ${member.fullName}`);
        }

        const hasProposal = await ProposalModel.exists({ groupId: DEMO_GROUP_ID });
        if (!hasProposal && leaderId) {
            const votingDeadline = new Date(Date.now() + VOTING_WINDOW_MS);
            await ProposalModel.create({
                proposalId: uuidv4(),
                groupId: DEMO_GROUP_ID,
                title: 'Buy a water tank for the market stall',
                description: 'Shared water storage for the group market stall',
                amountRequested: 25000,
                milestoneDescription: 'Tank installed and receipt uploaded',
                deadline: votingDeadline,
                createdBy: leaderId,
                votingDeadline,
                status: ProposalStatus.VOTING
            });
            console.log('Created demo proposal');
        }

        console.log('Seeding completed successfully');
        process.exit(0);
    } catch (err) {
        console.error('Seeding Failed:', err);
        process.exit(1);
    }
};

void seed();
