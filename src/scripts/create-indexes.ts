import mongoose from 'mongoose';
import { env } from '../config/env';
import { MemberModel } from '../domains/membership/models/member.model';
import { ProposalModel } from '../domains/membership/models/proposal.model';
import { KycDocumentModel } from '../domains/membership/models/kyc-document.model';
import { OTPModel } from '../domains/verification/models/otp.model';
import { VoteModel } from '../domains/voting/models/vote.model';
import { SmsProposalModel } from '../domains/voting/models/sms-proposal.model';
import { SmsInteractionModel } from '../domains/voting/models/sms-interaction.model';

/**
 * Creates and ensures all production indexes exist.
 * The unique indexes here back the one-vote-per-member and one-code-per-proposal guarantees.
 */
async function ensureIndexes() {
    try {
        await mongoose.connect(env.MONGO_URI);
        console.log('Connected to MongoDB for index creation...');

        // Membership Indexes
        console.log('Creating Membership indexes...');
        await MemberModel.collection.createIndex({ memberId: 1 }, { unique: true });
        await MemberModel.collection.createIndex({ phoneNumber: 1 }, { unique: true });
        await MemberModel.collection.createIndex({ groupId: 1 });

        await ProposalModel.collection.createIndex({ proposalId: 1 }, { unique: true });
        await ProposalModel.collection.createIndex({ groupId: 1 });
        await ProposalModel.collection.createIndex({ status: 1, votingDeadline: 1 });

        await KycDocumentModel.collection.createIndex({ documentId: 1 }, { unique: true });
        await KycDocumentModel.collection.createIndex({ memberId: 1 });

        // Verification Indexes
        console.log('Creating Verification indexes...');
        await OTPModel.collection.createIndex({ phone: 1 }, { unique: true });
        await OTPModel.collection.createIndex({ expiresAt: 1 }, { expireAfterSeconds: 0 });

        // Voting Indexes
        console.log('Creating Voting indexes...');
        await VoteModel.collection.createIndex({ proposalId: 1, memberId: 1 }, { unique: true });
        await VoteModel.collection.createIndex({ memberId: 1, votedAt: -1 });

        await SmsProposalModel.collection.createIndex({ proposalId: 1 }, { unique: true });
        await SmsProposalModel.collection.createIndex({ shortCode: 1 }, { unique: true });

        await SmsInteractionModel.collection.createIndex({ interactionType: 1 });

        console.log('All indexes created successfully');
        process.exit(0);

    } catch (error) {
        console.error('Index creation failed:', error);
        process.exit(1);
    }
}

void ensureIndexes();
