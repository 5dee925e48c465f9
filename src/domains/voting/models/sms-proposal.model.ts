import mongoose, { Schema, Document } from 'mongoose';

export interface ISmsProposal extends Document {
    proposalId: string;
    shortCode: string;
    title: string;
    groupId: string;
    votingDeadline: Date;
    createdAt: Date;
}

/**
 * Proposals currently open for SMS voting.
 * Removing a document frees its short code for reuse.
 */
const SmsProposalSchema = new Schema<ISmsProposal>({
    proposalId: { type: String, required: true, unique: true },
    shortCode: { type: String, required: true, unique: true },
    title: { type: String, required: true },
    groupId: { type: String, required: true, index: true },
    votingDeadline: { type: Date, required: true },
    createdAt: { type: Date, required: true, default: Date.now }
});

export const SmsProposalModel = mongoose.model<ISmsProposal>('SmsProposal', SmsProposalSchema);
