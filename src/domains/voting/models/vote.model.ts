import mongoose, { Schema, Document } from 'mongoose';

export interface IVote extends Document {
    proposalId: string;
    memberId: string;
    vote: boolean; // true = YES
    votedAt: Date;
}

const VoteSchema = new Schema<IVote>({
    proposalId: { type: String, required: true, index: true },
    memberId: { type: String, required: true, index: true },
    vote: { type: Boolean, required: true },
    votedAt: { type: Date, required: true, default: Date.now }
});

// One vote per member per proposal
VoteSchema.index({ proposalId: 1, memberId: 1 }, { unique: true });

export const VoteModel = mongoose.model<IVote>('Vote', VoteSchema);
