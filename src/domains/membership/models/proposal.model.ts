import mongoose, { Schema, Document } from 'mongoose';
import { ProposalStatus, Tally } from '../membership.types';

export interface IProposal extends Document {
    proposalId: string;
    groupId: string;
    title: string;
    description: string;
    amountRequested: number;
    milestoneDescription: string;
    deadline: Date;
    createdBy: string; // memberId
    votingDeadline: Date;
    status: ProposalStatus;
    voteCount: Tally;
    createdAt: Date;
    updatedAt: Date;
}

const ProposalSchema = new Schema<IProposal>(
    {
        proposalId: { type: String, required: true, unique: true, index: true },
        groupId: { type: String, required: true, index: true },
        title: { type: String, required: true },
        description: { type: String, required: true },
        amountRequested: { type: Number, required: true, min: 0 },
        milestoneDescription: { type: String, required: true },
        deadline: { type: Date, required: true },
        createdBy: { type: String, required: true },
        votingDeadline: { type: Date, required: true },
        status: {
            type: String,
            enum: Object.values(ProposalStatus),
            default: ProposalStatus.VOTING
        },
        voteCount: {
            yes: { type: Number, default: 0 },
            no: { type: Number, default: 0 },
            total: { type: Number, default: 0 }
        }
    },
    { timestamps: true }
);

// Deadline sweep: VOTING proposals ordered by deadline
ProposalSchema.index({ status: 1, votingDeadline: 1 });

export const ProposalModel = mongoose.model<IProposal>('Proposal', ProposalSchema);
