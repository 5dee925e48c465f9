import mongoose, { Schema, Document } from 'mongoose';
import { KycStatus, MemberRole } from '../membership.types';

export interface IMember extends Document {
    memberId: string;
    phoneNumber: string; // E.164
    fullName: string;
    groupId: string;
    location?: string;
    role: MemberRole;
    phoneVerified: boolean;
    kycStatus: KycStatus;
    lastActive?: Date;
}

const MemberSchema = new Schema<IMember>(
    {
        memberId: { type: String, required: true, unique: true, index: true },
        phoneNumber: { type: String, required: true, unique: true },
        fullName: { type: String, required: true },
        groupId: { type: String, required: true, index: true },
        location: { type: String },
        role: {
            type: String,
            enum: Object.values(MemberRole),
            default: MemberRole.MEMBER
        },
        phoneVerified: { type: Boolean, default: false },
        kycStatus: {
            type: String,
            enum: Object.values(KycStatus),
            default: KycStatus.PENDING
        },
        lastActive: { type: Date }
    },
    { timestamps: true }
);

export const MemberModel = mongoose.model<IMember>('Member', MemberSchema);
