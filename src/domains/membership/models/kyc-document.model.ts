import mongoose, { Schema, Document } from 'mongoose';
import { DocumentVerificationStatus, KycDocumentType } from '../membership.types';

export interface IKycDocument extends Document {
    documentId: string;
    memberId: string;
    documentType: KycDocumentType;
    documentNumber: string;
    documentImageCid?: string;
    issuingAuthority?: string;
    expiryDate?: Date;
    verificationStatus: DocumentVerificationStatus;
    verifiedAt?: Date;
}

const KycDocumentSchema = new Schema<IKycDocument>(
    {
        documentId: { type: String, required: true, unique: true },
        memberId: { type: String, required: true, index: true },
        documentType: {
            type: String,
            enum: Object.values(KycDocumentType),
            required: true
        },
        documentNumber: { type: String, required: true },
        documentImageCid: { type: String },
        issuingAuthority: { type: String },
        expiryDate: { type: Date },
        verificationStatus: {
            type: String,
            enum: Object.values(DocumentVerificationStatus),
            default: DocumentVerificationStatus.PENDING
        },
        verifiedAt: { type: Date }
    },
    { timestamps: true }
);

export const KycDocumentModel = mongoose.model<IKycDocument>('KycDocument', KycDocumentSchema);
