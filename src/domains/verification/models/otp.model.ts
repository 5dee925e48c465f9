import mongoose, { Schema, Document } from 'mongoose';
import { VERIFICATION_TYPES, VerificationType } from '../../../shared/constants/verification';

export interface IOTP extends Document {
    phone: string;
    code: string;
    expiresAt: Date;
    verificationType: VerificationType;
    attempts: number;
    lastRequestAt: Date;
    revision: number; // compare-and-swap token, bumped on every write
}

const OTPSchema = new Schema<IOTP>(
    {
        phone: { type: String, required: true, unique: true, index: true },
        code: { type: String, required: true },
        expiresAt: {
            type: Date,
            required: true,
            index: { expires: 0 } // TTL index - auto-delete when expired
        },
        verificationType: {
            type: String,
            enum: [...VERIFICATION_TYPES],
            required: true
        },
        attempts: { type: Number, default: 0 },
        lastRequestAt: { type: Date, required: true },
        revision: { type: Number, default: 0 }
    },
    { timestamps: true }
);

export const OTPModel = mongoose.model<IOTP>('OTP', OTPSchema);
