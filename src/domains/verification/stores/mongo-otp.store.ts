import { OTPModel, IOTP } from '../models/otp.model';
import { ConflictError, isDuplicateKeyError } from '../../../shared/kernel/error.handler';
import { OtpMutation, OtpRecord, OtpStore } from './otp.store';

const MAX_CAS_RETRIES = 5;

const toRecord = (doc: IOTP): OtpRecord => ({
    phone: doc.phone,
    code: doc.code,
    expiresAt: doc.expiresAt,
    verificationType: doc.verificationType,
    attempts: doc.attempts,
    lastRequestAt: doc.lastRequestAt
});

/**
 * OTP records in MongoDB, one document per phone.
 * Writes are conditional on the revision that was read; a lost race re-reads and retries.
 */
export class MongoOtpStore implements OtpStore {
    async get(phone: string): Promise<OtpRecord | null> {
        const doc = await OTPModel.findOne({ phone });
        return doc ? toRecord(doc) : null;
    }

    async mutate<T>(phone: string, fn: (current: OtpRecord | null) => OtpMutation<T>): Promise<T> {
        for (let attempt = 0; attempt < MAX_CAS_RETRIES; attempt++) {
            const doc = await OTPModel.findOne({ phone });
            const { next, result } = fn(doc ? toRecord(doc) : null);

            if (next === undefined) return result;

            if (await this.write(phone, doc, next)) return result;
        }

        throw new ConflictError(`Concurrent OTP update for ${phone}, please retry`);
    }

    private async write(phone: string, doc: IOTP | null, next: OtpRecord | null): Promise<boolean> {
        if (next === null) {
            if (!doc) return true;
            const deleted = await OTPModel.deleteOne({ phone, revision: doc.revision });
            return deleted.deletedCount > 0;
        }

        if (doc) {
            const updated = await OTPModel.updateOne(
                { phone, revision: doc.revision },
                { $set: { ...next, revision: doc.revision + 1 } }
            );
            return updated.modifiedCount > 0;
        }

        try {
            await OTPModel.create({ ...next, revision: 0 });
            return true;
        } catch (error) {
            // Another request inserted first
            if (isDuplicateKeyError(error)) return false;
            throw error;
        }
    }

    async deleteExpired(now: Date): Promise<number> {
        const result = await OTPModel.deleteMany({ expiresAt: { $lt: now } });
        return result.deletedCount;
    }

    async size(): Promise<number> {
        return OTPModel.countDocuments({});
    }
}
