import { VerificationType } from '../../../shared/constants/verification';

export interface OtpRecord {
    phone: string;
    code: string;
    expiresAt: Date;
    verificationType: VerificationType;
    attempts: number;
    lastRequestAt: Date;
}

/**
 * Result of an atomic OTP mutation.
 * `next` is the record to store, `null` deletes it, `undefined` leaves it untouched.
 */
export interface OtpMutation<T> {
    next: OtpRecord | null | undefined;
    result: T;
}

export interface OtpStore {
    get(phone: string): Promise<OtpRecord | null>;
    /**
     * Read-compute-write on one phone's record with no interleaved writer.
     * `fn` must be synchronous and free of side effects: stores may call it more than once.
     */
    mutate<T>(phone: string, fn: (current: OtpRecord | null) => OtpMutation<T>): Promise<T>;
    deleteExpired(now: Date): Promise<number>;
    size(): Promise<number>;
}

export const isExpired = (record: OtpRecord, now: Date): boolean =>
    now.getTime() > record.expiresAt.getTime();

const copyRecord = (record: OtpRecord): OtpRecord => ({
    ...record,
    expiresAt: new Date(record.expiresAt),
    lastRequestAt: new Date(record.lastRequestAt)
});

/**
 * Map-backed store. The callback runs inside a single synchronous step,
 * so no other request can touch the same phone in between.
 */
export class InMemoryOtpStore implements OtpStore {
    private records = new Map<string, OtpRecord>();

    async get(phone: string): Promise<OtpRecord | null> {
        const record = this.records.get(phone);
        return record ? copyRecord(record) : null;
    }

    async mutate<T>(phone: string, fn: (current: OtpRecord | null) => OtpMutation<T>): Promise<T> {
        const current = this.records.get(phone);
        const { next, result } = fn(current ? copyRecord(current) : null);

        if (next === null) {
            this.records.delete(phone);
        } else if (next !== undefined) {
            this.records.set(phone, copyRecord(next));
        }
        return result;
    }

    async deleteExpired(now: Date): Promise<number> {
        let removed = 0;
        for (const [phone, record] of this.records) {
            if (isExpired(record, now)) {
                this.records.delete(phone);
                removed++;
            }
        }
        return removed;
    }

    async size(): Promise<number> {
        return this.records.size;
    }
}
