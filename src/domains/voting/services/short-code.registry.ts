import { ConflictError } from '../../../shared/kernel/error.handler';
import { logger } from '../../../shared/kernel/logger';
import { ShortCodeEntry, ShortCodeStore } from '../stores/short-code.store';

export const MAX_SHORT_CODE = 9999;
const MAX_ALLOCATION_ATTEMPTS = 10;

/** 7 -> "007", 1234 -> "1234" */
export const formatShortCode = (n: number): string => n.toString().padStart(3, '0');

const lowestFreeCode = (taken: Set<string>): string | null => {
    for (let n = 1; n <= MAX_SHORT_CODE; n++) {
        const code = formatShortCode(n);
        if (!taken.has(code)) return code;
    }
    return null;
};

/**
 * Maps proposals open for SMS voting to the short codes members type in their replies.
 */
export class ShortCodeRegistry {
    constructor(private store: ShortCodeStore) {}

    /**
     * Allocate the lowest free code. Registering the same proposal twice returns its current code.
     */
    async register(proposalId: string, title: string, groupId: string, votingDeadline: Date): Promise<string> {
        for (let attempt = 0; attempt < MAX_ALLOCATION_ATTEMPTS; attempt++) {
            const existing = await this.store.getByProposal(proposalId);
            if (existing) return existing.shortCode;

            const shortCode = lowestFreeCode(new Set(await this.store.listCodes()));
            if (!shortCode) {
                throw new ConflictError('No short codes available');
            }

            const inserted = await this.store.tryInsert({
                proposalId,
                shortCode,
                title,
                groupId,
                votingDeadline,
                createdAt: new Date()
            });
            if (inserted) {
                logger.info({ proposalId, shortCode }, 'Short code registered');
                return shortCode;
            }
        }

        throw new ConflictError(`Could not allocate a short code for proposal ${proposalId}, please retry`);
    }

    async resolve(shortCode: string): Promise<string | null> {
        const entry = await this.store.getByCode(shortCode);
        return entry ? entry.proposalId : null;
    }

    async get(proposalId: string): Promise<ShortCodeEntry | null> {
        return this.store.getByProposal(proposalId);
    }

    async getByCode(shortCode: string): Promise<ShortCodeEntry | null> {
        return this.store.getByCode(shortCode);
    }

    async close(proposalId: string): Promise<boolean> {
        const removed = await this.store.remove(proposalId);
        if (removed) {
            logger.info({ proposalId }, 'Short code released');
        }
        return removed;
    }

    async activeCount(): Promise<number> {
        return this.store.count();
    }
}
