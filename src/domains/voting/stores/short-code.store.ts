export interface ShortCodeEntry {
    proposalId: string;
    shortCode: string;
    title: string;
    groupId: string;
    votingDeadline: Date;
    createdAt: Date;
}

export interface ShortCodeStore {
    /** False when the proposal or the code is already registered. */
    tryInsert(entry: ShortCodeEntry): Promise<boolean>;
    getByProposal(proposalId: string): Promise<ShortCodeEntry | null>;
    getByCode(shortCode: string): Promise<ShortCodeEntry | null>;
    listCodes(): Promise<string[]>;
    remove(proposalId: string): Promise<boolean>;
    count(): Promise<number>;
}

const copyEntry = (entry: ShortCodeEntry): ShortCodeEntry => ({
    ...entry,
    votingDeadline: new Date(entry.votingDeadline),
    createdAt: new Date(entry.createdAt)
});

export class InMemoryShortCodeStore implements ShortCodeStore {
    private byProposal = new Map<string, ShortCodeEntry>();
    private byCode = new Map<string, string>();

    async tryInsert(entry: ShortCodeEntry): Promise<boolean> {
        if (this.byProposal.has(entry.proposalId) || this.byCode.has(entry.shortCode)) {
            return false;
        }
        this.byProposal.set(entry.proposalId, copyEntry(entry));
        this.byCode.set(entry.shortCode, entry.proposalId);
        return true;
    }

    async getByProposal(proposalId: string): Promise<ShortCodeEntry | null> {
        const entry = this.byProposal.get(proposalId);
        return entry ? copyEntry(entry) : null;
    }

    async getByCode(shortCode: string): Promise<ShortCodeEntry | null> {
        const proposalId = this.byCode.get(shortCode);
        return proposalId ? this.getByProposal(proposalId) : null;
    }

    async listCodes(): Promise<string[]> {
        return [...this.byCode.keys()];
    }

    async remove(proposalId: string): Promise<boolean> {
        const entry = this.byProposal.get(proposalId);
        if (!entry) return false;

        this.byProposal.delete(proposalId);
        this.byCode.delete(entry.shortCode);
        return true;
    }

    async count(): Promise<number> {
        return this.byProposal.size;
    }
}
