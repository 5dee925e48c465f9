export const INTERACTION_TYPES = [
    'unregistered_phone',
    'unverified_phone',
    'invalid_format',
    'invalid_proposal',
    'deadline_passed',
    'vote_recorded',
    'already_voted',
    'vote_error'
] as const;

export type InteractionType = (typeof INTERACTION_TYPES)[number];

export interface SmsInteraction {
    phone: string;
    message: string;
    interactionType: InteractionType;
    response: string;
    timestamp: Date;
}

export type InteractionBreakdown = Partial<Record<InteractionType, number>>;

export interface InteractionLog {
    append(interaction: SmsInteraction): Promise<void>;
    countByType(): Promise<InteractionBreakdown>;
}

/** Counts per interaction type; message bodies are not retained in memory */
export class InMemoryInteractionLog implements InteractionLog {
    private counts = new Map<InteractionType, number>();

    async append(interaction: SmsInteraction): Promise<void> {
        const { interactionType } = interaction;
        this.counts.set(interactionType, (this.counts.get(interactionType) ?? 0) + 1);
    }

    async countByType(): Promise<InteractionBreakdown> {
        const breakdown: InteractionBreakdown = {};
        for (const [type, count] of this.counts) {
            breakdown[type] = count;
        }
        return breakdown;
    }
}
