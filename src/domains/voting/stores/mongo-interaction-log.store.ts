import { SmsInteractionModel } from '../models/sms-interaction.model';
import { InteractionBreakdown, InteractionLog, InteractionType, SmsInteraction } from './interaction-log.store';

interface BreakdownRow {
    _id: InteractionType;
    count: number;
}

export class MongoInteractionLog implements InteractionLog {
    async append(interaction: SmsInteraction): Promise<void> {
        await SmsInteractionModel.create(interaction);
    }

    async countByType(): Promise<InteractionBreakdown> {
        const rows = await SmsInteractionModel.aggregate<BreakdownRow>([
            { $group: { _id: '$interactionType', count: { $sum: 1 } } }
        ]);

        const counts: InteractionBreakdown = {};
        for (const row of rows) {
            counts[row._id] = row.count;
        }
        return counts;
    }
}
