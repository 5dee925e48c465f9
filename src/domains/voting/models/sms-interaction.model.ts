import mongoose, { Schema, Document } from 'mongoose';
import { INTERACTION_TYPES, InteractionType } from '../stores/interaction-log.store';

export interface ISmsInteraction extends Document {
    phone: string;
    message: string;
    interactionType: InteractionType;
    response: string;
    timestamp: Date;
}

const SmsInteractionSchema = new Schema<ISmsInteraction>({
    phone: { type: String, required: true, index: true },
    message: { type: String, default: '' },
    interactionType: {
        type: String,
        enum: [...INTERACTION_TYPES],
        required: true,
        index: true
    },
    response: { type: String, required: true },
    timestamp: { type: Date, required: true, default: Date.now }
});

export const SmsInteractionModel = mongoose.model<ISmsInteraction>('SmsInteraction', SmsInteractionSchema);
