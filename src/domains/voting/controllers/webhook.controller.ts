import { FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { SmsVotingService } from '../services/sms-voting.service';

// Twilio inbound message fields
const TwilioWebhookSchema = z.object({
    From: z.string().trim().min(1),
    To: z.string().optional(),
    Body: z.string(),
    MessageSid: z.string().optional()
});

export class WebhookController {
    constructor(private smsVoting: SmsVotingService) {}

    /**
     * Always answers 200 so the provider does not retry; the outcome is in the body.
     */
    handleInboundSms = async (req: FastifyRequest, reply: FastifyReply) => {
        const parsed = TwilioWebhookSchema.safeParse(req.body);
        if (!parsed.success) {
            req.log.warn({ issues: parsed.error.issues.map(i => i.path.join('.')) }, 'Invalid SMS webhook payload');
            return reply.status(200).send({
                success: false,
                error: { code: 'INVALID_WEBHOOK_PAYLOAD', message: 'Invalid webhook payload' }
            });
        }

        const { From, To, Body, MessageSid } = parsed.data;
        const result = await this.smsVoting.processInboundSms({
            from: From,
            to: To,
            body: Body,
            messageId: MessageSid
        });

        return reply.status(200).send({ success: result.processed, data: result });
    };
}
