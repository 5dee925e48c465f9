import axios from 'axios';
import { env } from '../config/env';
import { logger } from '../shared/kernel/logger';
import { TransportError } from '../shared/kernel/error.handler';
import { maskPhoneNumber } from '../shared/utils/phone';

/**
 * Outbound text messages. Implementations never throw: `false` means not delivered.
 */
export interface SmsGateway {
    sendSMS(phone: string, message: string): Promise<boolean>;
}

export interface SmsServiceConfig {
    accountSid?: string;
    authToken?: string;
    fromNumber?: string;
    timeoutMs: number;
}

export interface BulkSendResult {
    total: number;
    sent: number;
    failed: number;
    failedNumbers: string[];
}

interface TwilioMessageResponse {
    sid?: string;
    status?: string;
    message?: string;
}

/**
 * Twilio Programmable Messaging over its REST API
 */
export class SMSService implements SmsGateway {
    private baseUrl = 'https://api.twilio.com/2010-04-01';

    constructor(
        private config: SmsServiceConfig = {
            accountSid: env.TWILIO_ACCOUNT_SID,
            authToken: env.TWILIO_AUTH_TOKEN,
            fromNumber: env.TWILIO_PHONE_NUMBER,
            timeoutMs: env.SMS_TIMEOUT_MS
        }
    ) {}

    get isConfigured(): boolean {
        return Boolean(this.config.accountSid && this.config.authToken);
    }

    /**
     * Send a single SMS. Without credentials the message is only logged (local development).
     */
    async sendSMS(phone: string, message: string): Promise<boolean> {
        if (!this.isConfigured) {
            logger.warn('Twilio credentials not configured, simulating SMS send');
            logger.debug({ to: maskPhoneNumber(phone), message }, 'SIMULATED SMS');
            return true;
        }

        try {
            const sid = await this.dispatch(phone, message);
            logger.info({ to: maskPhoneNumber(phone), sid }, 'SMS sent');
            return true;
        } catch (error) {
            if (error instanceof TransportError) {
                logger.error({ to: maskPhoneNumber(phone), reason: error.reason }, error.message);
                return false;
            }
            logger.error({ to: maskPhoneNumber(phone), err: error }, 'Unexpected error sending SMS');
            return false;
        }
    }

    private async dispatch(phone: string, message: string): Promise<string> {
        const url = `${this.baseUrl}/Accounts/${this.config.accountSid}/Messages.json`;

        const response = await axios.post<TwilioMessageResponse>(
            url,
            new URLSearchParams({
                From: this.config.fromNumber ?? '',
                To: phone,
                Body: message
            }),
            {
                auth: {
                    username: this.config.accountSid ?? '',
                    password: this.config.authToken ?? ''
                },
                timeout: this.config.timeoutMs,
                validateStatus: () => true
            }
        ).catch((error: unknown) => {
            throw new TransportError(
                'SMS gateway unreachable',
                axios.isAxiosError(error) ? error.message : error
            );
        });

        if (response.status !== 201) {
            throw new TransportError(`SMS gateway rejected message (HTTP ${response.status})`, response.data);
        }

        return response.data.sid ?? '';
    }
}

/**
 * Fan a message out to many recipients concurrently. A send that throws counts as failed.
 */
export async function sendBulkSms(gateway: SmsGateway, phones: string[], message: string): Promise<BulkSendResult> {
    const outcomes = await Promise.all(phones.map(phone =>
        gateway.sendSMS(phone, message).catch((error: unknown) => {
            logger.error({ to: maskPhoneNumber(phone), err: error }, 'SMS gateway threw during bulk send');
            return false;
        })
    ));
    const failedNumbers = phones.filter((_, i) => !outcomes[i]);

    const result: BulkSendResult = {
        total: phones.length,
        sent: phones.length - failedNumbers.length,
        failed: failedNumbers.length,
        failedNumbers
    };

    logger.info({ total: result.total, sent: result.sent, failed: result.failed }, 'Bulk SMS completed');
    return result;
}
