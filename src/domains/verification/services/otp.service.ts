import { randomInt } from 'crypto';
import {
    MAX_OTP_ATTEMPTS,
    OTP_EXPIRY_MINUTES,
    OTP_LENGTH,
    OTP_RATE_LIMIT_MS,
    VerificationType
} from '../../../shared/constants/verification';
import { NotFoundError, RateLimitedError } from '../../../shared/kernel/error.handler';
import { AuditAction, AuditLogger } from '../../../shared/kernel/audit.logger';
import { logger } from '../../../shared/kernel/logger';
import { maskPhoneNumber } from '../../../shared/utils/phone';
import { SmsGateway } from '../../../services/sms.service';
import { KycElevator, MemberDirectory } from '../../membership/membership.types';
import { OtpRecord, OtpStore, isExpired } from '../stores/otp.store';

export interface OtpRequestResult {
    phone: string;
    sent: boolean;
    expiresAt: Date;
    message: string;
}

export interface OtpVerificationResult {
    phone: string;
    verified: boolean;
    verificationType: VerificationType;
    expiresAt: Date | null;
}

export interface OtpStatus {
    phone: string;
    verificationType: VerificationType;
    expiresAt: Date;
    attemptsRemaining: number;
    canRequestNew: boolean;
}

export interface VerificationStatistics {
    totalMembers: number;
    verifiedPhones: number;
    activeOtps: number;
    verificationRate: number;
}

type AttemptOutcome =
    | { kind: 'missing' }
    | { kind: 'expired'; expiresAt: Date }
    | { kind: 'type_mismatch'; expiresAt: Date; expected: VerificationType }
    | { kind: 'locked' }
    | { kind: 'mismatch'; expiresAt: Date; attempts: number }
    | { kind: 'matched'; expiresAt: Date };

export type CodeGenerator = () => string;

/** Every digit drawn independently and uniformly from 0-9 */
export const generateOtpCode: CodeGenerator = () =>
    Array.from({ length: OTP_LENGTH }, () => randomInt(0, 10).toString()).join('');

const EXPIRY_MS = OTP_EXPIRY_MINUTES * 60 * 1000;

export class PhoneVerificationService {
    constructor(
        private store: OtpStore,
        private sms: SmsGateway,
        private directory: MemberDirectory,
        private kyc: KycElevator,
        private generateCode: CodeGenerator = generateOtpCode
    ) {}

    /**
     * Issue a code and text it to the phone.
     * The record is kept even when the SMS fails, so an immediate retry is rate limited.
     */
    async requestOtp(phone: string, verificationType: VerificationType): Promise<OtpRequestResult> {
        const now = new Date();
        const code = this.generateCode();
        const expiresAt = new Date(now.getTime() + EXPIRY_MS);

        try {
            await this.store.mutate(phone, current => {
                if (current && !isExpired(current, now)) {
                    const waitMs = OTP_RATE_LIMIT_MS - (now.getTime() - current.lastRequestAt.getTime());
                    if (waitMs > 0) {
                        throw new RateLimitedError(
                            `Please wait ${Math.ceil(waitMs / 1000)} seconds before requesting another OTP`,
                            waitMs
                        );
                    }
                }

                const next: OtpRecord = {
                    phone,
                    code,
                    expiresAt,
                    verificationType,
                    attempts: 0,
                    lastRequestAt: now
                };
                return { next, result: undefined };
            });
        } catch (error) {
            if (error instanceof RateLimitedError) {
                AuditLogger.logVerification(AuditAction.OTP_REQUESTED, phone, false, { reason: 'rate_limited' });
                return { phone, sent: false, expiresAt: now, message: error.message };
            }
            throw error;
        }

        const message = `Your verification code is: ${code}. Valid for ${OTP_EXPIRY_MINUTES} minutes. Do not share this code.`;
        const sent = await this.sms.sendSMS(phone, message).catch((error: unknown) => {
            logger.error({ phone: maskPhoneNumber(phone), err: error }, 'Error sending OTP');
            return false;
        });

        AuditLogger.logVerification(AuditAction.OTP_REQUESTED, phone, sent, { verificationType });

        return {
            phone,
            sent,
            expiresAt,
            message: sent ? 'OTP sent successfully' : 'Failed to send OTP. Please try again.'
        };
    }

    /**
     * Check a code. Fails closed; the attempt counter and the comparison
     * happen in one store mutation so a code can only succeed once.
     */
    async verifyOtp(phone: string, code: string, verificationType: VerificationType): Promise<OtpVerificationResult> {
        const now = new Date();
        const provided = code.trim();

        const outcome = await this.store.mutate<AttemptOutcome>(phone, current => {
            if (!current) {
                return { next: undefined, result: { kind: 'missing' } };
            }
            if (isExpired(current, now)) {
                return { next: null, result: { kind: 'expired', expiresAt: current.expiresAt } };
            }
            if (current.verificationType !== verificationType) {
                return {
                    next: undefined,
                    result: { kind: 'type_mismatch', expiresAt: current.expiresAt, expected: current.verificationType }
                };
            }

            const attempts = current.attempts + 1;
            if (attempts > MAX_OTP_ATTEMPTS) {
                return { next: null, result: { kind: 'locked' } };
            }
            if (current.code === provided) {
                return { next: null, result: { kind: 'matched', expiresAt: current.expiresAt } };
            }
            return {
                next: { ...current, attempts },
                result: { kind: 'mismatch', expiresAt: current.expiresAt, attempts }
            };
        });

        const failed = (expiresAt: Date | null): OtpVerificationResult =>
            ({ phone, verified: false, verificationType, expiresAt });

        switch (outcome.kind) {
            case 'missing':
                logger.warn({ phone: maskPhoneNumber(phone) }, 'No OTP found');
                return failed(null);
            case 'expired':
                AuditLogger.logVerification(AuditAction.OTP_REJECTED, phone, false, { reason: 'expired' });
                return failed(outcome.expiresAt);
            case 'type_mismatch':
                AuditLogger.logVerification(AuditAction.OTP_REJECTED, phone, false, {
                    reason: 'type_mismatch',
                    expected: outcome.expected,
                    received: verificationType
                });
                return failed(outcome.expiresAt);
            case 'locked':
                AuditLogger.logVerification(AuditAction.OTP_LOCKED, phone, false, { maxAttempts: MAX_OTP_ATTEMPTS });
                return failed(null);
            case 'mismatch':
                AuditLogger.logVerification(AuditAction.OTP_REJECTED, phone, false, {
                    reason: 'invalid_code',
                    attempt: outcome.attempts,
                    maxAttempts: MAX_OTP_ATTEMPTS
                });
                return failed(outcome.expiresAt);
            case 'matched':
                break;
        }

        AuditLogger.logVerification(AuditAction.OTP_VERIFIED, phone, true, { verificationType });

        if (verificationType === 'registration') {
            await this.markPhoneVerified(phone);
        }

        return { phone, verified: true, verificationType, expiresAt: outcome.expiresAt };
    }

    private async markPhoneVerified(phone: string): Promise<void> {
        const member = await this.directory.getMemberByPhone(phone);
        if (!member) {
            logger.warn({ phone: maskPhoneNumber(phone) }, 'Registration OTP verified for unknown member');
            return;
        }

        await this.directory.setPhoneVerified(member.memberId);
        AuditLogger.log({ action: AuditAction.PHONE_VERIFIED, memberId: member.memberId, success: true });

        try {
            await this.kyc.autoElevate(member.memberId);
        } catch (error) {
            logger.warn({ memberId: member.memberId, err: error }, 'KYC auto-elevation failed');
        }
    }

    async getOtpStatus(phone: string): Promise<OtpStatus> {
        const now = new Date();

        const status = await this.store.mutate<OtpStatus | null>(phone, current => {
            if (!current) return { next: undefined, result: null };
            if (isExpired(current, now)) return { next: null, result: null };

            return {
                next: undefined,
                result: {
                    phone,
                    verificationType: current.verificationType,
                    expiresAt: current.expiresAt,
                    attemptsRemaining: Math.max(0, MAX_OTP_ATTEMPTS - current.attempts),
                    canRequestNew: now.getTime() - current.lastRequestAt.getTime() >= OTP_RATE_LIMIT_MS
                }
            };
        });

        if (!status) throw new NotFoundError('Active OTP');
        return status;
    }

    async cleanupExpired(): Promise<number> {
        const removed = await this.store.deleteExpired(new Date());
        if (removed > 0) {
            logger.info({ removed }, 'Cleaned up expired OTPs');
        }
        return removed;
    }

    async getStatistics(): Promise<VerificationStatistics> {
        const [counts, activeOtps] = await Promise.all([
            this.directory.countMembers(),
            this.store.size()
        ]);

        return {
            totalMembers: counts.total,
            verifiedPhones: counts.phoneVerified,
            activeOtps,
            verificationRate: counts.total > 0 ? counts.phoneVerified / counts.total : 0
        };
    }
}
