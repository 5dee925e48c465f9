import { logger } from './logger';
import { maskPhoneNumber } from '../utils/phone';

/**
 * Audit trail for verification and voting events
 */
const auditLogger = logger.child({ channel: 'audit' });

export enum AuditAction {
    OTP_REQUESTED = 'OTP_REQUESTED',
    OTP_VERIFIED = 'OTP_VERIFIED',
    OTP_REJECTED = 'OTP_REJECTED',
    OTP_LOCKED = 'OTP_LOCKED',
    PHONE_VERIFIED = 'PHONE_VERIFIED',
    KYC_AUTO_ELEVATED = 'KYC_AUTO_ELEVATED',
    VOTE_RECORDED = 'VOTE_RECORDED',
    VOTE_REJECTED = 'VOTE_REJECTED',
    SMS_VOTING_STARTED = 'SMS_VOTING_STARTED',
    SMS_VOTING_CLOSED = 'SMS_VOTING_CLOSED',
    PROPOSAL_CREATED = 'PROPOSAL_CREATED',
    PROPOSAL_RESOLVED = 'PROPOSAL_RESOLVED'
}

interface AuditLogEntry {
    action: AuditAction;
    memberId?: string;
    phone?: string;
    resourceId?: string;
    metadata?: Record<string, unknown>;
    success: boolean;
    errorMessage?: string;
}

export class AuditLogger {
    static log(entry: AuditLogEntry) {
        const logData = {
            timestamp: new Date().toISOString(),
            ...entry
        };

        if (entry.success) {
            auditLogger.info(logData, `[AUDIT] ${entry.action}`);
        } else {
            auditLogger.warn(logData, `[AUDIT FAIL] ${entry.action}`);
        }
    }

    static logVerification(action: AuditAction, phone: string, success: boolean, metadata?: Record<string, unknown>) {
        this.log({
            action,
            phone: maskPhoneNumber(phone),
            success,
            metadata
        });
    }

    static logVote(action: AuditAction, memberId: string | undefined, resourceId: string | undefined, success: boolean, metadata?: Record<string, unknown>) {
        this.log({
            action,
            memberId,
            resourceId,
            success,
            metadata
        });
    }
}

