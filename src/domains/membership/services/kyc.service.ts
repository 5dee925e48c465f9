import { logger } from '../../../shared/kernel/logger';
import { AuditAction, AuditLogger } from '../../../shared/kernel/audit.logger';
import {
    DocumentVerificationStatus,
    KycDocument,
    KycDocumentStore,
    KycDocumentType,
    KycElevator,
    KycStatus,
    MemberDirectory
} from '../membership.types';

const GOVERNMENT_ID_TYPES: ReadonlySet<KycDocumentType> = new Set([
    KycDocumentType.NATIONAL_ID,
    KycDocumentType.PASSPORT,
    KycDocumentType.DRIVERS_LICENSE,
    KycDocumentType.VOTER_ID
]);

export type ElevationBasis = 'community_attestation' | 'government_id';

/**
 * Pilot-phase policy: one verified community attestation or one verified
 * government ID is enough. Attestation takes precedence when both exist.
 */
export function decideAutoElevation(documents: KycDocument[]): ElevationBasis | null {
    const verified = documents.filter(d => d.verificationStatus === DocumentVerificationStatus.VERIFIED);

    if (verified.some(d => d.documentType === KycDocumentType.COMMUNITY_ATTESTATION)) {
        return 'community_attestation';
    }
    if (verified.some(d => GOVERNMENT_ID_TYPES.has(d.documentType))) {
        return 'government_id';
    }
    return null;
}

export class KycService implements KycElevator {
    constructor(
        private directory: MemberDirectory,
        private documents: KycDocumentStore
    ) {}

    /**
     * Promote a phone-verified member to KYC VERIFIED when their documents allow it.
     */
    async autoElevate(memberId: string): Promise<boolean> {
        const member = await this.directory.getMemberById(memberId);
        if (!member) return false;

        if (!member.phoneVerified) {
            logger.info({ memberId }, 'Phone not verified, skipping KYC auto-elevation');
            return false;
        }
        if (member.kycStatus === KycStatus.VERIFIED) return true;

        const basis = decideAutoElevation(await this.documents.listMemberDocuments(memberId));
        if (!basis) {
            logger.info({ memberId }, 'No qualifying documents for KYC auto-elevation');
            return false;
        }

        await this.directory.setKycStatus(memberId, KycStatus.VERIFIED);
        AuditLogger.log({ action: AuditAction.KYC_AUTO_ELEVATED, memberId, success: true, metadata: { basis } });
        return true;
    }
}
