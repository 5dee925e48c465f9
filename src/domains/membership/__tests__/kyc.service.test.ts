import { beforeEach, describe, expect, it } from 'vitest';
import {
    DocumentVerificationStatus,
    KycDocument,
    KycDocumentType,
    KycStatus
} from '../membership.types';
import { KycService, decideAutoElevation } from '../services/kyc.service';
import { InMemoryKycDocumentStore, InMemoryMemberDirectory } from '../stores/memory-membership.store';
import { makeMember } from '../../../__tests__/helpers';

const doc = (
    documentType: KycDocumentType,
    verificationStatus = DocumentVerificationStatus.VERIFIED
): KycDocument => ({
    documentId: `doc-${documentType}`,
    memberId: 'member-1',
    documentType,
    verificationStatus
});

describe('decideAutoElevation', () => {
    it('should prefer a community attestation over a government ID', () => {
        expect(decideAutoElevation([
            doc(KycDocumentType.NATIONAL_ID),
            doc(KycDocumentType.COMMUNITY_ATTESTATION)
        ])).toBe('community_attestation');
    });

    it('should accept a single verified government ID', () => {
        expect(decideAutoElevation([doc(KycDocumentType.PASSPORT)])).toBe('government_id');
    });

    it('should ignore documents that are not verified', () => {
        expect(decideAutoElevation([
            doc(KycDocumentType.COMMUNITY_ATTESTATION, DocumentVerificationStatus.PENDING),
            doc(KycDocumentType.VOTER_ID, DocumentVerificationStatus.FAILED)
        ])).toBeNull();
    });

    it('should return null without documents', () => {
        expect(decideAutoElevation([])).toBeNull();
    });
});

describe('KycService.autoElevate', () => {
    let directory: InMemoryMemberDirectory;
    let documents: InMemoryKycDocumentStore;
    let service: KycService;

    beforeEach(() => {
        directory = new InMemoryMemberDirectory();
        documents = new InMemoryKycDocumentStore();
        service = new KycService(directory, documents);
    });

    it('should verify a phone-verified member with qualifying documents', async () => {
        directory.addMember(makeMember());
        documents.addDocument(doc(KycDocumentType.DRIVERS_LICENSE));

        expect(await service.autoElevate('member-1')).toBe(true);
        expect((await directory.getMemberById('member-1'))?.kycStatus).toBe(KycStatus.VERIFIED);
    });

    it('should skip members whose phone is not verified', async () => {
        directory.addMember(makeMember({ phoneVerified: false }));
        documents.addDocument(doc(KycDocumentType.NATIONAL_ID));

        expect(await service.autoElevate('member-1')).toBe(false);
        expect((await directory.getMemberById('member-1'))?.kycStatus).toBe(KycStatus.PENDING);
    });

    it('should leave members without qualifying documents pending', async () => {
        directory.addMember(makeMember());

        expect(await service.autoElevate('member-1')).toBe(false);
    });

    it('should report true for an already verified member', async () => {
        directory.addMember(makeMember({ kycStatus: KycStatus.VERIFIED }));

        expect(await service.autoElevate('member-1')).toBe(true);
    });

    it('should report false for an unknown member', async () => {
        expect(await service.autoElevate('nobody')).toBe(false);
    });
});
