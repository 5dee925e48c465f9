import { env } from './config/env';
import { SMSService, SmsGateway } from './services/sms.service';
import { KycDocumentStore, MemberDirectory, ProposalRegistry } from './domains/membership/membership.types';
import {
    InMemoryKycDocumentStore,
    InMemoryMemberDirectory,
    InMemoryProposalRegistry
} from './domains/membership/stores/memory-membership.store';
import {
    MongoKycDocumentStore,
    MongoMemberDirectory,
    MongoProposalRegistry
} from './domains/membership/stores/mongo-membership.store';
import { KycService } from './domains/membership/services/kyc.service';
import { ProposalService } from './domains/membership/services/proposal.service';
import { InMemoryOtpStore, OtpStore } from './domains/verification/stores/otp.store';
import { MongoOtpStore } from './domains/verification/stores/mongo-otp.store';
import { PhoneVerificationService } from './domains/verification/services/otp.service';
import { InMemoryVoteStore, VoteStore } from './domains/voting/stores/vote.store';
import { MongoVoteStore } from './domains/voting/stores/mongo-vote.store';
import { InMemoryShortCodeStore, ShortCodeStore } from './domains/voting/stores/short-code.store';
import { MongoShortCodeStore } from './domains/voting/stores/mongo-short-code.store';
import { InMemoryInteractionLog, InteractionLog } from './domains/voting/stores/interaction-log.store';
import { MongoInteractionLog } from './domains/voting/stores/mongo-interaction-log.store';
import { ShortCodeRegistry } from './domains/voting/services/short-code.registry';
import { VoteLedger } from './domains/voting/services/vote-ledger.service';
import { SmsVotingService } from './domains/voting/services/sms-voting.service';
import { ProposalLifecycleService } from './domains/voting/services/proposal-lifecycle.service';

export type StoreDriver = 'mongo' | 'memory';

export interface Stores {
    otp: OtpStore;
    directory: MemberDirectory;
    proposals: ProposalRegistry;
    kycDocuments: KycDocumentStore;
    votes: VoteStore;
    shortCodes: ShortCodeStore;
    interactions: InteractionLog;
}

export interface Container {
    driver: StoreDriver;
    stores: Stores;
    sms: SmsGateway;
    kyc: KycService;
    verification: PhoneVerificationService;
    proposals: ProposalService;
    shortCodes: ShortCodeRegistry;
    ledger: VoteLedger;
    smsVoting: SmsVotingService;
    lifecycle: ProposalLifecycleService;
}

export interface ContainerOptions {
    driver?: StoreDriver;
    sms?: SmsGateway;
    /** Overrides for individual stores, e.g. pre-seeded in-memory ones */
    stores?: Partial<Stores>;
}

export function createStores(driver: StoreDriver): Stores {
    if (driver === 'memory') {
        return {
            otp: new InMemoryOtpStore(),
            directory: new InMemoryMemberDirectory(),
            proposals: new InMemoryProposalRegistry(),
            kycDocuments: new InMemoryKycDocumentStore(),
            votes: new InMemoryVoteStore(),
            shortCodes: new InMemoryShortCodeStore(),
            interactions: new InMemoryInteractionLog()
        };
    }

    return {
        otp: new MongoOtpStore(),
        directory: new MongoMemberDirectory(),
        proposals: new MongoProposalRegistry(),
        kycDocuments: new MongoKycDocumentStore(),
        votes: new MongoVoteStore(),
        shortCodes: new MongoShortCodeStore(),
        interactions: new MongoInteractionLog()
    };
}

/**
 * Wires stores, gateway and services for one process.
 */
export function createContainer(options: ContainerOptions = {}): Container {
    const driver = options.driver ?? env.STORE_DRIVER;
    const stores: Stores = { ...createStores(driver), ...options.stores };
    const sms = options.sms ?? new SMSService();

    const kyc = new KycService(stores.directory, stores.kycDocuments);
    const shortCodes = new ShortCodeRegistry(stores.shortCodes);
    const ledger = new VoteLedger(stores.votes);

    return {
        driver,
        stores,
        sms,
        kyc,
        verification: new PhoneVerificationService(stores.otp, sms, stores.directory, kyc),
        proposals: new ProposalService(stores.proposals, stores.directory),
        shortCodes,
        ledger,
        smsVoting: new SmsVotingService(stores.directory, stores.proposals, shortCodes, ledger, sms, stores.interactions),
        lifecycle: new ProposalLifecycleService(stores.proposals, ledger, shortCodes)
    };
}
