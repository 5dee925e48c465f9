import { AlreadyVotedError, ConflictError, NotFoundError, ValidationError } from '../../../shared/kernel/error.handler';
import { AuditAction, AuditLogger } from '../../../shared/kernel/audit.logger';
import { logger } from '../../../shared/kernel/logger';
import { formatPhoneNumber, maskPhoneNumber } from '../../../shared/utils/phone';
import { SmsGateway, sendBulkSms } from '../../../services/sms.service';
import { MemberDirectory, ProposalRegistry, ProposalStatus, Tally } from '../../membership/membership.types';
import { InteractionBreakdown, InteractionLog, InteractionType } from '../stores/interaction-log.store';
import { ShortCodeRegistry } from './short-code.registry';
import { VoteLedger } from './vote-ledger.service';
import { parseVoteMessage } from './vote-parser';

export interface InboundSms {
    from: string;
    to?: string;
    body: string;
    messageId?: string;
}

export interface SmsVoteResult {
    phone: string;
    memberId: string | null;
    proposalId: string | null;
    vote: boolean | null;
    processed: boolean;
    errorMessage: string | null;
    responseMessage: string;
}

export interface StartSmsVotingResult {
    proposalId: string;
    shortCode: string;
    broadcast: {
        sent: number;
        failed: number;
        totalRecipients: number;
    };
    eligibleVoters: number;
}

export interface VotingStatus {
    proposalId: string;
    shortCode: string;
    title: string;
    votingDeadline: Date;
    isActive: boolean;
    tally: Tally;
}

export interface SmsStatistics {
    totalInteractions: number;
    successfulVotes: number;
    activeProposals: number;
    interactionBreakdown: InteractionBreakdown;
    successRate: number;
}

const CONFIRMATION_TITLE_LENGTH = 30;
const BROADCAST_TITLE_LENGTH = 60;

const truncate = (text: string, max: number): string =>
    text.length > max ? `${text.slice(0, max)}...` : text;

/** 2025-03-01T18:30:00.000Z -> "2025-03-01 18:30 UTC" */
const formatDeadline = (deadline: Date): string =>
    `${deadline.toISOString().slice(0, 16).replace('T', ' ')} UTC`;

export const buildBroadcastMessage = (title: string, shortCode: string, votingDeadline: Date): string => [
    'GROUP VOTE',
    `Proposal: ${title.slice(0, BROADCAST_TITLE_LENGTH)}`,
    `Vote by ${formatDeadline(votingDeadline)}`,
    `Reply: YES${shortCode} or NO${shortCode}`
].join('\n');

/**
 * Inbound vote handling and the SMS side of a proposal's voting window.
 */
export class SmsVotingService {
    constructor(
        private directory: MemberDirectory,
        private proposals: ProposalRegistry,
        private registry: ShortCodeRegistry,
        private ledger: VoteLedger,
        private sms: SmsGateway,
        private interactions: InteractionLog
    ) {}

    /**
     * Run an inbound message through the vote pipeline.
     * Never throws: every failure becomes a result with a reply for the sender.
     */
    async processInboundSms(inbound: InboundSms): Promise<SmsVoteResult> {
        const phone = formatPhoneNumber(inbound.from) ?? inbound.from.trim();
        const body = inbound.body.trim().toUpperCase();

        logger.info({ from: maskPhoneNumber(phone), messageId: inbound.messageId }, 'Processing inbound SMS');

        try {
            return await this.runPipeline(phone, body);
        } catch (error) {
            logger.error({ from: maskPhoneNumber(phone), err: error }, 'Inbound SMS processing failed');
            return this.finish(body, 'vote_error', {
                phone,
                memberId: null,
                proposalId: null,
                vote: null,
                processed: false,
                errorMessage: error instanceof Error ? error.message : 'Inbound SMS processing failed',
                responseMessage: 'Error recording vote. Please try again.'
            });
        }
    }

    private async runPipeline(phone: string, body: string): Promise<SmsVoteResult> {
        const now = new Date();

        const reject = (
            type: InteractionType,
            errorMessage: string,
            responseMessage: string,
            ids: { memberId?: string; proposalId?: string } = {}
        ) => this.finish(body, type, {
            phone,
            memberId: ids.memberId ?? null,
            proposalId: ids.proposalId ?? null,
            vote: null,
            processed: false,
            errorMessage,
            responseMessage
        });

        const member = await this.directory.getMemberByPhone(phone);
        if (!member) {
            return reject(
                'unregistered_phone',
                'Phone number not registered',
                'Phone number not registered. Please ask your group leader to register you first.'
            );
        }

        const { memberId } = member;
        if (!member.phoneVerified) {
            return reject(
                'unverified_phone',
                'Phone number not verified',
                'Phone number not verified. Please complete verification first.',
                { memberId }
            );
        }

        const parsed = parseVoteMessage(body);
        if (!parsed) {
            return reject(
                'invalid_format',
                'Invalid vote format',
                'Invalid vote format. Use YES### or NO### (e.g., YES001)',
                { memberId }
            );
        }

        const { vote, shortCode } = parsed;
        const entry = await this.registry.getByCode(shortCode);
        if (!entry) {
            return reject(
                'invalid_proposal',
                'Invalid proposal code',
                `Invalid proposal code: ${shortCode}`,
                { memberId }
            );
        }

        const { proposalId } = entry;
        if (now.getTime() > entry.votingDeadline.getTime()) {
            return reject(
                'deadline_passed',
                'Voting deadline passed',
                `Voting deadline passed for proposal ${shortCode}`,
                { memberId, proposalId }
            );
        }

        let tally: Tally;
        try {
            tally = await this.ledger.recordVote(memberId, proposalId, vote);
        } catch (error) {
            if (error instanceof AlreadyVotedError) {
                return reject(
                    'already_voted',
                    'Already voted',
                    `You already voted on proposal ${shortCode}`,
                    { memberId, proposalId }
                );
            }
            logger.error({ memberId, proposalId, err: error }, 'Error recording vote');
            return reject(
                'vote_error',
                error instanceof Error ? error.message : 'Vote could not be recorded',
                'Error recording vote. Please try again.',
                { memberId, proposalId }
            );
        }

        await this.proposals.setVoteCount(proposalId, tally).catch((error: unknown) => {
            logger.warn({ proposalId, err: error }, 'Failed to update proposal vote count');
        });

        const responseMessage = [
            `Vote recorded: ${vote ? 'YES' : 'NO'} for ${truncate(entry.title, CONFIRMATION_TITLE_LENGTH)}`,
            `Current tally: ${tally.yes} YES, ${tally.no} NO`
        ].join('\n');

        void this.notify(phone, responseMessage);

        return this.finish(body, 'vote_recorded', {
            phone,
            memberId,
            proposalId,
            vote,
            processed: true,
            errorMessage: null,
            responseMessage
        });
    }

    private async finish(message: string, interactionType: InteractionType, result: SmsVoteResult): Promise<SmsVoteResult> {
        try {
            await this.interactions.append({
                phone: result.phone,
                message,
                interactionType,
                response: result.responseMessage,
                timestamp: new Date()
            });
        } catch (error) {
            logger.error({ err: error, interactionType }, 'Failed to log SMS interaction');
        }
        return result;
    }

    /** Confirmation SMS, sent without holding up the webhook response */
    private async notify(phone: string, message: string): Promise<void> {
        try {
            const sent = await this.sms.sendSMS(phone, message);
            if (!sent) {
                logger.warn({ to: maskPhoneNumber(phone) }, 'Vote confirmation SMS not delivered');
            }
        } catch (error) {
            logger.warn({ to: maskPhoneNumber(phone), err: error }, 'Failed to send vote confirmation SMS');
        }
    }

    /**
     * Open a proposal for SMS voting and text its short code to every verified member of the group.
     */
    async startSmsVoting(proposalId: string): Promise<StartSmsVotingResult> {
        const proposal = await this.proposals.getProposal(proposalId);
        if (!proposal) throw new NotFoundError('Proposal');

        if (proposal.status !== ProposalStatus.VOTING) {
            throw new ConflictError(`Proposal ${proposalId} is not open for voting (status ${proposal.status})`);
        }
        if (proposal.votingDeadline.getTime() <= Date.now()) {
            throw new ConflictError(`Voting deadline for proposal ${proposalId} has already passed`);
        }

        const members = await this.directory.listGroupMembers(proposal.groupId);
        const eligible = members.filter(m => m.phoneVerified);
        if (eligible.length === 0) {
            throw new ValidationError(`No members with verified phone numbers in group ${proposal.groupId}`);
        }

        const shortCode = await this.registry.register(
            proposal.proposalId,
            proposal.title,
            proposal.groupId,
            proposal.votingDeadline
        );

        const message = buildBroadcastMessage(proposal.title, shortCode, proposal.votingDeadline);
        const broadcast = await sendBulkSms(this.sms, eligible.map(m => m.phoneNumber), message);

        AuditLogger.log({
            action: AuditAction.SMS_VOTING_STARTED,
            resourceId: proposalId,
            success: true,
            metadata: { shortCode, sent: broadcast.sent, failed: broadcast.failed }
        });

        return {
            proposalId,
            shortCode,
            broadcast: {
                sent: broadcast.sent,
                failed: broadcast.failed,
                totalRecipients: broadcast.total
            },
            eligibleVoters: eligible.length
        };
    }

    async getVotingStatus(proposalId: string): Promise<VotingStatus> {
        const entry = await this.registry.get(proposalId);
        if (!entry) throw new NotFoundError('SMS voting for proposal');

        const tally = await this.ledger.getTally(proposalId);

        return {
            proposalId,
            shortCode: entry.shortCode,
            title: entry.title,
            votingDeadline: entry.votingDeadline,
            isActive: Date.now() <= entry.votingDeadline.getTime(),
            tally
        };
    }

    async closeSmsVoting(proposalId: string): Promise<boolean> {
        const closed = await this.registry.close(proposalId);
        AuditLogger.log({ action: AuditAction.SMS_VOTING_CLOSED, resourceId: proposalId, success: closed });
        return closed;
    }

    async getSmsStatistics(): Promise<SmsStatistics> {
        const [breakdown, activeProposals] = await Promise.all([
            this.interactions.countByType(),
            this.registry.activeCount()
        ]);

        const totalInteractions = Object.values(breakdown).reduce<number>((sum, n) => sum + (n ?? 0), 0);
        const successfulVotes = breakdown.vote_recorded ?? 0;

        return {
            totalInteractions,
            successfulVotes,
            activeProposals,
            interactionBreakdown: breakdown,
            successRate: totalInteractions > 0 ? successfulVotes / totalInteractions : 0
        };
    }
}
