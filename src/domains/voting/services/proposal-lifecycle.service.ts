import { AuditAction, AuditLogger } from '../../../shared/kernel/audit.logger';
import { logger } from '../../../shared/kernel/logger';
import { ProposalRegistry, ProposalStatus, Tally } from '../../membership/membership.types';
import { ShortCodeRegistry } from './short-code.registry';
import { VoteLedger } from './vote-ledger.service';

export type ProposalOutcome = ProposalStatus.PASSED | ProposalStatus.FAILED;

/** Simple majority of votes cast. A proposal nobody voted on fails. */
export const decideOutcome = (tally: Tally): ProposalOutcome =>
    tally.total > 0 && tally.yes > tally.total / 2 ? ProposalStatus.PASSED : ProposalStatus.FAILED;

/**
 * Closes proposals whose voting deadline has passed.
 */
export class ProposalLifecycleService {
    constructor(
        private proposals: ProposalRegistry,
        private ledger: VoteLedger,
        private registry: ShortCodeRegistry
    ) {}

    /**
     * Resolve every VOTING proposal past its deadline. Safe to run concurrently:
     * the status write only lands while the proposal is still VOTING.
     * A failure on one proposal is logged and the sweep moves on.
     * Returns how many proposals this call resolved.
     */
    async checkVotingDeadlines(now: Date = new Date()): Promise<number> {
        const due = await this.proposals.listVotingPastDeadline(now);
        let resolved = 0;

        for (const proposal of due) {
            try {
                if (await this.resolve(proposal.proposalId)) resolved++;
            } catch (error) {
                logger.error({ proposalId: proposal.proposalId, err: error }, 'Failed to resolve proposal');
            }
        }

        if (resolved > 0) {
            logger.info({ resolved }, 'Resolved proposals past their voting deadline');
        }
        return resolved;
    }

    private async resolve(proposalId: string): Promise<boolean> {
        const tally = await this.ledger.getTally(proposalId);
        const outcome = decideOutcome(tally);

        const transitioned = await this.proposals.transitionStatus(proposalId, ProposalStatus.VOTING, outcome);
        if (!transitioned) {
            logger.debug({ proposalId }, 'Proposal already resolved');
            return false;
        }

        // Once the status has moved no later sweep sees this proposal, so the code goes first
        await this.registry.close(proposalId);

        await this.proposals.setVoteCount(proposalId, tally).catch((error: unknown) => {
            logger.warn({ proposalId, err: error }, 'Failed to store final vote count');
        });

        AuditLogger.log({
            action: AuditAction.PROPOSAL_RESOLVED,
            resourceId: proposalId,
            success: true,
            metadata: { outcome, ...tally }
        });
        return true;
    }
}
