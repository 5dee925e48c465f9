import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ProposalStatus } from '../../membership/membership.types';
import { InMemoryProposalRegistry } from '../../membership/stores/memory-membership.store';
import { ProposalLifecycleService, decideOutcome } from '../services/proposal-lifecycle.service';
import { ShortCodeRegistry } from '../services/short-code.registry';
import { VoteLedger } from '../services/vote-ledger.service';
import { InMemoryShortCodeStore } from '../stores/short-code.store';
import { InMemoryVoteStore } from '../stores/vote.store';
import { makeProposal } from '../../../__tests__/helpers';

const DEADLINE = new Date('2030-01-10T12:00:00Z');
const AFTER_DEADLINE = new Date('2030-01-10T12:00:01Z');

describe('decideOutcome', () => {
    it.each([
        [{ yes: 6, no: 4, total: 10 }, ProposalStatus.PASSED],
        [{ yes: 5, no: 5, total: 10 }, ProposalStatus.FAILED],
        [{ yes: 0, no: 0, total: 0 }, ProposalStatus.FAILED],
        [{ yes: 1, no: 0, total: 1 }, ProposalStatus.PASSED],
        [{ yes: 3, no: 4, total: 7 }, ProposalStatus.FAILED]
    ])('should decide %j as %s', (tally, expected) => {
        expect(decideOutcome(tally)).toBe(expected);
    });
});

describe('ProposalLifecycleService', () => {
    let proposals: InMemoryProposalRegistry;
    let ledger: VoteLedger;
    let registry: ShortCodeRegistry;
    let lifecycle: ProposalLifecycleService;

    const castVotes = async (proposalId: string, yes: number, no: number) => {
        for (let i = 0; i < yes; i++) await ledger.recordVote(`yes-${i}`, proposalId, true);
        for (let i = 0; i < no; i++) await ledger.recordVote(`no-${i}`, proposalId, false);
    };

    beforeEach(() => {
        proposals = new InMemoryProposalRegistry();
        ledger = new VoteLedger(new InMemoryVoteStore());
        registry = new ShortCodeRegistry(new InMemoryShortCodeStore());
        lifecycle = new ProposalLifecycleService(proposals, ledger, registry);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should pass a proposal with a yes majority and store the final tally', async () => {
        proposals.addProposal(makeProposal({ proposalId: 'p-1', votingDeadline: DEADLINE }));
        await registry.register('p-1', 'Buy seeds', 'group-1', DEADLINE);
        await castVotes('p-1', 6, 4);

        expect(await lifecycle.checkVotingDeadlines(AFTER_DEADLINE)).toBe(1);

        const proposal = await proposals.getProposal('p-1');
        expect(proposal?.status).toBe(ProposalStatus.PASSED);
        expect(proposal?.voteCount).toEqual({ yes: 6, no: 4, total: 10 });
        expect(await registry.resolve('001')).toBeNull();
    });

    it('should fail a tied proposal', async () => {
        proposals.addProposal(makeProposal({ proposalId: 'p-1', votingDeadline: DEADLINE }));
        await castVotes('p-1', 5, 5);

        await lifecycle.checkVotingDeadlines(AFTER_DEADLINE);

        expect((await proposals.getProposal('p-1'))?.status).toBe(ProposalStatus.FAILED);
    });

    it('should fail a proposal nobody voted on', async () => {
        proposals.addProposal(makeProposal({ proposalId: 'p-1', votingDeadline: DEADLINE }));

        await lifecycle.checkVotingDeadlines(AFTER_DEADLINE);

        expect((await proposals.getProposal('p-1'))?.status).toBe(ProposalStatus.FAILED);
    });

    it('should leave proposals whose deadline has not passed', async () => {
        proposals.addProposal(makeProposal({ proposalId: 'p-1', votingDeadline: DEADLINE }));

        expect(await lifecycle.checkVotingDeadlines(DEADLINE)).toBe(0);
        expect((await proposals.getProposal('p-1'))?.status).toBe(ProposalStatus.VOTING);
    });

    it('should ignore proposals that are not in VOTING', async () => {
        proposals.addProposal(makeProposal({ proposalId: 'p-1', votingDeadline: DEADLINE, status: ProposalStatus.DRAFT }));

        expect(await lifecycle.checkVotingDeadlines(AFTER_DEADLINE)).toBe(0);
        expect((await proposals.getProposal('p-1'))?.status).toBe(ProposalStatus.DRAFT);
    });

    it('should resolve each proposal once across repeated and concurrent runs', async () => {
        proposals.addProposal(makeProposal({ proposalId: 'p-1', votingDeadline: DEADLINE }));
        proposals.addProposal(makeProposal({ proposalId: 'p-2', votingDeadline: DEADLINE }));
        await castVotes('p-1', 2, 1);

        const counts = await Promise.all([
            lifecycle.checkVotingDeadlines(AFTER_DEADLINE),
            lifecycle.checkVotingDeadlines(AFTER_DEADLINE)
        ]);
        const again = await lifecycle.checkVotingDeadlines(AFTER_DEADLINE);

        expect(counts[0] + counts[1]).toBe(2);
        expect(again).toBe(0);
        expect((await proposals.getProposal('p-1'))?.status).toBe(ProposalStatus.PASSED);
        expect((await proposals.getProposal('p-2'))?.status).toBe(ProposalStatus.FAILED);
    });

    it('should release the short code when the final vote count cannot be stored', async () => {
        proposals.addProposal(makeProposal({ proposalId: 'p-1', votingDeadline: DEADLINE }));
        await registry.register('p-1', 'Buy seeds', 'group-1', DEADLINE);
        vi.spyOn(proposals, 'setVoteCount').mockRejectedValueOnce(new Error('db blip'));

        expect(await lifecycle.checkVotingDeadlines(AFTER_DEADLINE)).toBe(1);

        expect((await proposals.getProposal('p-1'))?.status).toBe(ProposalStatus.FAILED);
        expect(await registry.resolve('001')).toBeNull();
    });

    it('should keep resolving other proposals when one of them fails', async () => {
        proposals.addProposal(makeProposal({ proposalId: 'p-1', votingDeadline: DEADLINE }));
        proposals.addProposal(makeProposal({ proposalId: 'p-2', votingDeadline: DEADLINE }));
        vi.spyOn(proposals, 'transitionStatus').mockRejectedValueOnce(new Error('db blip'));

        expect(await lifecycle.checkVotingDeadlines(AFTER_DEADLINE)).toBe(1);
        expect((await proposals.getProposal('p-2'))?.status).toBe(ProposalStatus.FAILED);

        expect(await lifecycle.checkVotingDeadlines(AFTER_DEADLINE)).toBe(1);
        expect((await proposals.getProposal('p-1'))?.status).toBe(ProposalStatus.FAILED);
    });
});
