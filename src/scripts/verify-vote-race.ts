import mongoose from 'mongoose';
import { v4 as uuidv4 } from 'uuid';
import { env } from '../config/env';
import { VoteModel } from '../domains/voting/models/vote.model';
import { SmsProposalModel } from '../domains/voting/models/sms-proposal.model';
import { MongoVoteStore } from '../domains/voting/stores/mongo-vote.store';
import { MongoShortCodeStore } from '../domains/voting/stores/mongo-short-code.store';
import { VoteLedger } from '../domains/voting/services/vote-ledger.service';
import { ShortCodeRegistry } from '../domains/voting/services/short-code.registry';

/**
 * Fires concurrent duplicate votes and concurrent short-code registrations
 * at a live MongoDB and checks the unique indexes hold.
 *
 * Usage: npm run verify-vote-race
 */

const CONCURRENCY = 10;

type Outcome = { ok: true; id: number } | { ok: false; id: number; reason: string };

const settle = (id: number, work: Promise<unknown>): Promise<Outcome> =>
    work
        .then((): Outcome => ({ ok: true, id }))
        .catch((err: unknown): Outcome => ({ ok: false, id, reason: err instanceof Error ? err.message : String(err) }));

async function checkDuplicateVotes(): Promise<boolean> {
    const proposalId = `TEST-PROPOSAL-${uuidv4()}`;
    const memberId = `TEST-MEMBER-${uuidv4()}`;
    const ledger = new VoteLedger(new MongoVoteStore());

    console.log(`Simulating ${CONCURRENCY} concurrent votes from one member on ${proposalId}...`);
    const results = await Promise.all(
        Array.from({ length: CONCURRENCY }, (_, i) => settle(i, ledger.recordVote(memberId, proposalId, i % 2 === 0)))
    );

    const successes = results.filter(r => r.ok);
    const tally = await ledger.getTally(proposalId);
    await VoteModel.deleteMany({ proposalId });

    console.log(`Votes: ${successes.length} recorded, tally total ${tally.total}`);
    if (successes.length === 1 && tally.total === 1) {
        console.log('✅ PASS: Only one vote recorded.');
        return true;
    }

    console.error('❌ FAIL: Duplicate votes recorded for the same member.');
    results.slice(0, 3).forEach(r => {
        if (!r.ok) console.log(`- Request ${r.id}: ${r.reason}`);
    });
    return false;
}

async function checkShortCodeAllocation(): Promise<boolean> {
    const registry = new ShortCodeRegistry(new MongoShortCodeStore());
    const proposalIds = Array.from({ length: CONCURRENCY }, () => `TEST-PROPOSAL-${uuidv4()}`);
    const deadline = new Date(Date.now() + 60 * 60 * 1000);

    console.log(`Simulating ${CONCURRENCY} concurrent short-code registrations...`);
    const codes = await Promise.all(
        proposalIds.map(id => registry.register(id, 'Race check', 'TEST-GROUP', deadline))
    );
    await SmsProposalModel.deleteMany({ proposalId: { $in: proposalIds } });

    const distinct = new Set(codes).size;
    console.log(`Short codes: ${codes.join(', ')}`);
    if (distinct === codes.length) {
        console.log('✅ PASS: Every proposal got its own code.');
        return true;
    }

    console.error('❌ FAIL: A short code was handed out twice.');
    return false;
}

async function run() {
    console.log('--- Starting Vote Race Verification ---');

    await mongoose.connect(env.MONGO_URI);
    console.log('Connected to MongoDB');

    let passed = false;
    try {
        await Promise.all([VoteModel.syncIndexes(), SmsProposalModel.syncIndexes()]);
        const votes = await checkDuplicateVotes();
        const codes = await checkShortCodeAllocation();
        passed = votes && codes;
    } catch (err) {
        console.error('Verification failed:', err);
    } finally {
        await mongoose.disconnect();
        console.log('Disconnected');
    }

    process.exit(passed ? 0 : 1);
}

run().catch((err: unknown) => {
    console.error(err);
    process.exit(1);
});
