import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { FastifyInstance } from 'fastify';
import { buildApp } from '../app';
import { MemberRole, ProposalStatus } from '../domains/membership/membership.types';
import { createTestContext, makeMember, makeProposal, TestContext } from './helpers';

const DEADLINE = new Date('2030-01-10T12:00:00Z');

describe('HTTP API', () => {
    let ctx: TestContext;
    let app: FastifyInstance;
    let leaderToken: string;
    let memberToken: string;

    beforeEach(async () => {
        vi.useFakeTimers({ toFake: ['Date'] });
        vi.setSystemTime(new Date('2030-01-05T08:00:00Z'));

        ctx = createTestContext();
        ctx.stores.directory.addMember(makeMember({ memberId: 'leader-1', phoneNumber: '+254700000001', role: MemberRole.LEADER }));
        ctx.stores.directory.addMember(makeMember({ memberId: 'm-2', phoneNumber: '+254700000002' }));
        ctx.stores.directory.addMember(makeMember({ memberId: 'm-3', phoneNumber: '+254700000003', phoneVerified: false }));

        app = await buildApp(ctx.container);
        await app.ready();
        leaderToken = app.jwt.sign({ id: 'leader-1', role: MemberRole.LEADER });
        memberToken = app.jwt.sign({ id: 'm-2', role: MemberRole.MEMBER });
    });

    afterEach(async () => {
        await app.close();
        vi.useRealTimers();
    });

    describe('health', () => {
        it('should report liveness and readiness', async () => {
            const health = await app.inject({ method: 'GET', url: '/health' });
            const ready = await app.inject({ method: 'GET', url: '/ready' });

            expect(health.statusCode).toBe(200);
            expect(health.json().status).toBe('healthy');
            expect(ready.statusCode).toBe(200);
            expect(ready.json().checks.database.status).toBe('up');
        });
    });

    describe('rate limiting', () => {
        it('should answer every webhook in a burst with 200', async () => {
            const statuses = new Set<number>();
            for (let i = 0; i < 105; i++) {
                const response = await app.inject({
                    method: 'POST',
                    url: '/api/v1/webhooks/sms',
                    payload: { From: '+254799999999', Body: 'YES001' }
                });
                statuses.add(response.statusCode);
            }

            expect([...statuses]).toEqual([200]);
        });

        it('should answer 429 once a client passes the request limit', async () => {
            for (let i = 0; i < 100; i++) {
                await app.inject({ method: 'GET', url: '/health' });
            }

            const limited = await app.inject({ method: 'GET', url: '/health' });

            expect(limited.statusCode).toBe(429);
            expect(limited.json()).toEqual({
                success: false,
                error: { code: 'RATE_LIMITED', message: 'Too many requests, please try again later' }
            });
            expect(limited.headers['retry-after']).toBeDefined();
        });
    });

    describe('verification', () => {
        it('should issue and verify a registration code', async () => {
            const requested = await app.inject({
                method: 'POST',
                url: '/api/v1/verification/request-otp',
                payload: { phone: '0700000003' }
            });

            expect(requested.statusCode).toBe(200);
            expect(requested.json()).toMatchObject({
                success: true,
                data: { phone: '+254700000003', sent: true, message: 'OTP sent successfully' }
            });

            const record = await ctx.stores.otp.get('+254700000003');
            const verified = await app.inject({
                method: 'POST',
                url: '/api/v1/verification/verify-otp',
                payload: { phone: '+254700000003', code: record?.code, verificationType: 'registration' }
            });

            expect(verified.statusCode).toBe(200);
            expect(verified.json()).toMatchObject({
                success: true,
                data: { verified: true, verificationType: 'registration' },
                message: 'Phone number verified successfully'
            });
            expect((await ctx.stores.directory.getMemberById('m-3'))?.phoneVerified).toBe(true);
        });

        it('should return the rate limit message on a quick second request', async () => {
            const payload = { phone: '+254700000002', verificationType: 'voting' };
            await app.inject({ method: 'POST', url: '/api/v1/verification/request-otp', payload });

            const second = await app.inject({ method: 'POST', url: '/api/v1/verification/request-otp', payload });

            expect(second.statusCode).toBe(200);
            expect(second.json()).toMatchObject({
                success: false,
                data: { sent: false, message: 'Please wait 60 seconds before requesting another OTP' }
            });
        });

        it('should reject a malformed phone number', async () => {
            const response = await app.inject({
                method: 'POST',
                url: '/api/v1/verification/request-otp',
                payload: { phone: '12' }
            });

            expect(response.statusCode).toBe(400);
            expect(response.json()).toEqual({
                success: false,
                error: {
                    code: 'VALIDATION_ERROR',
                    message: 'Request validation failed',
                    details: [{ field: 'phone', message: 'Invalid phone number format' }]
                }
            });
        });

        it('should return 404 for the status of a phone without a code', async () => {
            const response = await app.inject({ method: 'GET', url: '/api/v1/verification/%2B254700000002/status' });

            expect(response.statusCode).toBe(404);
            expect(response.json().error).toEqual({ code: 'NOT_FOUND', message: 'Active OTP not found' });
        });

        it('should restrict statistics to leaders', async () => {
            const anonymous = await app.inject({ method: 'GET', url: '/api/v1/verification/stats' });
            const member = await app.inject({
                method: 'GET',
                url: '/api/v1/verification/stats',
                headers: { authorization: `Bearer ${memberToken}` }
            });
            const leader = await app.inject({
                method: 'GET',
                url: '/api/v1/verification/stats',
                headers: { authorization: `Bearer ${leaderToken}` }
            });

            expect(anonymous.statusCode).toBe(401);
            expect(member.statusCode).toBe(403);
            expect(leader.statusCode).toBe(200);
            expect(leader.json().data).toEqual({
                totalMembers: 3,
                verifiedPhones: 2,
                activeOtps: 0,
                verificationRate: 2 / 3
            });
        });
    });

    describe('SMS voting', () => {
        beforeEach(() => {
            ctx.stores.proposals.addProposal(makeProposal({ proposalId: 'p-1', votingDeadline: DEADLINE }));
        });

        const startVoting = () => app.inject({
            method: 'POST',
            url: '/api/v1/proposals/p-1/sms-voting',
            headers: { authorization: `Bearer ${leaderToken}` }
        });

        it('should start voting, take a form-encoded webhook vote and report the status', async () => {
            const started = await startVoting();
            expect(started.statusCode).toBe(201);
            expect(started.json().data).toEqual({
                proposalId: 'p-1',
                shortCode: '001',
                broadcast: { sent: 2, failed: 0, totalRecipients: 2 },
                eligibleVoters: 2
            });

            const webhook = await app.inject({
                method: 'POST',
                url: '/api/v1/webhooks/sms',
                headers: { 'content-type': 'application/x-www-form-urlencoded' },
                payload: 'From=%2B254700000002&To=%2B15005550006&Body=yes001&MessageSid=SM-test'
            });
            expect(webhook.statusCode).toBe(200);
            expect(webhook.json()).toMatchObject({
                success: true,
                data: { memberId: 'm-2', proposalId: 'p-1', vote: true, processed: true }
            });

            const status = await app.inject({ method: 'GET', url: '/api/v1/proposals/p-1/sms-voting' });
            expect(status.json().data).toMatchObject({
                shortCode: '001',
                isActive: true,
                tally: { yes: 1, no: 0, total: 1 }
            });
        });

        it('should answer 200 for webhook messages that are not processed', async () => {
            const response = await app.inject({
                method: 'POST',
                url: '/api/v1/webhooks/sms',
                payload: { From: '+254799999999', Body: 'YES001' }
            });

            expect(response.statusCode).toBe(200);
            expect(response.json()).toMatchObject({
                success: false,
                data: { processed: false, errorMessage: 'Phone number not registered' }
            });
        });

        it('should answer 200 for a webhook payload without a sender', async () => {
            const response = await app.inject({
                method: 'POST',
                url: '/api/v1/webhooks/sms',
                payload: { Body: 'YES001' }
            });

            expect(response.statusCode).toBe(200);
            expect(response.json()).toEqual({
                success: false,
                error: { code: 'INVALID_WEBHOOK_PAYLOAD', message: 'Invalid webhook payload' }
            });
        });

        it('should only let leaders start voting', async () => {
            const response = await app.inject({
                method: 'POST',
                url: '/api/v1/proposals/p-1/sms-voting',
                headers: { authorization: `Bearer ${memberToken}` }
            });

            expect(response.statusCode).toBe(403);
            expect(response.json().error.code).toBe('FORBIDDEN');
        });

        it('should return 409 when the proposal is no longer voting', async () => {
            ctx.stores.proposals.addProposal(makeProposal({ proposalId: 'p-1', status: ProposalStatus.FAILED }));

            const response = await startVoting();

            expect(response.statusCode).toBe(409);
        });

        it('should close voting and 404 on a second close', async () => {
            await startVoting();
            const close = () => app.inject({
                method: 'DELETE',
                url: '/api/v1/proposals/p-1/sms-voting',
                headers: { authorization: `Bearer ${leaderToken}` }
            });

            expect((await close()).statusCode).toBe(200);
            expect((await close()).statusCode).toBe(404);
        });

        it('should resolve proposals past their deadline', async () => {
            await startVoting();
            await ctx.container.ledger.recordVote('m-2', 'p-1', true);
            vi.setSystemTime(new Date('2030-01-10T12:00:01Z'));

            const response = await app.inject({
                method: 'POST',
                url: '/api/v1/proposals/resolve-deadlines',
                headers: { authorization: `Bearer ${leaderToken}` }
            });

            expect(response.json()).toEqual({ success: true, data: { resolved: 1 } });
            expect((await ctx.stores.proposals.getProposal('p-1'))?.status).toBe(ProposalStatus.PASSED);
        });

        it('should list a member voting history', async () => {
            await ctx.container.ledger.recordVote('m-2', 'p-1', false);

            const response = await app.inject({
                method: 'GET',
                url: '/api/v1/members/m-2/votes',
                headers: { authorization: `Bearer ${memberToken}` }
            });

            expect(response.json().data).toEqual({
                memberId: 'm-2',
                totalVotes: 1,
                votes: [{ proposalId: 'p-1', vote: 'NO', votedAt: '2030-01-05T08:00:00.000Z' }]
            });
        });

        it('should serve SMS statistics to leaders', async () => {
            await app.inject({ method: 'POST', url: '/api/v1/webhooks/sms', payload: { From: '+254700000002', Body: 'hello' } });

            const response = await app.inject({
                method: 'GET',
                url: '/api/v1/stats/sms',
                headers: { authorization: `Bearer ${leaderToken}` }
            });

            expect(response.json().data).toEqual({
                totalInteractions: 1,
                successfulVotes: 0,
                activeProposals: 0,
                interactionBreakdown: { invalid_format: 1 },
                successRate: 0
            });
        });
    });

    describe('proposals', () => {
        it('should let a leader create a proposal and members read it', async () => {
            const created = await app.inject({
                method: 'POST',
                url: '/api/v1/proposals',
                headers: { authorization: `Bearer ${leaderToken}` },
                payload: {
                    groupId: 'group-1',
                    title: 'Repair the water pump',
                    description: 'The borehole pump needs a new seal',
                    amountRequested: 12000,
                    milestoneDescription: 'Pump running again',
                    deadline: '2030-01-20T00:00:00Z'
                }
            });

            expect(created.statusCode).toBe(201);
            const proposal = created.json().data;
            expect(proposal).toMatchObject({
                groupId: 'group-1',
                createdBy: 'leader-1',
                status: 'VOTING',
                votingDeadline: '2030-01-20T00:00:00.000Z'
            });

            const fetched = await app.inject({
                method: 'GET',
                url: `/api/v1/proposals/${proposal.proposalId}`,
                headers: { authorization: `Bearer ${memberToken}` }
            });
            expect(fetched.json().data.title).toBe('Repair the water pump');

            const listed = await app.inject({
                method: 'GET',
                url: '/api/v1/proposals/group/group-1',
                headers: { authorization: `Bearer ${memberToken}` }
            });
            expect(listed.json().total).toBe(1);
        });

        it('should list proposals by status and report proposal statistics', async () => {
            ctx.stores.proposals.addProposal(makeProposal({ proposalId: 'p-1' }));
            ctx.stores.proposals.addProposal(makeProposal({ proposalId: 'p-2', status: ProposalStatus.PASSED }));

            const passed = await app.inject({
                method: 'GET',
                url: '/api/v1/proposals/status/PASSED',
                headers: { authorization: `Bearer ${memberToken}` }
            });
            const unknownStatus = await app.inject({
                method: 'GET',
                url: '/api/v1/proposals/status/ARCHIVED',
                headers: { authorization: `Bearer ${memberToken}` }
            });
            const stats = await app.inject({
                method: 'GET',
                url: '/api/v1/stats/proposals',
                headers: { authorization: `Bearer ${leaderToken}` }
            });

            expect(passed.json().total).toBe(1);
            expect(passed.json().data[0].proposalId).toBe('p-2');
            expect(unknownStatus.statusCode).toBe(400);
            expect(stats.json().data).toEqual({
                totalProposals: 2,
                statusBreakdown: { VOTING: 1, PASSED: 1 },
                activeVoting: 1,
                passedProposals: 1,
                failedProposals: 0
            });
        });

        it('should require authentication to read proposals', async () => {
            const response = await app.inject({ method: 'GET', url: '/api/v1/proposals/p-1' });
            expect(response.statusCode).toBe(401);
        });
    });
});
