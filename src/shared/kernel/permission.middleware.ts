import { FastifyRequest } from 'fastify';
import { MemberRole } from '../../domains/membership/membership.types';
import { ForbiddenError, UnauthorizedError } from './error.handler';

/** Roles allowed to run SMS voting and read group statistics */
export const LEADER_ROLES: readonly MemberRole[] = [MemberRole.LEADER, MemberRole.TREASURER];

/**
 * Middleware to check if the member has any of the specified roles.
 * Runs after `fastify.authenticate`.
 */
export const requireAnyRole = (roles: readonly MemberRole[]) => {
    return async (req: FastifyRequest) => {
        if (!req.user) {
            throw new UnauthorizedError();
        }

        if (!roles.includes(req.user.role)) {
            throw new ForbiddenError(`Requires one of: ${roles.join(', ')}`);
        }
    };
};

export const requireLeader = requireAnyRole(LEADER_ROLES);
