import { FastifyReply, FastifyRequest } from 'fastify';
import type { AuthUser, Permission } from '../types/auth';
import { logger } from '../utils/logger';

type GateHook = (request: FastifyRequest, reply: FastifyReply) => Promise<void>;

/**
 * Shared shape of every capability gate. Must run AFTER `authenticate` so
 * that `request.authUser` is available; without it the caller gets 401,
 * with it but lacking the capability 403.
 */
function gate(check: (user: AuthUser) => boolean, required: Record<string, unknown>): GateHook {
    return async function (request: FastifyRequest, reply: FastifyReply): Promise<void> {
        const user = request.authUser;
        if (!user) {
            reply.code(401).send({ error: 'Authentication required', code: 'AUTH_REQUIRED' });
            return;
        }

        if (!check(user)) {
            logger.warn({
                userId: user.id,
                role: user.role,
                permissions: user.permissions.toArray(),
                ...required,
            }, 'Insufficient permissions');
            reply.code(403).send({ error: 'Insufficient permissions', code: 'INSUFFICIENT_PERMISSION' });
            return;
        }
    };
}

/**
 * @example
 *   fastify.delete('/api/tasks/:id', {
 *     preHandler: [authenticate, requirePermission('tasks:delete')],
 *   }, handler);
 */
export function requirePermission(permission: Permission): GateHook {
    return gate((user) => user.permissions.has(permission), { requiredPermission: permission });
}

export function requireAnyPermission(...permissions: Permission[]): GateHook {
    return gate((user) => user.permissions.hasAny(permissions), { requiredPermissions: permissions });
}

export function requireRole(role: string): GateHook {
    return gate((user) => user.role === role, { requiredRole: role });
}

export function requireAnyRole(...roles: string[]): GateHook {
    return gate((user) => roles.includes(user.role), { requiredRoles: roles });
}
