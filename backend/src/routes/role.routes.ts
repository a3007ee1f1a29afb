import { FastifyInstance } from 'fastify';
import type { AuthMiddleware } from '../middleware/auth.middleware';
import { requireAnyPermission, requireRole } from '../middleware/rbac.middleware';
import type { RoleCapabilityMap } from '../services/auth/permissions';

export interface RoleRoutesOptions {
    roles: RoleCapabilityMap;
    auth: AuthMiddleware;
}

export async function roleRoutes(fastify: FastifyInstance, opts: RoleRoutesOptions) {
    const { roles, auth } = opts;

    // ─── GET /api/roles ───
    fastify.get(
        '/api/roles',
        { preHandler: [auth.authenticate, requireAnyPermission('users:read', 'settings:read')] },
        async () => {
            return { roles: roles.toJSON() };
        }
    );

    // ─── GET /api/roles/:role ─── (admin only)
    fastify.get<{ Params: { role: string } }>(
        '/api/roles/:role',
        { preHandler: [auth.authenticate, requireRole('admin')] },
        async (request, reply) => {
            const { role } = request.params;
            if (!roles.roleNames().includes(role)) {
                reply.code(404);
                return { error: 'Role not found' };
            }
            return { role, permissions: roles.capabilitiesForRole(role).toArray() };
        }
    );
}
