import { readFileSync } from 'fs';
import { z } from 'zod';
import defaultRolePermissions from '../../config/role-permissions.json';
import type { Permission } from '../../types/auth';

const PERMISSION_PATTERN = /^[a-z][a-z_]*:[a-z][a-z_]*$/;

export function isPermission(value: string): value is Permission {
    return PERMISSION_PATTERN.test(value);
}

export const permissionSchema = z
    .string()
    .refine(isPermission, { message: 'Permission must have the form resource:action' });

export const rolePermissionsSchema = z.record(z.string().min(1), z.array(permissionSchema));

export type RolePermissionsConfig = z.infer<typeof rolePermissionsSchema>;

/**
 * Immutable set of capabilities. Order carries no meaning; `toArray` sorts
 * so that serialized forms are stable.
 */
export class PermissionSet implements Iterable<Permission> {
    static readonly EMPTY = new PermissionSet([]);

    private readonly items: ReadonlySet<Permission>;

    constructor(permissions: Iterable<Permission>) {
        this.items = new Set(permissions);
    }

    get size(): number {
        return this.items.size;
    }

    has(permission: Permission): boolean {
        return this.items.has(permission);
    }

    hasAny(permissions: readonly Permission[]): boolean {
        return permissions.some((p) => this.items.has(p));
    }

    equals(other: PermissionSet): boolean {
        return this.size === other.size && this.toArray().every((p) => other.has(p));
    }

    toArray(): Permission[] {
        return [...this.items].sort();
    }

    [Symbol.iterator](): Iterator<Permission> {
        return this.items[Symbol.iterator]();
    }

    toJSON(): Permission[] {
        return this.toArray();
    }
}

/**
 * Role → capability lookup, built once at start-up and read-only afterwards.
 */
export class RoleCapabilityMap {
    private readonly roles: ReadonlyMap<string, PermissionSet>;

    constructor(roles: Readonly<Record<string, readonly Permission[]>>) {
        this.roles = new Map(
            Object.entries(roles).map(([role, permissions]) => [role, new PermissionSet(permissions)])
        );
    }

    static parse(raw: unknown): RoleCapabilityMap {
        return new RoleCapabilityMap(rolePermissionsSchema.parse(raw));
    }

    static fromFile(path: string): RoleCapabilityMap {
        const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
        return RoleCapabilityMap.parse(raw);
    }

    /** Unknown roles resolve to the empty set. */
    capabilitiesForRole(role: string): PermissionSet {
        return this.roles.get(role) ?? PermissionSet.EMPTY;
    }

    roleNames(): string[] {
        return [...this.roles.keys()].sort();
    }

    toJSON(): Record<string, Permission[]> {
        const out: Record<string, Permission[]> = {};
        for (const role of this.roleNames()) {
            out[role] = this.capabilitiesForRole(role).toArray();
        }
        return out;
    }
}

/** Load the role map from `file` when given, else the bundled defaults. */
export function loadRoleCapabilityMap(file?: string): RoleCapabilityMap {
    return file ? RoleCapabilityMap.fromFile(file) : RoleCapabilityMap.parse(defaultRolePermissions);
}
