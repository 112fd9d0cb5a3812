import fs from "fs";
import path from "path";
import { z } from "zod";
import type { Token } from "../context/identity.js";
import { validate } from "../validation/zod-middleware.js";

export const RESOURCE_OPERATIONS = ['create', 'read', 'update'] as const;

export type ResourceOperation = typeof RESOURCE_OPERATIONS[number];

export type PolicyDecision =
    | { allowed: true }
    | { allowed: false; reason: string };

/**
 * Permission hook evaluated by every resource service before it touches
 * the store. Implementations return a decision; they do not throw for a
 * denial.
 */
export interface PermissionPolicy {
    readonly name: string;
    evaluate(token: Token, operation: ResourceOperation, resource: string): Promise<PolicyDecision>;
}

/**
 * Default policy: any authenticated caller may perform any operation.
 */
export class AllowAllPolicy implements PermissionPolicy {
    readonly name = 'allow-all';

    async evaluate(): Promise<PolicyDecision> {
        return { allowed: true };
    }
}

const WILDCARD = '*';

const RoleListSchema = z.array(z.string().min(1));

export const RoleGrantsSchema = z.record(
    z.string().min(1),
    z.object({
        create: RoleListSchema.optional(),
        read: RoleListSchema.optional(),
        update: RoleListSchema.optional()
    }).strict()
);

/** resource (or `*`) -> operation -> roles that may perform it (`*` = any role) */
export type RoleGrants = z.infer<typeof RoleGrantsSchema>;

/**
 * Grants are looked up for the resource itself and for the `*` entry; the
 * caller needs one matching role from either list.
 */
export class RoleBasedPolicy implements PermissionPolicy {
    readonly name = 'role-based';

    constructor(private readonly grants: RoleGrants) { }

    private rolesFor(resource: string, operation: ResourceOperation): string[] {
        return [
            ...(this.grants[resource]?.[operation] ?? []),
            ...(this.grants[WILDCARD]?.[operation] ?? [])
        ];
    }

    async evaluate(token: Token, operation: ResourceOperation, resource: string): Promise<PolicyDecision> {
        const required = this.rolesFor(resource, operation);
        if (required.length === 0) {
            return { allowed: false, reason: `NO_GRANT: ${operation} on ${resource} is not granted to any role` };
        }
        if (required.includes(WILDCARD) || token.roles.some(role => required.includes(role))) {
            return { allowed: true };
        }
        return { allowed: false, reason: `ROLE_REQUIRED: one of [${required.join(', ')}]` };
    }
}

export function loadRoleGrants(filePath: string): RoleGrants {
    const absolutePath = path.resolve(process.cwd(), filePath);
    if (!fs.existsSync(absolutePath)) {
        throw new Error(`Role policy file missing at ${absolutePath}`);
    }
    const raw: unknown = JSON.parse(fs.readFileSync(absolutePath, "utf-8"));
    return validate(RoleGrantsSchema, raw, `RolePolicy:${filePath}`);
}

export type PolicyMode = 'allow-all' | 'role-based';

export function createPolicy(mode: PolicyMode, rolePolicyPath: string): PermissionPolicy {
    return mode === 'role-based'
        ? new RoleBasedPolicy(loadRoleGrants(rolePolicyPath))
        : new AllowAllPolicy();
}
