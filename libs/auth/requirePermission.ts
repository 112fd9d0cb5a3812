import type { Token } from "../context/identity.js";
import type { PermissionPolicy, ResourceOperation } from "./policy.js";
import { ForbiddenError } from "../errors/errors.js";
import { logger } from "../logging/logger.js";

/**
 * Reusable authorization guard around the permission hook.
 * A denial is logged and raised as ForbiddenError.
 */
export async function requirePermission(
    policy: PermissionPolicy,
    token: Token,
    operation: ResourceOperation,
    resource: string
): Promise<void> {
    const decision = await policy.evaluate(token, operation, resource);

    if (!decision.allowed) {
        logger.warn({
            userId: token.userId,
            resource,
            operation,
            policy: policy.name,
            reason: decision.reason,
            decision: 'DENY'
        }, "Authorization Failed - Access Denied");
        throw new ForbiddenError(`Not permitted to ${operation} ${resource}`);
    }

    logger.debug({
        userId: token.userId,
        resource,
        operation,
        policy: policy.name,
        decision: 'ALLOW'
    }, "Authorization Successful");
}
