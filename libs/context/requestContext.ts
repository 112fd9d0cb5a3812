import { AsyncLocalStorage } from 'node:async_hooks';
import type { Token } from "./identity.js";
import type { AuditRecord } from "../audit/breadcrumb.js";

export interface RequestScope {
    readonly token: Token;
    readonly breadcrumb: AuditRecord;
}

/**
 * Request Context Container
 * AsyncLocalStorage-backed for concurrent request isolation.
 *
 * Only the request boundary (breadcrumb middleware) calls run().
 * Route handlers only call get().
 */

const storage = new AsyncLocalStorage<RequestScope>();

export class RequestContext {
    /**
     * Establish the scope for one request.
     * Supports both sync and async functions.
     */
    public static run<T>(
        scope: RequestScope,
        fn: () => Promise<T> | T
    ): Promise<T> | T {
        return storage.run(Object.freeze({ ...scope }), fn);
    }

    /**
     * Current request scope. Throws if called outside run().
     */
    public static get(): RequestScope {
        const scope = storage.getStore();
        if (!scope) {
            throw new Error("MISSING_REQUEST_CONTEXT: No request scope established");
        }
        return scope;
    }

    public static tryGet(): RequestScope | undefined {
        return storage.getStore();
    }
}
