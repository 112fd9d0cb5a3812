import type { Token } from '../context/identity.js';
import type { AuditRecord } from '../audit/breadcrumb.js';
import type { PermissionPolicy, ResourceOperation } from '../auth/policy.js';
import { requirePermission } from '../auth/requirePermission.js';
import { ID_FIELD, isDocumentId } from '../store/documentStore.js';
import type { DocumentBody, DocumentStore, StoredDocument } from '../store/documentStore.js';
import { executeInfiniteScroll } from '../pagination/infiniteScroll.js';
import type { ScrollPage } from '../pagination/infiniteScroll.js';
import type { ScrollParams } from '../pagination/queryPlan.js';
import { NotFoundError } from '../errors/errors.js';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import { logger } from '../logging/logger.js';
import type { Logger } from '../logging/logger.js';
import type { ResourceDefinition } from './registry.js';
import { supports } from './registry.js';

/** What the HTTP boundary hands to every operation. */
export interface CallContext {
    readonly token: Token;
    readonly breadcrumb: AuditRecord;
}

/** Fields the store and the audit stamp own; client values are dropped. */
const SYSTEM_FIELDS = [ID_FIELD, 'created'] as const;

function withoutSystemFields(data: DocumentBody): DocumentBody {
    const fields: DocumentBody = { ...data };
    for (const key of SYSTEM_FIELDS) {
        delete fields[key];
    }
    return fields;
}

/**
 * Generic resource orchestration: permission hook, audit stamping, store
 * call, not-found mapping. One instance per resource definition.
 *
 * Validation, forbidden and not-found errors reach the caller unchanged;
 * anything else is logged and replaced by a generic InternalError.
 */
export class ResourceService {
    private readonly log: Logger;

    constructor(
        public readonly definition: ResourceDefinition,
        private readonly store: DocumentStore,
        private readonly policy: PermissionPolicy
    ) {
        this.log = logger.child({ resource: definition.name });
    }

    private get resourceName(): string {
        return this.definition.name;
    }

    private async authorize(token: Token, operation: ResourceOperation): Promise<void> {
        if (!supports(this.definition, operation)) {
            throw new Error(`Operation ${operation} is not enabled for ${this.resourceName}`);
        }
        await requirePermission(this.policy, token, operation, this.resourceName);
    }

    private fail(err: unknown, operation: string, publicMessage: string, id?: string): never {
        const label = id === undefined
            ? `${this.definition.label}:${operation}`
            : `${this.definition.label}:${operation}:${id}`;
        throw ErrorSanitizer.sanitize(err, label, publicMessage);
    }

    async create(data: DocumentBody, call: CallContext): Promise<string> {
        try {
            await this.authorize(call.token, 'create');

            const doc: DocumentBody = {
                ...withoutSystemFields(data),
                created: call.breadcrumb
            };

            const id = await this.store.create(this.definition.collection, doc);
            this.log.info({ id, userId: call.token.userId, correlationId: call.breadcrumb.correlation_id },
                `Created ${this.resourceName} ${id}`);
            return id;
        } catch (err) {
            return this.fail(err, 'create', `Failed to create ${this.resourceName}`);
        }
    }

    async get(id: string, call: CallContext): Promise<StoredDocument> {
        try {
            await this.authorize(call.token, 'read');

            const doc = isDocumentId(id)
                ? await this.store.get(this.definition.collection, id.trim().toLowerCase())
                : null;
            if (!doc) {
                throw new NotFoundError(`${this.definition.label} ${id} not found`);
            }

            this.log.info({ id, userId: call.token.userId }, `Retrieved ${this.resourceName} ${id}`);
            return doc;
        } catch (err) {
            return this.fail(err, 'get', `Failed to retrieve ${this.resourceName} ${id}`, id);
        }
    }

    async list(params: ScrollParams, call: CallContext): Promise<ScrollPage> {
        try {
            await this.authorize(call.token, 'read');

            const page = await executeInfiniteScroll(
                this.store,
                this.definition.collection,
                params,
                this.definition.sortFields
            );

            this.log.info({ count: page.items.length, hasMore: page.has_more, userId: call.token.userId },
                `Retrieved ${page.items.length} ${this.resourceName} documents`);
            return page;
        } catch (err) {
            return this.fail(err, 'list', `Failed to retrieve ${this.resourceName} documents`);
        }
    }

    async update(id: string, patch: DocumentBody, call: CallContext): Promise<StoredDocument> {
        try {
            await this.authorize(call.token, 'update');

            const key = isDocumentId(id) ? id.trim().toLowerCase() : null;
            const fields = withoutSystemFields(patch);
            const updated = key === null
                ? null
                : Object.keys(fields).length === 0
                    ? await this.store.get(this.definition.collection, key)
                    : await this.store.update(this.definition.collection, key, fields);
            if (!updated) {
                throw new NotFoundError(`${this.definition.label} ${id} not found`);
            }

            this.log.info({ id, fields: Object.keys(fields), userId: call.token.userId },
                `Updated ${this.resourceName} ${id}`);
            return updated;
        } catch (err) {
            return this.fail(err, 'update', `Failed to update ${this.resourceName} ${id}`, id);
        }
    }
}

export function createResourceServices(
    definitions: readonly ResourceDefinition[],
    store: DocumentStore,
    policy: PermissionPolicy
): ResourceService[] {
    return definitions.map(definition => new ResourceService(definition, store, policy));
}
