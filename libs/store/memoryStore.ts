import crypto from 'crypto';
import { ID_FIELD } from './documentStore.js';
import type { DocumentBody, DocumentStore, RangeQuery, StoredDocument } from './documentStore.js';
import { comparePositions, getPath } from './documentPath.js';

/**
 * In-process Document Store.
 *
 * Backs the test suite and `STORE_DRIVER=memory`. Documents are deep-copied
 * on the way in and out so callers never share state with the store.
 */
export class MemoryDocumentStore implements DocumentStore {
    private readonly collections = new Map<string, Map<string, DocumentBody>>();

    constructor(private readonly generateId: () => string = () => crypto.randomUUID()) { }

    private bucket(collection: string): Map<string, DocumentBody> {
        let bucket = this.collections.get(collection);
        if (!bucket) {
            bucket = new Map();
            this.collections.set(collection, bucket);
        }
        return bucket;
    }

    private materialize(id: string, body: DocumentBody): StoredDocument {
        return { ...structuredClone(body), [ID_FIELD]: id };
    }

    async create(collection: string, doc: DocumentBody): Promise<string> {
        const { [ID_FIELD]: _ignored, ...body } = doc;
        void _ignored;
        const id = this.generateId().toLowerCase();
        const bucket = this.bucket(collection);
        if (bucket.has(id)) {
            throw new Error(`Duplicate document id ${id} in ${collection}`);
        }
        bucket.set(id, structuredClone(body));
        return id;
    }

    async get(collection: string, id: string): Promise<StoredDocument | null> {
        const body = this.bucket(collection).get(id.toLowerCase());
        return body ? this.materialize(id.toLowerCase(), body) : null;
    }

    async update(collection: string, id: string, patch: DocumentBody): Promise<StoredDocument | null> {
        const key = id.toLowerCase();
        const bucket = this.bucket(collection);
        const current = bucket.get(key);
        if (!current) return null;

        const { [ID_FIELD]: _ignored, ...fields } = patch;
        void _ignored;
        const merged = { ...current, ...structuredClone(fields) };
        bucket.set(key, merged);
        return this.materialize(key, merged);
    }

    async query(collection: string, query: RangeQuery): Promise<StoredDocument[]> {
        const { filter, sort, limit } = query;
        const needle = filter.nameContains?.toLowerCase();
        const sign = sort.direction === 'asc' ? 1 : -1;

        const positioned = [...this.bucket(collection).entries()]
            .filter(([, body]) => {
                if (needle === undefined) return true;
                const name = body.name;
                return typeof name === 'string' && name.toLowerCase().includes(needle);
            })
            .map(([id, body]) => ({ id, body, value: getPath(body, sort.field) }))
            .filter(entry => !filter.after || sign * comparePositions(entry, filter.after) > 0)
            .sort((a, b) => sign * comparePositions(a, b));

        return positioned
            .slice(0, limit)
            .map(entry => this.materialize(entry.id, entry.body));
    }

    /** Removes a document; used by administrative tooling and tests. */
    async delete(collection: string, id: string): Promise<boolean> {
        return this.bucket(collection).delete(id.toLowerCase());
    }
}
