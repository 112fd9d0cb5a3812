import { z } from 'zod';

/**
 * Document Store Adapter contract.
 *
 * One implementation per storage engine. Every method addresses a single
 * named collection; implementations must be safe for concurrent use and
 * must apply `update` atomically per document.
 */

export const ID_FIELD = '_id';

const DOCUMENT_ID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/** Store-assigned identifiers are UUIDs; the canonical form is lowercase. */
export const DocumentIdSchema = z.string()
    .trim()
    .regex(DOCUMENT_ID_PATTERN, 'must be a document identifier')
    .transform(value => value.toLowerCase());

export function isDocumentId(value: string): boolean {
    return DOCUMENT_ID_PATTERN.test(value.trim());
}

export type DocumentBody = Record<string, unknown>;

export interface StoredDocument {
    readonly _id: string;
    [field: string]: unknown;
}

export type SortDirection = 'asc' | 'desc';

export interface SortSpec {
    /** Dotted path into the document, e.g. `created.at_time`. */
    field: string;
    direction: SortDirection;
}

/**
 * Position of the last document already delivered to the caller. `value` is
 * the anchor's sort value as read by the executor; a store may instead
 * re-read it from the anchor row identified by `id`.
 */
export interface RangeAnchor {
    value: unknown;
    id: string;
}

export interface RangeQuery {
    filter: {
        /** Case-insensitive substring match on a string `name`; other types never match. */
        nameContains?: string;
        /** Only documents strictly after this position in sort order. */
        after?: RangeAnchor;
    };
    sort: SortSpec;
    limit: number;
}

export interface DocumentStore {
    create(collection: string, doc: DocumentBody): Promise<string>;
    get(collection: string, id: string): Promise<StoredDocument | null>;
    /** Shallow merge of `patch` into the stored body. Returns null when absent. */
    update(collection: string, id: string, patch: DocumentBody): Promise<StoredDocument | null>;
    query(collection: string, query: RangeQuery): Promise<StoredDocument[]>;
    close?(): Promise<void>;
}
