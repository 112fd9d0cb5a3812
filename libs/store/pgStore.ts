import fs from 'fs';
import path from 'path';
import { ID_FIELD } from './documentStore.js';
import type { DocumentBody, DocumentStore, RangeQuery, SortSpec, StoredDocument } from './documentStore.js';
import { splitPath } from './documentPath.js';
import type { Queryable } from '../db/index.js';
import { logger } from '../logging/logger.js';

const TABLE = 'documents';
const PATH_SEGMENT = /^[A-Za-z0-9_]+$/;

type DocumentRow = {
    id: string;
    body: DocumentBody;
};

/**
 * Sort key expression for a dotted field. Fields are allow-listed upstream,
 * but the path is inlined as a literal so it must still be checked here.
 * A missing field orders as JSON null.
 */
export function sortKeyExpression(field: string): string {
    const segments = splitPath(field);
    if (segments.length === 0 || !segments.every(segment => PATH_SEGMENT.test(segment))) {
        throw new Error(`Unsupported sort field path: ${field}`);
    }
    return `COALESCE(body #> '{${segments.join(',')}}', 'null'::jsonb)`;
}

export function escapeLikePattern(value: string): string {
    return value.replace(/[\\%_]/g, ch => `\\${ch}`);
}

function indexName(field: string): string {
    return `${TABLE}_${splitPath(field).join('_').toLowerCase()}_idx`;
}

function materialize(row: DocumentRow): StoredDocument {
    return { ...row.body, [ID_FIELD]: row.id };
}

function stripId(doc: DocumentBody): DocumentBody {
    const { [ID_FIELD]: _ignored, ...body } = doc;
    void _ignored;
    return body;
}

/**
 * PostgreSQL-backed Document Store.
 * Documents live as jsonb rows in one table, keyed by (collection, id).
 */
export class PgDocumentStore implements DocumentStore {
    constructor(private readonly dbClient: Queryable & { close?(): Promise<void> }) { }

    async close(): Promise<void> {
        await this.dbClient.close?.();
    }

    /**
     * Applies the table DDL and one (collection, sort key, id) index per sort field.
     */
    async ensureSchema(sortFields: readonly string[], schemaPath = path.resolve(process.cwd(), 'sql', 'schema.sql')): Promise<void> {
        const ddl = fs.readFileSync(schemaPath, 'utf-8');
        await this.dbClient.query(ddl);

        for (const field of new Set(sortFields)) {
            await this.dbClient.query(
                `CREATE INDEX IF NOT EXISTS ${indexName(field)} ON ${TABLE} (collection, (${sortKeyExpression(field)}), id)`
            );
        }
        logger.info({ indexes: [...new Set(sortFields)] }, '[DB] Document schema ensured');
    }

    async create(collection: string, doc: DocumentBody): Promise<string> {
        const result = await this.dbClient.query<{ id: string }>(
            `INSERT INTO ${TABLE} (collection, body) VALUES ($1, $2::jsonb) RETURNING id`,
            [collection, JSON.stringify(stripId(doc))]
        );
        const row = result.rows[0];
        if (!row) {
            throw new Error(`Insert into ${collection} returned no id`);
        }
        return row.id;
    }

    async get(collection: string, id: string): Promise<StoredDocument | null> {
        const result = await this.dbClient.query<DocumentRow>(
            `SELECT id, body FROM ${TABLE} WHERE collection = $1 AND id = $2::uuid`,
            [collection, id]
        );
        const row = result.rows[0];
        return row ? materialize(row) : null;
    }

    async update(collection: string, id: string, patch: DocumentBody): Promise<StoredDocument | null> {
        // single statement: the merge is atomic per document
        const result = await this.dbClient.query<DocumentRow>(
            `UPDATE ${TABLE} SET body = body || $3::jsonb, updated_at = now()
             WHERE collection = $1 AND id = $2::uuid
             RETURNING id, body`,
            [collection, id, JSON.stringify(stripId(patch))]
        );
        const row = result.rows[0];
        return row ? materialize(row) : null;
    }

    async query(collection: string, query: RangeQuery): Promise<StoredDocument[]> {
        const { text, params } = buildRangeQuery(collection, query);
        const result = await this.dbClient.query<DocumentRow>(text, params);
        return result.rows.map(materialize);
    }
}

/**
 * The continuation predicate compares against the anchor row itself rather
 * than its decoded sort value, so the key is never round-tripped through a
 * JS number.
 */
export function buildRangeQuery(collection: string, query: RangeQuery): { text: string; params: unknown[] } {
    const { filter, sort, limit } = query;
    const sortKey = sortKeyExpression(sort.field);
    const params: unknown[] = [collection];
    const where = ['collection = $1'];

    if (filter.nameContains !== undefined) {
        params.push(`%${escapeLikePattern(filter.nameContains)}%`);
        where.push(`jsonb_typeof(body->'name') = 'string' AND body->>'name' ILIKE $${params.length} ESCAPE '\\'`);
    }

    if (filter.after) {
        params.push(filter.after.id);
        const op = sort.direction === 'asc' ? '>' : '<';
        where.push(
            `(${sortKey}, id) ${op} (SELECT ${sortKey}, id FROM ${TABLE} WHERE collection = $1 AND id = $${params.length}::uuid)`
        );
    }

    params.push(limit);
    const text = [
        `SELECT id, body FROM ${TABLE}`,
        `WHERE ${where.join(' AND ')}`,
        `ORDER BY ${orderBy(sortKey, sort)}`,
        `LIMIT $${params.length}`
    ].join('\n');

    return { text, params };
}

function orderBy(sortKey: string, sort: SortSpec): string {
    const dir = sort.direction === 'asc' ? 'ASC' : 'DESC';
    return `${sortKey} ${dir}, id ${dir}`;
}
