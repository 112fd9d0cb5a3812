import type { DocumentStore, RangeQuery, StoredDocument } from '../store/documentStore.js';
import { getPath } from '../store/documentPath.js';
import { ValidationError } from '../errors/errors.js';
import { encodeCursor } from './cursor.js';
import { planInfiniteScroll } from './queryPlan.js';
import type { ScrollParams, ScrollPlan } from './queryPlan.js';

export interface ScrollPage<T = StoredDocument> {
    items: T[];
    limit: number;
    has_more: boolean;
    next_cursor: string | null;
}

/**
 * Turns a plan into a range query. The cursor only carries an id, so the
 * anchor document is read once for its current sort value; if it has been
 * deleted since the previous page the request fails instead of restarting.
 */
export async function resolveRangeQuery(
    store: DocumentStore,
    collection: string,
    plan: ScrollPlan
): Promise<RangeQuery> {
    const query: RangeQuery = {
        filter: {},
        sort: plan.sort,
        limit: plan.fetchLimit
    };

    if (plan.filter.nameContains !== undefined) {
        query.filter.nameContains = plan.filter.nameContains;
    }

    if (plan.filter.afterId !== undefined) {
        const anchor = await store.get(collection, plan.filter.afterId);
        if (!anchor) {
            throw new ValidationError(
                `Cursor ${plan.filter.afterId} no longer refers to an existing document; restart from the first page`,
                [{ field: 'after_id', message: 'cursor document not found' }]
            );
        }
        query.filter.after = {
            value: getPath(anchor, plan.sort.field) ?? null,
            id: anchor._id
        };
    }

    return query;
}

export function buildScrollPage(rows: StoredDocument[], limit: number): ScrollPage {
    const hasMore = rows.length > limit;
    const items = hasMore ? rows.slice(0, limit) : rows;
    const last = items[items.length - 1];

    return {
        items,
        limit,
        has_more: hasMore,
        next_cursor: hasMore && last ? encodeCursor(last._id) : null
    };
}

/**
 * Fetches one page of a sorted, optionally name-filtered collection.
 * Pages are keyed on (sort value, id), so equal sort values never cause
 * an item to be skipped or repeated.
 */
export async function executeInfiniteScroll(
    store: DocumentStore,
    collection: string,
    params: ScrollParams,
    allowedSortFields: readonly string[]
): Promise<ScrollPage> {
    const plan = planInfiniteScroll(params, allowedSortFields);
    const query = await resolveRangeQuery(store, collection, plan);
    const rows = await store.query(collection, query);
    return buildScrollPage(rows, plan.limit);
}
