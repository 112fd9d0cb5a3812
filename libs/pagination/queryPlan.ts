import { z } from 'zod';
import { validate } from '../validation/zod-middleware.js';
import { ValidationError } from '../errors/errors.js';
import type { SortDirection, SortSpec } from '../store/documentStore.js';
import { decodeCursor } from './cursor.js';

export const DEFAULT_LIMIT = 10;
export const MIN_LIMIT = 1;
export const MAX_LIMIT = 100;
export const DEFAULT_SORT_FIELD = 'name';
export const DEFAULT_ORDER = 'asc';

/**
 * Raw list parameters, named as they arrive on the query string.
 * Absent values may be undefined or null.
 */
export interface ScrollParams {
    name?: string | null;
    after_id?: string | null;
    limit?: string | number | null;
    sort_by?: string | null;
    order?: string | null;
}

export interface ScrollPlan {
    filter: {
        nameContains?: string;
        afterId?: string;
    };
    sort: SortSpec;
    /** Page size after clamping. */
    limit: number;
    /** One extra row tells whether another page exists. */
    fetchLimit: number;
}

const INTEGER_PATTERN = /^[+-]?\d+$/;

function isSortDirection(value: string): value is SortDirection {
    return value === 'asc' || value === 'desc';
}

export function clampLimit(limit: number): number {
    return Math.min(MAX_LIMIT, Math.max(MIN_LIMIT, limit));
}

const optionalText = z.string().nullish().transform(value => (value ? value : undefined));

const ScrollParamsSchema = z.object({
    name: optionalText,
    after_id: optionalText,
    limit: z.union([z.string(), z.number()]).nullish().transform((value, ctx) => {
        if (value === null || value === undefined || value === '') return DEFAULT_LIMIT;
        const text = String(value).trim();
        if (!INTEGER_PATTERN.test(text)) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be an integer' });
            return z.NEVER;
        }
        return clampLimit(Number.parseInt(text, 10));
    }),
    sort_by: z.string().nullish().transform(value => value?.trim() || DEFAULT_SORT_FIELD),
    order: z.string().nullish().transform((value, ctx) => {
        const normalized = (value?.trim() || DEFAULT_ORDER).toLowerCase();
        if (!isSortDirection(normalized)) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must be 'asc' or 'desc'" });
            return z.NEVER;
        }
        return normalized;
    })
});

/**
 * Pagination Query Builder.
 *
 * Validates list parameters against the resource's sort allow-list and
 * produces the (filter, sort, limit) plan. Invalid input raises
 * ValidationError before any query runs.
 */
export function planInfiniteScroll(params: ScrollParams, allowedSortFields: readonly string[]): ScrollPlan {
    const parsed = validate(ScrollParamsSchema, params, 'InfiniteScroll:plan');

    if (!allowedSortFields.includes(parsed.sort_by)) {
        throw new ValidationError(
            `Invalid sort_by field '${parsed.sort_by}'. Allowed fields: ${allowedSortFields.join(', ')}`,
            [{ field: 'sort_by', message: `'${parsed.sort_by}' is not an allowed sort field` }]
        );
    }

    const filter: ScrollPlan['filter'] = {};
    if (parsed.name !== undefined) {
        filter.nameContains = parsed.name;
    }
    if (parsed.after_id !== undefined) {
        filter.afterId = decodeCursor(parsed.after_id);
    }

    return {
        filter,
        sort: { field: parsed.sort_by, direction: parsed.order },
        limit: parsed.limit,
        fetchLimit: parsed.limit + 1
    };
}
