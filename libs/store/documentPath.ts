/**
 * Dotted-path access and JSON value ordering shared by the in-process
 * store and the pagination executor.
 *
 * Ordering follows PostgreSQL's jsonb rules so both stores page the same:
 * null < string < number < boolean < array < object. A missing field
 * orders as null.
 */

export function splitPath(path: string): string[] {
    return path.split('.').filter(segment => segment.length > 0);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function getPath(doc: unknown, path: string): unknown {
    let current: unknown = doc;
    for (const segment of splitPath(path)) {
        if (!isPlainObject(current)) {
            return undefined;
        }
        current = current[segment];
    }
    return current;
}

function typeRank(value: unknown): number {
    if (value === null || value === undefined) return 0;
    switch (typeof value) {
        case 'string': return 1;
        case 'number': return 2;
        case 'boolean': return 3;
        default: return Array.isArray(value) ? 4 : 5;
    }
}

function compareScalars<T extends string | number>(a: T, b: T): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

export function compareJsonValues(a: unknown, b: unknown): number {
    const rankA = typeRank(a);
    const rankB = typeRank(b);
    if (rankA !== rankB) return rankA - rankB;

    if (typeof a === 'string' && typeof b === 'string') return compareScalars(a, b);
    if (typeof a === 'number' && typeof b === 'number') return compareScalars(a, b);
    if (typeof a === 'boolean' && typeof b === 'boolean') return Number(a) - Number(b);
    if (rankA === 0) return 0;

    // arrays and objects: structural order is not meaningful for paging, only stability
    return compareScalars(JSON.stringify(a), JSON.stringify(b));
}

/**
 * Compares two (sort value, id) positions in ascending order.
 */
export function comparePositions(
    a: { value: unknown; id: string },
    b: { value: unknown; id: string }
): number {
    const byValue = compareJsonValues(a.value, b.value);
    if (byValue !== 0) return byValue;
    return compareScalars(a.id, b.id);
}
