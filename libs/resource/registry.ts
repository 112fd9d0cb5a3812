import type { ResourceOperation } from '../auth/policy.js';

/**
 * Everything that distinguishes one resource from another. The service,
 * routes and store indexes are all derived from this.
 */
export interface ResourceDefinition {
    /** URL segment and policy resource name, e.g. `grade`. */
    readonly name: string;
    /** Display name used in messages, e.g. `Grade`. */
    readonly label: string;
    readonly collection: string;
    /** Allowed `sort_by` values; dotted paths address nested fields. */
    readonly sortFields: readonly string[];
    readonly operations: readonly ResourceOperation[];
}

const BASE_SORT_FIELDS = ['name', 'description', 'created.at_time'] as const;
const STATUS_SORT_FIELDS = [...BASE_SORT_FIELDS, 'status'] as const;

type ResourceTemplate = Omit<ResourceDefinition, 'collection'>;

export const RESOURCE_TEMPLATES: readonly ResourceTemplate[] = [
    { name: 'grade', label: 'Grade', sortFields: BASE_SORT_FIELDS, operations: ['create', 'read'] },
    { name: 'profile', label: 'Profile', sortFields: BASE_SORT_FIELDS, operations: ['read'] },
    { name: 'testdata', label: 'TestData', sortFields: STATUS_SORT_FIELDS, operations: ['create', 'read', 'update'] },
    { name: 'testrun', label: 'TestRun', sortFields: STATUS_SORT_FIELDS, operations: ['create', 'read', 'update'] },
    { name: 'testcase', label: 'TestCase', sortFields: STATUS_SORT_FIELDS, operations: ['create', 'read', 'update'] }
];

/**
 * Resolves the resource set against configured collection names.
 * A resource without an override uses its own name as collection.
 */
export function buildResourceDefinitions(
    collectionNames: Readonly<Record<string, string>> = {}
): ResourceDefinition[] {
    return RESOURCE_TEMPLATES.map(template => ({
        ...template,
        collection: collectionNames[template.name] ?? template.name
    }));
}

export function supports(definition: ResourceDefinition, operation: ResourceOperation): boolean {
    return definition.operations.includes(operation);
}
