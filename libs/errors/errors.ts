/**
 * Error taxonomy for the resource API.
 *
 * Every failure that reaches the HTTP boundary is one of these kinds. The
 * boundary status code is fixed per kind; callers never see anything but
 * `publicMessage`.
 */

export type ErrorKind = 'VALIDATION' | 'UNAUTHORIZED' | 'FORBIDDEN' | 'NOT_FOUND' | 'INTERNAL';

export const STATUS_BY_KIND: Record<ErrorKind, number> = {
    VALIDATION: 400,
    UNAUTHORIZED: 401,
    FORBIDDEN: 403,
    NOT_FOUND: 404,
    INTERNAL: 500
};

export abstract class ServiceError extends Error {
    abstract readonly kind: ErrorKind;

    constructor(public readonly publicMessage: string, options?: { cause?: unknown }) {
        super(publicMessage, options);
        this.name = new.target.name;
    }

    get statusCode(): number {
        return STATUS_BY_KIND[this.kind];
    }
}

export interface FieldIssue {
    field: string;
    message: string;
}

export class ValidationError extends ServiceError {
    readonly kind = 'VALIDATION';

    constructor(message: string, public readonly issues: FieldIssue[] = []) {
        super(message);
    }
}

export class UnauthorizedError extends ServiceError {
    readonly kind = 'UNAUTHORIZED';
}

export class ForbiddenError extends ServiceError {
    readonly kind = 'FORBIDDEN';
}

export class NotFoundError extends ServiceError {
    readonly kind = 'NOT_FOUND';
}

/**
 * Errors that propagate to the boundary unchanged.
 */
export function isDomainError(err: unknown): err is ServiceError {
    return err instanceof ServiceError && err.kind !== 'INTERNAL';
}
