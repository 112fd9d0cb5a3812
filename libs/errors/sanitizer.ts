import { logger } from '../logging/logger.js';
import crypto from 'crypto';
import { ServiceError, isDomainError } from './errors.js';

const GENERIC_MESSAGE = 'An internal error occurred';

/**
 * Internal failures are wrapped in a generic message and an incident id.
 * The full detail is logged here, once, and never leaves the process.
 */
export class InternalError extends ServiceError {
    readonly kind = 'INTERNAL';
    public readonly incidentId: string;
    public readonly timestamp: string;
    public readonly contextLabel?: string;

    constructor(
        publicMessage: string,
        public readonly internalDetails?: unknown,
        options?: { cause?: unknown; contextLabel?: string }
    ) {
        super(publicMessage, { cause: options?.cause });
        this.incidentId = crypto.randomUUID();
        this.timestamp = new Date().toISOString();
        this.contextLabel = options?.contextLabel;

        logger.error({
            incidentId: this.incidentId,
            timestamp: this.timestamp,
            context: this.contextLabel,
            internalDetails,
            stack: this.stack
        }, publicMessage);
    }
}

function stringField(value: object, key: string): string | undefined {
    const field: unknown = Reflect.get(value, key);
    return typeof field === 'string' ? field : undefined;
}

function describeError(err: unknown): { message?: string; stack?: string; code?: string } {
    if (err instanceof Error) {
        return { message: err.message, stack: err.stack, code: stringField(err, 'code') };
    }
    if (typeof err === 'string') {
        return { message: err };
    }
    if (err && typeof err === 'object') {
        return {
            message: stringField(err, 'message') ?? JSON.stringify(err),
            stack: stringField(err, 'stack'),
            code: stringField(err, 'code')
        };
    }
    return { message: String(err) };
}

export const ErrorSanitizer = {
    /**
     * Domain errors (validation, unauthorized, forbidden, not found) and
     * existing InternalErrors pass through. Anything else is wrapped.
     */
    sanitize: (err: unknown, contextLabel: string, publicMessage: string = GENERIC_MESSAGE): ServiceError => {
        if (err instanceof InternalError || isDomainError(err)) return err;

        const original = describeError(err);
        return new InternalError(
            publicMessage,
            { originalError: original.message, code: original.code, stack: original.stack, context: contextLabel },
            { cause: err, contextLabel }
        );
    }
};
