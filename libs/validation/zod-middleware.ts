import type { ZodType, ZodTypeDef } from 'zod';
import { logger } from '../logging/logger.js';
import { ValidationError } from '../errors/errors.js';

/**
 * Validates untrusted input against a schema.
 * Failures raise ValidationError carrying one issue per offending field.
 */
export function validate<T>(schema: ZodType<T, ZodTypeDef, unknown>, data: unknown, context: string): T {
    const result = schema.safeParse(data);

    if (!result.success) {
        const issues = result.error.issues.map(e => ({
            field: e.path.join('.'),
            message: e.message
        }));

        logger.warn({ context, errors: issues }, "Input validation failure");

        const summary = issues
            .map(issue => issue.field ? `${issue.field}: ${issue.message}` : issue.message)
            .join('; ');
        throw new ValidationError(summary, issues);
    }

    return result.data;
}

/**
 * Factory for reusable validators.
 */
export const createValidator = <T>(schema: ZodType<T, ZodTypeDef, unknown>) => {
    return (data: unknown, contextLabel: string) => validate(schema, data, contextLabel);
};
