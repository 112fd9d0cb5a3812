import type { ErrorRequestHandler, RequestHandler } from 'express';
import { NotFoundError, ServiceError, ValidationError } from '../../../../libs/errors/errors.js';
import { ErrorSanitizer, InternalError } from '../../../../libs/errors/sanitizer.js';
import { RequestContext } from '../../../../libs/context/requestContext.js';
import { logger } from '../../../../libs/logging/logger.js';

/** body-parser failures carry a `type` such as `entity.parse.failed` */
function isBodyParserError(err: unknown): err is Error & { type: string } {
    return err instanceof Error
        && 'type' in err
        && typeof err.type === 'string'
        && /^(entity|encoding|charset|request)\./.test(err.type);
}

export function toServiceError(err: unknown, contextLabel: string): ServiceError {
    if (isBodyParserError(err)) {
        return err.type === 'entity.parse.failed'
            ? new ValidationError('Malformed JSON body')
            : new ValidationError(`Unreadable request body (${err.type})`);
    }
    return ErrorSanitizer.sanitize(err, contextLabel);
}

export const notFoundHandler: RequestHandler = (req, _res, next) => {
    next(new NotFoundError(`Route ${req.method} ${req.path} not found`));
};

/**
 * Maps every failure to its fixed status code and a `{ error }` body.
 * Internal failures expose only the generic message and incident id.
 */
export const errorHandler: ErrorRequestHandler = (err, req, res, _next) => {
    void _next;
    const mapped = toServiceError(err, `HTTP:${req.method} ${req.path}`);
    const body: Record<string, unknown> = { error: mapped.publicMessage };

    if (mapped instanceof InternalError) {
        body.incident_id = mapped.incidentId;
    } else {
        logger.info({
            status: mapped.statusCode,
            kind: mapped.kind,
            method: req.method,
            path: req.path,
            correlationId: RequestContext.tryGet()?.breadcrumb.correlation_id
        }, mapped.publicMessage);
    }
    if (mapped instanceof ValidationError && mapped.issues.length > 0) {
        body.details = mapped.issues;
    }

    res.status(mapped.statusCode).json(body);
};
