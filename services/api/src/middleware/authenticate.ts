import type { RequestHandler } from 'express';
import { extractBearerToken } from '../../../../libs/auth/tokenVerifier.js';
import type { TokenVerifier } from '../../../../libs/auth/tokenVerifier.js';
import { createBreadcrumb } from '../../../../libs/audit/breadcrumb.js';
import { RequestContext } from '../../../../libs/context/requestContext.js';

export const CORRELATION_HEADER = 'X-Correlation-Id';

/**
 * Request boundary: verifies the bearer token, stamps the per-request
 * breadcrumb and opens the request scope for everything downstream.
 */
export function createAuthenticateMiddleware(verifier: TokenVerifier): RequestHandler {
    return (req, res, next) => {
        verifier.verify(extractBearerToken(req.get('authorization')))
            .then(token => {
                const breadcrumb = createBreadcrumb(token, {
                    ip: req.ip,
                    correlationId: req.get(CORRELATION_HEADER)
                });
                res.setHeader(CORRELATION_HEADER, breadcrumb.correlation_id);
                RequestContext.run({ token, breadcrumb }, () => next());
            })
            .catch(next);
    };
}
