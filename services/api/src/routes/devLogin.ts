import { Router } from 'express';
import { z } from 'zod';
import type { TokenVerifier } from '../../../../libs/auth/tokenVerifier.js';
import { createValidator } from '../../../../libs/validation/zod-middleware.js';
import { logger } from '../../../../libs/logging/logger.js';

const DEV_TOKEN_TTL_SECONDS = 3600;

const validateLogin = createValidator(z.object({
    subject: z.string().trim().min(1).max(128),
    roles: z.array(z.string().trim().min(1)).default([])
}));

/**
 * Development-only token issuance; mounted only when ENABLE_LOGIN is set.
 */
export function createDevLoginRouter(verifier: TokenVerifier): Router {
    const router = Router();

    router.post('/', (req, res, next) => {
        try {
            const { subject, roles } = validateLogin(req.body, 'DevLogin');
            verifier.issue(subject, roles, `${DEV_TOKEN_TTL_SECONDS}s`)
                .then(accessToken => {
                    logger.warn({ subject, roles }, 'Issued development token');
                    res.status(200).json({
                        access_token: accessToken,
                        token_type: 'bearer',
                        expires_in: DEV_TOKEN_TTL_SECONDS
                    });
                })
                .catch(next);
        } catch (error) {
            next(error);
        }
    });

    return router;
}
