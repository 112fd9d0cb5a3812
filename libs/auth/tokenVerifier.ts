import { SignJWT, jwtVerify, errors as joseErrors } from 'jose';
import { z } from 'zod';
import type { Token } from '../context/identity.js';
import type { AuthConfig } from '../config/appConfig.js';
import { UnauthorizedError } from '../errors/errors.js';
import { logger } from '../logging/logger.js';

const CLOCK_TOLERANCE_SECONDS = 30;
const ALGORITHM = 'HS256';
const DEFAULT_TOKEN_TTL = '1h';

const ClaimsSchema = z.object({
    sub: z.string().min(1),
    roles: z.array(z.string()).default([]),
    iat: z.number().optional(),
    exp: z.number().optional()
});

function toIso(epochSeconds: number | undefined): string | undefined {
    return epochSeconds === undefined ? undefined : new Date(epochSeconds * 1000).toISOString();
}

/**
 * Bearer token verification (HS256) and development token issuance.
 */
export class TokenVerifier {
    private readonly key: Uint8Array;

    constructor(private readonly config: Pick<AuthConfig, 'jwtSecret' | 'issuer' | 'audience'>) {
        this.key = new TextEncoder().encode(config.jwtSecret);
    }

    async verify(rawToken: string | undefined): Promise<Token> {
        if (!rawToken) {
            throw new UnauthorizedError('Missing bearer token');
        }

        let payload: unknown;
        try {
            const verified = await jwtVerify(rawToken, this.key, {
                issuer: this.config.issuer,
                audience: this.config.audience,
                clockTolerance: CLOCK_TOLERANCE_SECONDS,
                algorithms: [ALGORITHM]
            });
            payload = verified.payload;
        } catch (error: unknown) {
            const reason = error instanceof joseErrors.JWTExpired
                ? 'expired'
                : error instanceof Error ? error.message : String(error);
            logger.warn({ reason }, 'JWT verification failed');
            throw new UnauthorizedError(reason === 'expired' ? 'Token expired' : 'Invalid token');
        }

        const claims = ClaimsSchema.safeParse(payload);
        if (!claims.success) {
            logger.warn({ issues: claims.error.issues.map(i => i.path.join('.')) }, 'JWT claims rejected');
            throw new UnauthorizedError('Invalid token');
        }

        return Object.freeze({
            userId: claims.data.sub,
            roles: Object.freeze([...claims.data.roles]),
            issuedAt: toIso(claims.data.iat),
            expiresAt: toIso(claims.data.exp)
        });
    }

    async issue(subject: string, roles: readonly string[], expiresIn: string = DEFAULT_TOKEN_TTL): Promise<string> {
        return new SignJWT({ roles: [...roles] })
            .setProtectedHeader({ alg: ALGORITHM })
            .setSubject(subject)
            .setIssuer(this.config.issuer)
            .setAudience(this.config.audience)
            .setIssuedAt()
            .setExpirationTime(expiresIn)
            .sign(this.key);
    }
}

/**
 * Extracts the credential from an `Authorization: Bearer <token>` header.
 */
export function extractBearerToken(header: string | undefined): string | undefined {
    if (!header) return undefined;
    const match = /^Bearer\s+(\S+)\s*$/i.exec(header);
    return match?.[1];
}
