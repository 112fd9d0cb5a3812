/**
 * Authenticated caller, as established by the bearer token verifier.
 * The core never parses credentials itself; it only reads these fields.
 */
export interface Token {
    readonly userId: string;
    readonly roles: readonly string[];
    readonly issuedAt?: string;
    readonly expiresAt?: string;
}
