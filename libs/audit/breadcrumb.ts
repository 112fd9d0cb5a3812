import crypto from "crypto";
import type { Token } from "../context/identity.js";

/**
 * Creation record attached to every document as `created`.
 * Produced once per request; the core copies it verbatim.
 */
export interface AuditRecord {
    readonly at_time: string;       // ISO-8601
    readonly by_user: string;
    readonly from_ip: string;
    readonly correlation_id: string;
}

export interface BreadcrumbSource {
    ip?: string;
    correlationId?: string;
    now?: Date;
}

const CORRELATION_ID_PATTERN = /^[A-Za-z0-9._:-]{1,128}$/;

/**
 * A caller-supplied correlation id is kept only when it is a plain token;
 * anything else is replaced so it can be logged and echoed safely.
 */
export function normalizeCorrelationId(candidate: string | undefined): string {
    const trimmed = candidate?.trim();
    if (trimmed && CORRELATION_ID_PATTERN.test(trimmed)) {
        return trimmed;
    }
    return crypto.randomUUID();
}

export function createBreadcrumb(token: Token, source: BreadcrumbSource = {}): AuditRecord {
    return Object.freeze({
        at_time: (source.now ?? new Date()).toISOString(),
        by_user: token.userId,
        from_ip: source.ip ?? 'unknown',
        correlation_id: normalizeCorrelationId(source.correlationId)
    });
}
