import type { Token } from '../../libs/context/identity.js';
import type { AuditRecord } from '../../libs/audit/breadcrumb.js';
import type { CallContext } from '../../libs/resource/resourceService.js';

/** Predictable UUIDs whose string order matches creation order. */
export function sequentialIds(): () => string {
    let next = 0;
    return () => {
        next += 1;
        return `00000000-0000-4000-8000-${next.toString().padStart(12, '0')}`;
    };
}

export function idAt(n: number): string {
    return `00000000-0000-4000-8000-${n.toString().padStart(12, '0')}`;
}

export const testToken: Token = Object.freeze({ userId: 'user-1', roles: Object.freeze(['developer']) });

export const testBreadcrumb: AuditRecord = Object.freeze({
    at_time: '2024-03-01T10:00:00.000Z',
    by_user: 'user-1',
    from_ip: '10.0.0.7',
    correlation_id: 'corr-1'
});

export const testCall: CallContext = { token: testToken, breadcrumb: testBreadcrumb };
