import type { GuardRule } from '../config-guard.js';

const MIN_SECRET_LENGTH = 32;

export const AUTH_CONFIG_GUARDS: GuardRule[] = [
    { type: 'required', name: 'JWT_SECRET' },
    {
        type: 'assert',
        check: (env) => env.NODE_ENV !== 'production' || (env.JWT_SECRET ?? '').length >= MIN_SECRET_LENGTH,
        message: `JWT_SECRET must be at least ${MIN_SECRET_LENGTH} characters in production`,
    },
    {
        type: 'forbidIf',
        name: 'DEV_LOGIN_IN_PRODUCTION',
        when: (env) => env.NODE_ENV === 'production' && ['true', '1', 'yes'].includes((env.ENABLE_LOGIN ?? '').trim().toLowerCase()),
        message: 'ENABLE_LOGIN must not be set in production',
    },
    {
        type: 'required',
        name: 'ROLE_POLICY_PATH',
        when: (env) => env.POLICY_MODE === 'role-based' && env.NODE_ENV === 'production',
    }
];
