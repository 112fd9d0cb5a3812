import type { GuardRule } from '../config-guard.js';

const usesPostgres = (env: NodeJS.ProcessEnv) => (env.STORE_DRIVER ?? 'postgres') === 'postgres';
const isProtectedEnv = (env: NodeJS.ProcessEnv) => ['production', 'staging'].includes(env.NODE_ENV ?? '');

/**
 * Database connection parameters, required only when the postgres driver is selected.
 */
export const DB_CONFIG_GUARDS: GuardRule[] = [
    { type: 'required', name: 'DB_HOST', when: usesPostgres },
    { type: 'required', name: 'DB_PORT', when: usesPostgres },
    { type: 'required', name: 'DB_USER', when: usesPostgres },
    { type: 'required', name: 'DB_PASSWORD', when: usesPostgres },
    { type: 'required', name: 'DB_NAME', when: usesPostgres },

    {
        type: 'assert',
        check: (env) => !usesPostgres(env) || !isProtectedEnv(env) || env.DB_SSL === 'true',
        message: 'DB_SSL=true is required in production/staging',
    },
    {
        type: 'forbidIf',
        name: 'MEMORY_STORE_IN_PRODUCTION',
        when: (env) => env.STORE_DRIVER === 'memory' && env.NODE_ENV === 'production',
        message: 'The in-process document store cannot back a production deployment',
    }
];
