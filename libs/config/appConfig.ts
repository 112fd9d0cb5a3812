import { z } from 'zod';
import type { PolicyMode } from '../auth/policy.js';
import { RESOURCE_TEMPLATES } from '../resource/registry.js';

export interface DbConfig {
    host: string;
    port: number;
    user: string;
    password: string;
    database: string;
    poolMax: number;
    ssl: boolean;
    caCert?: string;
}

export interface AuthConfig {
    jwtSecret: string;
    issuer: string;
    audience: string;
    enableLogin: boolean;
}

export interface AppConfig {
    nodeEnv: string;
    port: number;
    trustProxy: boolean;
    storeDriver: 'postgres' | 'memory';
    db?: DbConfig;
    auth: AuthConfig;
    policy: {
        mode: PolicyMode;
        rolePolicyPath: string;
    };
    /** resource name -> collection name */
    collections: Record<string, string>;
}

const flag = z.string()
    .trim()
    .toLowerCase()
    .optional()
    .transform((value, ctx) => {
        if (value === undefined || value === '') return false;
        if (['true', '1', 'yes'].includes(value)) return true;
        if (['false', '0', 'no'].includes(value)) return false;
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be true or false' });
        return z.NEVER;
    });

const optionalString = z.string().trim().optional().transform(value => (value ? value : undefined));

const EnvSchema = z.object({
    NODE_ENV: z.string().trim().default('development'),
    PORT: z.coerce.number().int().min(1).max(65535).default(9098),
    TRUST_PROXY: flag,
    STORE_DRIVER: z.enum(['postgres', 'memory']).default('postgres'),
    DB_HOST: optionalString,
    DB_PORT: z.coerce.number().int().min(1).max(65535).default(5432),
    DB_USER: optionalString,
    DB_PASSWORD: optionalString,
    DB_NAME: optionalString,
    DB_POOL_MAX: z.coerce.number().int().min(1).default(20),
    DB_SSL: flag,
    DB_CA_CERT: optionalString,
    JWT_SECRET: z.string({ required_error: 'is required' }).min(1, 'is required'),
    JWT_ISSUER: z.string().trim().min(1).default('resource-api-idp'),
    JWT_AUDIENCE: z.string().trim().min(1).default('resource-api'),
    ENABLE_LOGIN: flag,
    POLICY_MODE: z.enum(['allow-all', 'role-based']).default('allow-all'),
    ROLE_POLICY_PATH: z.string().trim().min(1).default('config/role-policy.json')
});

export function collectionEnvName(resource: string): string {
    return `${resource.toUpperCase()}_COLLECTION_NAME`;
}

/**
 * Parses process configuration from environment variables.
 * Throws with every offending variable listed; nothing is partially applied.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const result = EnvSchema.safeParse(env);
    if (!result.success) {
        const problems = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new Error(`Invalid configuration: ${problems.join('; ')}`);
    }
    const vars = result.data;

    const collections: Record<string, string> = {};
    for (const template of RESOURCE_TEMPLATES) {
        const override = env[collectionEnvName(template.name)]?.trim();
        collections[template.name] = override ? override : template.name;
    }

    const config: AppConfig = {
        nodeEnv: vars.NODE_ENV,
        port: vars.PORT,
        trustProxy: vars.TRUST_PROXY,
        storeDriver: vars.STORE_DRIVER,
        auth: {
            jwtSecret: vars.JWT_SECRET,
            issuer: vars.JWT_ISSUER,
            audience: vars.JWT_AUDIENCE,
            enableLogin: vars.ENABLE_LOGIN
        },
        policy: {
            mode: vars.POLICY_MODE,
            rolePolicyPath: vars.ROLE_POLICY_PATH
        },
        collections
    };

    if (vars.STORE_DRIVER === 'postgres') {
        config.db = {
            host: vars.DB_HOST ?? '',
            port: vars.DB_PORT,
            user: vars.DB_USER ?? '',
            password: vars.DB_PASSWORD ?? '',
            database: vars.DB_NAME ?? '',
            poolMax: vars.DB_POOL_MAX,
            ssl: vars.DB_SSL,
            caCert: vars.DB_CA_CERT
        };
    }

    return config;
}
