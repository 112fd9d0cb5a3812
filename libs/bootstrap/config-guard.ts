import { logger } from '../logging/logger.js';

type Env = NodeJS.ProcessEnv;

export type GuardRule =
    | { type: 'required'; name: string; when?: (env: Env) => boolean }
    | { type: 'forbidIf'; name: string; when: (env: Env) => boolean; message: string }
    | { type: 'assert'; check: (env: Env) => boolean; message: string };

export class ConfigViolationError extends Error {
    constructor(public readonly violations: string[]) {
        super(`Configuration guard violation: ${violations.join('; ')}`);
        this.name = 'ConfigViolationError';
    }
}

/**
 * Fail-closed configuration guard.
 * Every rule is evaluated; all violations are reported together.
 */
export class ConfigGuard {
    static evaluate(rules: GuardRule[], env: Env = process.env): string[] {
        const errors: string[] = [];

        for (const rule of rules) {
            try {
                switch (rule.type) {
                    case 'required': {
                        if (rule.when && !rule.when(env)) break;
                        const value = env[rule.name];
                        if (!value || value.trim() === '') {
                            errors.push(`FATAL CONFIG: Required env var ${rule.name} is missing`);
                        }
                        break;
                    }

                    case 'forbidIf': {
                        if (rule.when(env)) {
                            errors.push(`FATAL CONFIG: ${rule.message} (Rule: ${rule.name})`);
                        }
                        break;
                    }

                    case 'assert': {
                        if (!rule.check(env)) {
                            errors.push(`FATAL CONFIG: ${rule.message}`);
                        }
                        break;
                    }
                }
            } catch (err: unknown) {
                errors.push(`Check failed for rule: ${err instanceof Error ? err.message : String(err)}`);
            }
        }

        return errors;
    }

    static enforce(rules: GuardRule[], env: Env = process.env): void {
        const errors = ConfigGuard.evaluate(rules, env);

        if (errors.length > 0) {
            logger.fatal({
                errors,
                remediation: "Check environment variables."
            }, "Configuration Guard Violation");

            throw new ConfigViolationError(errors);
        }

        logger.info("Configuration guard passed.");
    }
}
