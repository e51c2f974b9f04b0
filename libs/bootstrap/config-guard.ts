import { logger } from '../logging/logger.js';

export type GuardRule =
    | { type: 'required'; name: string; sensitive?: boolean }
    | { type: 'forbidIf'; name: string; when: () => boolean; message: string }
    | { type: 'assert'; check: () => boolean; message: string };

/**
 * Fail-closed configuration guard, run once at startup.
 */
export class ConfigGuard {
    /**
     * Evaluates every rule and returns the violations, without exiting.
     */
    static check(rules: GuardRule[], env: NodeJS.ProcessEnv = process.env): string[] {
        const errors: string[] = [];

        for (const rule of rules) {
            try {
                switch (rule.type) {
                    case 'required': {
                        const value = env[rule.name];
                        if (!value || value.trim() === '') {
                            errors.push(`FATAL CONFIG: Required env var ${rule.name} is missing`);
                        }
                        break;
                    }

                    case 'forbidIf': {
                        if (rule.when()) {
                            errors.push(`FATAL CONFIG: ${rule.message} (Rule: ${rule.name})`);
                        }
                        break;
                    }

                    case 'assert': {
                        if (!rule.check()) {
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

    static enforce(rules: GuardRule[]): void {
        const errors = ConfigGuard.check(rules);

        if (errors.length > 0) {
            // Log structure for machine parsing + human readability
            logger.fatal({
                errors,
                remediation: "Check environment variables."
            }, "Configuration Guard Violation");

            process.exit(1);
        }

        logger.info("Configuration guard passed.");
    }
}
