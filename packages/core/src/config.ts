import { z, ZodError } from 'zod';
import { InvalidArgumentError } from './errors';
import { LogLevelSchema, logger, type LogLevel } from './logger';

export type RuntimeConfig = {
    readonly logLevel: LogLevel;
    readonly dispatchLanes: number;
};

const RuntimeConfigSchema = z.object({
    REGIONLINK_LOG_LEVEL: LogLevelSchema.default('info'),
    REGIONLINK_DISPATCH_LANES: z.coerce.number().int().positive().default(4),
});

/**
 * read the runtime settings from an environment (usually `process.env`)
 * @throws InvalidArgumentError if a variable is present but not valid
 */
export function loadRuntimeConfig(env: Record<string, string | undefined>): RuntimeConfig {
    try {
        const parsed = RuntimeConfigSchema.parse(env);
        return Object.freeze({
            logLevel: parsed.REGIONLINK_LOG_LEVEL,
            dispatchLanes: parsed.REGIONLINK_DISPATCH_LANES,
        });
    } catch (e) {
        if (e instanceof ZodError) {
            const message = `invalid runtime configuration: ${summarizeIssues(e)}`;
            logger.error(message);
            throw new InvalidArgumentError(message, { cause: e });
        }
        throw e;
    }
}

/**
 * load the runtime configuration and apply its log level to the shared logger
 */
export function configure(env: Record<string, string | undefined> = process.env): RuntimeConfig {
    const config = loadRuntimeConfig(env);
    logger.setLevel(config.logLevel);
    return config;
}

export function summarizeIssues(error: ZodError): string {
    return error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
}
