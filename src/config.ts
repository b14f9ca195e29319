import { z } from 'zod';
import { ConfigurationError } from './errors';
import { LogLevel, type Logger } from './utils/Logger';

/**
 * Runtime configuration, read from the environment.
 *
 * - `OBJGRAPH_LOG_LEVEL`: debug | info | warn | error | none (default info)
 * - `OBJGRAPH_LOG_JSON`: true | false | 1 | 0 (default false)
 */

const LEVELS = {
    debug: LogLevel.DEBUG,
    info: LogLevel.INFO,
    warn: LogLevel.WARN,
    error: LogLevel.ERROR,
    none: LogLevel.NONE,
} as const;

const EnvSchema = z.object({
    OBJGRAPH_LOG_LEVEL: z
        .enum(['debug', 'info', 'warn', 'error', 'none'])
        .default('info'),
    OBJGRAPH_LOG_JSON: z
        .enum(['true', 'false', '1', '0'])
        .default('false')
        .transform(v => v === 'true' || v === '1'),
});

export interface GraphConfig {
    logLevel: LogLevel;
    logJson: boolean;
}

export type Env = Record<string, string | undefined>;

/**
 * @throws {ConfigurationError} If a variable holds an unsupported value
 */
export function loadConfig(env: Env = process.env): GraphConfig {
    const result = EnvSchema.safeParse({
        // case-insensitive: DEBUG and debug are the same level
        OBJGRAPH_LOG_LEVEL: env.OBJGRAPH_LOG_LEVEL?.toLowerCase(),
        OBJGRAPH_LOG_JSON: env.OBJGRAPH_LOG_JSON?.toLowerCase(),
    });

    if (!result.success) {
        const errorMessages = result.error.issues
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join(', ');
        throw new ConfigurationError(`Invalid configuration: ${errorMessages}`);
    }

    return {
        logLevel: LEVELS[result.data.OBJGRAPH_LOG_LEVEL],
        logJson: result.data.OBJGRAPH_LOG_JSON,
    };
}

export function applyConfig(config: GraphConfig, target: Logger): void {
    target.setLogLevel(config.logLevel);
    target.setJson(config.logJson);
}
