/**
 * CLI runner.
 *
 * Builds the engine's option registry, applies `--set` writes in order,
 * then prints the option table the way a controller would see it.
 * The meow entry point calls this with the process streams.
 */
import type { Writable } from 'node:stream';
import { attemptSync } from '@logosdx/utils';
import { z } from 'zod';

import { Logger, LOG_LEVELS } from '../core/logger/index.js';
import type { LogLevel } from '../core/logger/index.js';
import {
    OptionNotFoundError,
    createEngineOptions,
    describeRegistry,
    formatRegistry,
} from '../core/options/index.js';

/**
 * Parsed command line flags.
 */
export interface CliFlags {
    /** `Name=value` writes, applied in order */
    set: string[];
    json: boolean;
    strict: boolean;
    logLevel?: string;
}

/**
 * Streams the CLI writes to.
 */
export interface CliIO {
    stdout: Writable;
    stderr: Writable;
    env?: Record<string, string | undefined>;
    color?: boolean;
}

const LogLevelSchema = z.enum(LOG_LEVELS);

/**
 * Level used when neither the flag nor ENGINE_LOG_LEVEL is set.
 */
export const DEFAULT_CLI_LOG_LEVEL: LogLevel = 'warn';

/**
 * Split a `Name=value` assignment at the first `=`.
 *
 * The name is trimmed; the value is kept as written.
 *
 * @example
 * ```typescript
 * parseAssignment('Hash=64')                   // { name: 'Hash', value: '64' }
 * parseAssignment('SyzygyPath=/tb=a')          // { name: 'SyzygyPath', value: '/tb=a' }
 * parseAssignment('Clear Hash')                // { name: 'Clear Hash', value: '' }
 * ```
 */
export function parseAssignment(assignment: string): { name: string; value: string } {

    const index = assignment.indexOf('=');

    if (index === -1) {

        return { name: assignment.trim(), value: '' };

    }

    return {
        name: assignment.slice(0, index).trim(),
        value: assignment.slice(index + 1),
    };

}

/**
 * Resolve the log level from the flag, then the environment.
 *
 * @returns the level, or null if the given value is not a level
 */
export function resolveLogLevel(flag: string | undefined, env: Record<string, string | undefined>): LogLevel | null {

    const raw = flag ?? env['ENGINE_LOG_LEVEL'] ?? DEFAULT_CLI_LOG_LEVEL;
    const result = LogLevelSchema.safeParse(raw);

    return result.success ? result.data : null;

}

/**
 * Run the CLI.
 *
 * @returns the process exit code
 */
export async function runCli(flags: CliFlags, io: CliIO): Promise<number> {

    const level = resolveLogLevel(flags.logLevel, io.env ?? process.env);

    if (!level) {

        io.stderr.write(`Unknown log level. Expected one of: ${LOG_LEVELS.join(', ')}\n`);

        return 1;

    }

    const logger = new Logger({
        console: io.stderr,
        color: io.color ?? false,
        config: { level },
    });

    logger.start();

    try {

        const registry = createEngineOptions({ debugLog: logger }, { strict: flags.strict });

        for (const assignment of flags.set) {

            const { name, value } = parseAssignment(assignment);
            const [, err] = attemptSync(() => registry.set(name, value));

            if (err) {

                // Rejections and hook failures were already logged from their events
                if (err instanceof OptionNotFoundError) {

                    logger.error(err.message);

                }

                return 1;

            }

        }

        const output = flags.json
            ? JSON.stringify(describeRegistry(registry), null, 4)
            : formatRegistry(registry);

        io.stdout.write(output + '\n');

        return 0;

    }
    finally {

        await logger.stop();

    }

}
