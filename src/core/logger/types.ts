/**
 * Logger Types
 *
 * Type definitions for the engine logging system.
 * The logger captures observer events and streams them
 * to a console stream and/or a debug log file.
 */

/**
 * Log verbosity levels.
 *
 * - silent: No logging
 * - error: Errors only
 * - warn: Errors + warnings (rejected writes)
 * - info: Errors + warnings + info (default)
 * - verbose: All events including debug
 */
export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'verbose';

/**
 * Numeric priority for log levels.
 * Higher numbers = more verbose.
 */
export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
    silent: 0,
    error: 1,
    warn: 2,
    info: 3,
    verbose: 4,
};

/**
 * Ordered list of levels, for flag and environment parsing.
 */
export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'verbose'] as const satisfies readonly LogLevel[];

/**
 * Entry level in the log file.
 * Maps to standard logging conventions.
 */
export type EntryLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * A single log entry.
 *
 * Entries are JSON-serialized, one per line in the log file.
 *
 * @example
 * ```json
 * {
 *     "timestamp": "2024-01-15T10:30:00.000Z",
 *     "level": "info",
 *     "event": "option:changed",
 *     "message": "Set Hash = 64"
 * }
 * ```
 */
export interface LogEntry {
    /** ISO 8601 timestamp */
    timestamp: string;

    /** Entry severity level */
    level: EntryLevel;

    /** Observer event name */
    event: string;

    /** Human-readable summary */
    message: string;

    /** Event payload (included at verbose level) */
    data?: Record<string, unknown>;

    /** Additional context */
    context?: Record<string, unknown>;
}

/**
 * Logger configuration.
 */
export interface LoggerConfig {
    /** Enable logging */
    enabled: boolean;

    /** Minimum level to capture */
    level: LogLevel;

    /** Debug log file path, null for console only */
    file: string | null;
}

/**
 * Default logger configuration.
 */
export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
    enabled: true,
    level: 'info',
    file: null,
};

/**
 * Logger state for lifecycle management.
 */
export type LoggerState = 'idle' | 'running' | 'flushing' | 'stopped';
