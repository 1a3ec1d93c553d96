/**
 * Event Classifier
 *
 * Classifies observer events by log level based on naming patterns.
 *
 * Classification rules:
 * - 'error' or '*:error', '*:failed' -> error
 * - '*:rejected' -> warn
 * - '*:changed', '*:reset', '*:started', etc. -> info
 * - Everything else -> debug
 */
import type { EntryLevel, LogLevel } from './types.js';
import { LOG_LEVEL_PRIORITY } from './types.js';

/**
 * Patterns that classify an event as error level.
 */
const ERROR_PATTERNS = [/^error$/, /:error$/, /:failed$/];

/**
 * Patterns that classify an event as warn level.
 */
const WARN_PATTERNS = [/:rejected$/, /:warning$/];

/**
 * Patterns that classify an event as info level.
 */
const INFO_PATTERNS = [
    /:changed$/,
    /:reset$/,
    /:started$/,
    /:redirected$/,
];

/**
 * Classify an event name to determine its log level.
 *
 * @example
 * ```typescript
 * classifyEvent('error')            // 'error'
 * classifyEvent('option:rejected')  // 'warn'
 * classifyEvent('option:changed')   // 'info'
 * classifyEvent('option:declared')  // 'debug'
 * ```
 */
export function classifyEvent(event: string): EntryLevel {

    if (ERROR_PATTERNS.some((pattern) => pattern.test(event))) {

        return 'error';

    }

    if (WARN_PATTERNS.some((pattern) => pattern.test(event))) {

        return 'warn';

    }

    if (INFO_PATTERNS.some((pattern) => pattern.test(event))) {

        return 'info';

    }

    return 'debug';

}

/**
 * Map entry level to priority for comparison.
 * Lower priority = more severe/important.
 */
export function getEntryLevelPriority(level: EntryLevel): number {

    switch (level) {

    case 'error':
        return 1;
    case 'warn':
        return 2;
    case 'info':
        return 3;
    case 'debug':
        return 4;

    }

}

/**
 * Check if an entry level passes the configured verbosity.
 */
export function isLevelEnabled(level: EntryLevel, configLevel: LogLevel): boolean {

    return getEntryLevelPriority(level) <= LOG_LEVEL_PRIORITY[configLevel];

}

/**
 * Check if an event should be logged at the given verbosity level.
 *
 * @example
 * ```typescript
 * shouldLog('error', 'warn')                 // true (errors always logged)
 * shouldLog('option:changed', 'info')        // true
 * shouldLog('option:declared', 'info')       // false (debug event at info level)
 * shouldLog('option:declared', 'verbose')    // true (everything at verbose)
 * ```
 */
export function shouldLog(event: string, configLevel: LogLevel): boolean {

    return isLevelEnabled(classifyEvent(event), configLevel);

}
