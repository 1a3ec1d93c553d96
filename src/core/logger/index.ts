/**
 * Logger Module
 *
 * Captures observer events and streams them to a console stream
 * and the debug log file.
 */

// Events
export type { LoggerEvents } from './events.js';

// Types
export type {
    LogLevel,
    EntryLevel,
    LogEntry,
    LoggerConfig,
    LoggerState,
} from './types.js';

export { LOG_LEVEL_PRIORITY, LOG_LEVELS, DEFAULT_LOGGER_CONFIG } from './types.js';

// Classifier
export { classifyEvent, getEntryLevelPriority, isLevelEnabled, shouldLog } from './classifier.js';

// Formatter
export { generateMessage, formatEntry, serializeEntry, formatLine } from './formatter.js';

// Logger
export { Logger, type LoggerOptions } from './logger.js';
