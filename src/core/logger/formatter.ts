/**
 * Log Formatter
 *
 * Converts observer events into LogEntry objects and serializes them
 * for output. File entries are single JSON lines; console entries are
 * compact text lines.
 */
import type { EntryLevel, LogEntry } from './types.js'
import { classifyEvent } from './classifier.js'


/**
 * Human-readable message templates for known events.
 */
const MESSAGE_TEMPLATES: Record<string, (data: Record<string, unknown>) => string> = {

    // Options
    'option:declared': (d) => `Declared ${d['name']} (${d['kind']}, rank ${d['rank']})`,
    'option:changed': (d) => `Set ${d['name']} = ${d['value']}`,
    'option:rejected': (d) => `Rejected '${d['value']}' for ${d['name']} (${d['reason']})`,
    'option:reset': (d) => `Reset ${d['count']} options to defaults`,

    // Logger lifecycle
    'logger:started': (d) => `Logger started at ${d['level']} level`,
    'logger:redirected': (d) => d['file'] ? `Debug log moved to ${d['file']}` : 'Debug log closed',

    // Generic error
    'error': (d) => {

        const error = d['error']
        const message = error instanceof Error ? error.message : String(error)

        return `Error in ${d['source']}: ${message}`
    },
}


/**
 * Generate a human-readable message for an event.
 *
 * Uses templates for known events, falls back to generic format.
 *
 * @example
 * ```typescript
 * generateMessage('option:changed', { name: 'Hash', kind: 'spin', value: '64' })
 * // 'Set Hash = 64'
 *
 * generateMessage('search:info', { depth: 12 })
 * // 'search info: depth=12'
 * ```
 */
export function generateMessage(event: string, data: Record<string, unknown>): string {

    const template = MESSAGE_TEMPLATES[event]

    if (template) {

        return template(data)
    }

    const parts = Object.entries(data)
        .slice(0, 3)
        .map(([k, v]) => `${k}=${summarizeValue(v)}`)

    if (parts.length === 0) {

        return event.replace(/:/g, ' ')
    }

    return `${event.replace(/:/g, ' ')}: ${parts.join(', ')}`
}


/**
 * Summarize a value for log message display.
 * Truncates long strings and formats objects.
 */
function summarizeValue(value: unknown): string {

    if (value === null || value === undefined) {

        return String(value)
    }

    if (typeof value === 'string') {

        if (value.length > 50) {

            return `"${value.slice(0, 47)}..."`
        }

        return `"${value}"`
    }

    if (Array.isArray(value)) {

        return `[${value.length} items]`
    }

    if (value instanceof Error) {

        return value.message
    }

    if (typeof value === 'object') {

        return `{${Object.keys(value).length} keys}`
    }

    return String(value)
}


/**
 * Format an event into a LogEntry.
 *
 * @param includeData - Whether to include the full payload (verbose mode)
 */
export function formatEntry(
    event: string,
    data: Record<string, unknown>,
    context?: Record<string, unknown>,
    includeData = false
): LogEntry {

    const entry: LogEntry = {
        timestamp: new Date().toISOString(),
        level: classifyEvent(event),
        event,
        message: generateMessage(event, data),
    }

    if (includeData && Object.keys(data).length > 0) {

        entry.data = sanitizeData(data)
    }

    if (context && Object.keys(context).length > 0) {

        entry.context = context
    }

    return entry
}


/**
 * Make event data JSON-safe.
 */
function sanitizeData(data: Record<string, unknown>): Record<string, unknown> {

    const result: Record<string, unknown> = {}

    for (const [key, value] of Object.entries(data)) {

        if (value instanceof Error) {

            result[key] = {
                name: value.name,
                message: value.message,
                stack: value.stack?.split('\n').slice(0, 3).join('\n'),
            }
            continue
        }

        if (typeof value === 'function') {

            continue
        }

        result[key] = value
    }

    return result
}


/**
 * Serialize a LogEntry to a JSON line for file output.
 */
export function serializeEntry(entry: LogEntry): string {

    return JSON.stringify(entry) + '\n'
}


/**
 * Format a compact console line.
 *
 * @example
 * ```typescript
 * formatLine('2024-01-15T10:30:00.000Z', 'warn', 'Rejected \'0\' for Hash (out-of-range)')
 * // "[2024-01-15T10:30:00.000Z] [WARN ] Rejected '0' for Hash (out-of-range)\n"
 * ```
 */
export function formatLine(timestamp: string, level: EntryLevel, message: string): string {

    return `[${timestamp}] [${level.toUpperCase().padEnd(5)}] ${message}\n`
}
