/**
 * Central event system for the engine.
 *
 * Core modules emit events, the logger and the CLI subscribe. Option
 * writes, declarations and hook failures all pass through here.
 *
 * @example
 * ```typescript
 * // In core module - emit events at key points
 * observer.emit('option:changed', { name, kind, value })
 *
 * // In CLI - subscribe to events
 * const cleanup = observer.on('option:rejected', (data) => warn(data))
 *
 * // Pattern matching for multiple events
 * observer.on(/^option:/, ({ event, data }) => logOptionEvent(event, data))
 * ```
 */
import {
    ObserverEngine,
    type Events
} from '@logosdx/observer'

import type { OptionsEvents } from './options/events.js'
import type { LoggerEvents } from './logger/events.js'


/**
 * All events emitted by engine core modules.
 *
 * Events are namespaced by module:
 * - `option:*` - Option declaration and writes
 * - `logger:*` - Logger lifecycle
 * - `error` - Catch-all errors
 */
export interface EngineEvents extends OptionsEvents, LoggerEvents {

    // Errors
    'error': { source: string; error: Error; context?: Record<string, unknown> }
}

export type EngineEventNames = Events<EngineEvents>;
export type EngineEventCallback<E extends EngineEventNames> = ObserverEngine.EventCallback<EngineEvents[E]>

/**
 * Global observer instance for the engine.
 *
 * Enable debug mode with `ENGINE_DEBUG=1` to see all events as they occur.
 */
export const observer = new ObserverEngine<EngineEvents>({
    name: 'engine',
    spy: process.env['ENGINE_DEBUG']
        ? (action) => console.error(`[engine:${action.fn}] ${String(action.event)}`)
        : undefined
});

export type { ObserverEngine }
