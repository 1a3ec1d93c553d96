/**
 * engine-options
 *
 * Typed, ordered engine options with change hooks, plus the event bus
 * and logger they report through.
 */
export * from './core/options/index.js';
export * from './core/logger/index.js';
export { observer } from './core/observer.js';
export type { EngineEvents, EngineEventNames, EngineEventCallback } from './core/observer.js';
