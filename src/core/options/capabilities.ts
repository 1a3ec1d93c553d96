/**
 * Subsystem capabilities.
 *
 * Subsystems expose one narrow interface each; the adapters below turn
 * a capability into an option hook that translates the option's value
 * into the argument the subsystem expects.
 */
import { EMPTY_PLACEHOLDER } from './types.js';
import type { OptionHook } from './types.js';

/**
 * Something sized in megabytes, such as the transposition table.
 */
export interface Resizable {
    resize(megabytes: number): void;
}

/**
 * A worker pool whose size can change at runtime.
 */
export interface ThreadPoolScalable {
    setThreadCount(count: number): void;
}

/**
 * A subsystem that rebuilds itself from the current options.
 */
export interface Reinitializable {
    reinitialize(): void;
}

/**
 * A subsystem holding state that can be wiped.
 */
export interface Clearable {
    clear(): void;
}

/**
 * A subsystem backed by a file or directory. `null` unloads it.
 */
export interface PathLoadable {
    load(path: string | null): void;
}

/**
 * A debug log destination. `null` stops file output.
 */
export interface LogTarget {
    redirect(path: string | null): void;
}

/**
 * Path text of a string option, with blank and placeholder mapped to null.
 */
export function pathOf(text: string): string | null {

    const trimmed = text.trim();

    return trimmed.length === 0 || trimmed === EMPTY_PLACEHOLDER ? null : trimmed;

}

/**
 * Resize on change, reading a spin option as megabytes.
 */
export function resizeOnChange(target: Resizable): OptionHook {

    return (option) => target.resize(option.toNumber());

}

/**
 * Rescale a thread pool on change.
 */
export function scaleOnChange(target: ThreadPoolScalable): OptionHook {

    return (option) => target.setThreadCount(option.toNumber());

}

/**
 * Reinitialize on change, whatever the new value.
 */
export function reinitializeOnChange(target: Reinitializable): OptionHook {

    return () => target.reinitialize();

}

/**
 * Clear on change. Meant for buttons.
 */
export function clearOnChange(target: Clearable): OptionHook {

    return () => target.clear();

}

/**
 * Load the path held by a string option.
 */
export function loadOnChange(target: PathLoadable): OptionHook {

    return (option) => target.load(pathOf(option.toText()));

}

/**
 * Point debug logging at the path held by a string option.
 */
export function redirectLogOnChange(target: LogTarget): OptionHook {

    return (option) => target.redirect(pathOf(option.toText()));

}
