/**
 * Option Types
 *
 * Type definitions for engine options. Each option holds a typed
 * payload selected by its kind; text only appears at the boundary
 * where a controller reads or writes values.
 */
import type { EngineOption } from './option.js';

/**
 * Option kinds. The tag doubles as the display token.
 *
 * - string: free text, may hold a placeholder such as `<empty>`
 * - check: boolean
 * - spin: bounded integer
 * - combo: one token out of a fixed list
 * - button: no value, writes only fire the hook
 */
export type OptionKind = 'string' | 'check' | 'spin' | 'combo' | 'button';

/**
 * Ordered list of kinds, used by schemas and the CLI.
 */
export const OPTION_KINDS = ['string', 'check', 'spin', 'combo', 'button'] as const satisfies readonly OptionKind[];

/**
 * Token that separates choices in a combo list. Never a valid value.
 */
export const COMBO_SEPARATOR = 'var';

/**
 * Placeholder text for string options that are not configured.
 */
export const EMPTY_PLACEHOLDER = '<empty>';

export interface StringState {
    kind: 'string';
    value: string;
}

export interface CheckState {
    kind: 'check';
    value: boolean;
}

export interface SpinState {
    kind: 'spin';
    value: number;
    min: number;
    max: number;
}

export interface ComboState {
    kind: 'combo';

    /** Current token, as last written */
    value: string;

    /** Acceptable tokens, separator removed */
    choices: readonly string[];
}

export interface ButtonState {
    kind: 'button';
}

/**
 * Typed option state, discriminated by kind.
 */
export type OptionState = StringState | CheckState | SpinState | ComboState | ButtonState;

/**
 * Side effect run after an accepted write.
 *
 * Receives the option with its new value already stored. Runs
 * synchronously before the write returns.
 */
export type OptionHook = (option: EngineOption) => void;

/**
 * Why a write was turned down.
 *
 * - empty: no text for a kind that needs a value
 * - invalid-format: text that does not parse for the kind
 * - out-of-range: spin value outside [min, max]
 * - invalid-choice: combo token not in the list, or the separator
 */
export type RejectReason = 'empty' | 'invalid-format' | 'out-of-range' | 'invalid-choice';

/**
 * Outcome of a write.
 */
export type WriteResult =
    | { accepted: true }
    | { accepted: false; reason: RejectReason; value: string };

/**
 * Plain description of an option, as rendered for controllers.
 */
export interface OptionDescriptor {
    name: string;
    kind: OptionKind;
    rank: number;
    value: string;
    default?: string;
    min?: number;
    max?: number;
    choices?: string[];
}
