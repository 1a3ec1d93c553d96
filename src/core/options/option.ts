/**
 * Engine Option
 *
 * A single named setting: its kind, typed value, default, insertion
 * rank, and an optional hook fired after every accepted write.
 *
 * Writes are validated against the kind. Invalid text leaves the value
 * untouched and the hook uncalled; the write reports why in its result
 * but never throws.
 */
import { equalsCaseInsensitive } from './compare.js';
import { OptionAccessError } from './errors.js';
import {
    parseCheckText,
    parseSpinText,
    splitChoices,
    validateComboDeclaration,
    validateSpinDeclaration,
} from './schema.js';
import { COMBO_SEPARATOR } from './types.js';
import type {
    OptionHook,
    OptionKind,
    OptionState,
    RejectReason,
    WriteResult,
} from './types.js';

/**
 * Construction parameters for EngineOption.
 *
 * Prefer the declaration helpers (`spinOption`, `comboOption`, ...)
 * which validate their input first.
 */
export interface EngineOptionInit {

    /** Initial state, also used as the default */
    state: OptionState;

    /** Default text shown to controllers (combo list, for combos) */
    defaultText?: string;

    hook?: OptionHook;
}

type ParseOutcome =
    | { ok: true; state: OptionState }
    | { ok: false; reason: RejectReason };

/**
 * One engine option.
 *
 * @example
 * ```typescript
 * const hash = spinOption(16, 1, 33554432, (o) => tt.resize(o.toNumber()))
 *
 * hash.write('0')   // { accepted: false, reason: 'out-of-range', value: '0' }
 * hash.write('64')  // { accepted: true }, tt resized to 64
 * hash.toNumber()   // 64
 * ```
 */
export class EngineOption {

    #state: OptionState;
    #initial: OptionState;
    #defaultText: string;
    #hook: OptionHook | null;
    #rank: number | null = null;

    constructor(init: EngineOptionInit) {

        this.#state = init.state;
        this.#initial = init.state;
        this.#defaultText = init.defaultText ?? textOf(init.state);
        this.#hook = init.hook ?? null;

    }

    // ─────────────────────────────────────────────────────────────
    // Accessors
    // ─────────────────────────────────────────────────────────────

    get kind(): OptionKind {

        return this.#state.kind;

    }

    /**
     * Current value as text.
     */
    get text(): string {

        return textOf(this.#state);

    }

    /**
     * Default value as text. For combos this is the full choice list.
     */
    get defaultText(): string {

        return this.#defaultText;

    }

    /**
     * Lower bound for spin options, 0 for other kinds.
     */
    get min(): number {

        return this.#state.kind === 'spin' ? this.#state.min : 0;

    }

    /**
     * Upper bound for spin options, 0 for other kinds.
     */
    get max(): number {

        return this.#state.kind === 'spin' ? this.#state.max : 0;

    }

    /**
     * Acceptable combo tokens, empty for other kinds.
     */
    get choices(): readonly string[] {

        return this.#state.kind === 'combo' ? this.#state.choices : [];

    }

    /**
     * Insertion rank assigned by the registry, null until declared.
     */
    get rank(): number | null {

        return this.#rank;

    }

    get hasHook(): boolean {

        return this.#hook !== null;

    }

    /**
     * Snapshot of the typed state.
     */
    get state(): OptionState {

        return { ...this.#state };

    }

    /**
     * Read a check (0 or 1) or spin option as a number.
     *
     * @throws OptionAccessError for other kinds
     */
    toNumber(): number {

        const state = this.#state;

        if (state.kind === 'spin') {

            return state.value;

        }

        if (state.kind === 'check') {

            return state.value ? 1 : 0;

        }

        throw new OptionAccessError('toNumber', state.kind, ['check', 'spin']);

    }

    /**
     * Read a check option.
     *
     * @throws OptionAccessError for other kinds
     */
    toBoolean(): boolean {

        const state = this.#state;

        if (state.kind !== 'check') {

            throw new OptionAccessError('toBoolean', state.kind, ['check']);

        }

        return state.value;

    }

    /**
     * Read a string option.
     *
     * @throws OptionAccessError for other kinds
     */
    toText(): string {

        const state = this.#state;

        if (state.kind !== 'string') {

            throw new OptionAccessError('toText', state.kind, ['string']);

        }

        return state.value;

    }

    /**
     * Whether a combo option currently holds `token`, ignoring case.
     *
     * @throws OptionAccessError for other kinds
     */
    is(token: string): boolean {

        const state = this.#state;

        if (state.kind !== 'combo') {

            throw new OptionAccessError('is', state.kind, ['combo']);

        }

        return equalsCaseInsensitive(state.value, token);

    }

    // ─────────────────────────────────────────────────────────────
    // Mutation
    // ─────────────────────────────────────────────────────────────

    /**
     * Assign the insertion rank. Called once, by the registry.
     *
     * @returns false if the option already has a rank
     */
    bindRank(rank: number): boolean {

        if (this.#rank !== null) {

            return false;

        }

        this.#rank = rank;

        return true;

    }

    /**
     * Write a new value from text.
     *
     * Stores the value (except for buttons) and then calls the hook.
     * A rejected write changes nothing. Errors thrown by the hook
     * propagate after the value has been stored.
     */
    write(text: string): WriteResult {

        const outcome = this.#parse(text);

        if (!outcome.ok) {

            return { accepted: false, reason: outcome.reason, value: text };

        }

        if (outcome.state.kind !== 'button') {

            this.#state = outcome.state;

        }

        if (this.#hook) {

            this.#hook(this);

        }

        return { accepted: true };

    }

    /**
     * Restore the declared default without calling the hook.
     */
    reset(): void {

        this.#state = this.#initial;

    }

    #parse(text: string): ParseOutcome {

        const state = this.#state;

        if (state.kind !== 'button' && text.length === 0) {

            return { ok: false, reason: 'empty' };

        }

        switch (state.kind) {

        case 'string':
            return { ok: true, state: { kind: 'string', value: text } };

        case 'check': {

            const value = parseCheckText(text);

            return value === null
                ? { ok: false, reason: 'invalid-format' }
                : { ok: true, state: { kind: 'check', value } };

        }

        case 'spin': {

            const value = parseSpinText(text);

            if (value === null) {

                return { ok: false, reason: 'invalid-format' };

            }

            if (value < state.min || value > state.max) {

                return { ok: false, reason: 'out-of-range' };

            }

            return { ok: true, state: { ...state, value } };

        }

        case 'combo': {

            const known = state.choices.some((choice) => equalsCaseInsensitive(choice, text));

            if (!known || equalsCaseInsensitive(text, COMBO_SEPARATOR)) {

                return { ok: false, reason: 'invalid-choice' };

            }

            return { ok: true, state: { ...state, value: text } };

        }

        case 'button':
            return { ok: true, state };

        }

    }

}

/**
 * Text form of a state, as shown to controllers.
 */
function textOf(state: OptionState): string {

    switch (state.kind) {

    case 'string':
    case 'combo':
        return state.value;
    case 'check':
    case 'spin':
        return String(state.value);
    case 'button':
        return '';

    }

}

// ─────────────────────────────────────────────────────────────
// Declaration helpers
// ─────────────────────────────────────────────────────────────

/**
 * Declare a string option.
 */
export function stringOption(value: string, hook?: OptionHook): EngineOption {

    return new EngineOption({ state: { kind: 'string', value }, hook });

}

/**
 * Declare a check (boolean) option.
 */
export function checkOption(value: boolean, hook?: OptionHook): EngineOption {

    return new EngineOption({ state: { kind: 'check', value }, hook });

}

/**
 * Declare a spin option with inclusive bounds.
 *
 * @throws OptionDeclarationError if the bounds or default are inconsistent
 */
export function spinOption(value: number, min: number, max: number, hook?: OptionHook): EngineOption {

    const spin = validateSpinDeclaration({ value, min, max });

    return new EngineOption({ state: { kind: 'spin', ...spin }, hook });

}

/**
 * Declare a combo option.
 *
 * `list` holds the choices separated by whitespace, usually with
 * `var` between them; `initial` must be one of them.
 *
 * @throws OptionDeclarationError if `initial` is not a choice
 *
 * @example
 * ```typescript
 * comboOption('Both var Off var White var Black var Both', 'Both')
 * ```
 */
export function comboOption(list: string, initial: string, hook?: OptionHook): EngineOption {

    const combo = validateComboDeclaration({ choices: splitChoices(list), initial });

    return new EngineOption({
        state: { kind: 'combo', value: combo.initial, choices: combo.choices },
        defaultText: list,
        hook,
    });

}

/**
 * Declare a button. Buttons hold no value; every write fires the hook.
 */
export function buttonOption(hook?: OptionHook): EngineOption {

    return new EngineOption({ state: { kind: 'button' }, hook });

}
