/**
 * Option-related errors.
 *
 * Lookups of undeclared names and accessor misuse are surfaced as
 * typed errors. Rejected writes are only errors in strict mode.
 */
import type { OptionKind, RejectReason } from './types.js'


/**
 * Error when an option name is not declared.
 *
 * @example
 * ```typescript
 * const [result, err] = attemptSync(() => registry.set('Hashh', '64'))
 * if (err instanceof OptionNotFoundError) {
 *     console.log(`No such option: ${err.optionName}`)
 * }
 * ```
 */
export class OptionNotFoundError extends Error {

    override readonly name = 'OptionNotFoundError' as const

    constructor(public readonly optionName: string) {

        super(`No such option: ${optionName}`)
    }
}


/**
 * Error when an option is read through the wrong accessor,
 * such as reading a spin as text.
 */
export class OptionAccessError extends Error {

    override readonly name = 'OptionAccessError' as const

    constructor(
        public readonly accessor: string,
        public readonly kind: OptionKind,
        public readonly expected: readonly OptionKind[],
    ) {

        super(
            `Cannot read ${kind} option with ${accessor}() (expects ${expected.join(' or ')})`
        )
    }
}


/**
 * Error when an option is declared with inconsistent values.
 */
export class OptionDeclarationError extends Error {

    override readonly name = 'OptionDeclarationError' as const

    constructor(
        public readonly kind: OptionKind,
        public readonly reason: string,
    ) {

        super(`Invalid ${kind} option: ${reason}`)
    }
}


/**
 * Error when a write is rejected in strict mode.
 *
 * @example
 * ```typescript
 * const registry = new OptionsRegistry({ strict: true })
 * const [, err] = attemptSync(() => registry.set('Hash', '0'))
 * if (err instanceof OptionRejectedError) {
 *     console.log(err.reason) // 'out-of-range'
 * }
 * ```
 */
export class OptionRejectedError extends Error {

    override readonly name = 'OptionRejectedError' as const

    constructor(
        public readonly optionName: string,
        public readonly value: string,
        public readonly reason: RejectReason,
    ) {

        super(`Rejected value '${value}' for ${optionName} (${reason})`)
    }
}
