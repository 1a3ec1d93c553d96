/**
 * Option Zod schemas and parsing.
 *
 * Textual values are parsed here, at the boundary, into the typed
 * payloads options store. Declarations are validated here too.
 */
import { z } from 'zod';

import { equalsCaseInsensitive } from './compare.js';
import { OptionDeclarationError } from './errors.js';
import { COMBO_SEPARATOR } from './types.js';
import type { OptionKind } from './types.js';

// ─────────────────────────────────────────────────────────────
// Value Schemas
// ─────────────────────────────────────────────────────────────

/**
 * Check option text. Exactly `true` or `false`.
 */
export const CheckTextSchema = z
    .enum(['true', 'false'])
    .transform((text) => text === 'true');

/**
 * Spin option text. An optionally signed run of digits.
 */
export const SpinTextSchema = z
    .string()
    .regex(/^[+-]?\d+$/, 'Spin values must be integers')
    .transform((text) => Number(text))
    .refine((value) => Number.isSafeInteger(value), 'Spin value is too large');

// ─────────────────────────────────────────────────────────────
// Declaration Schemas
// ─────────────────────────────────────────────────────────────

const SpinDeclarationSchema = z
    .object({
        value: z.number().int('Default must be an integer'),
        min: z.number().int('Minimum must be an integer'),
        max: z.number().int('Maximum must be an integer'),
    })
    .refine((spin) => spin.min <= spin.max, {
        message: 'Minimum must not exceed maximum',
    })
    .refine((spin) => spin.value >= spin.min && spin.value <= spin.max, {
        message: 'Default must lie within [min, max]',
    });

const ComboDeclarationSchema = z
    .object({
        choices: z.array(z.string()).min(1, 'Combo list has no choices'),
        initial: z.string().min(1, 'Initial value is required'),
    })
    .refine((combo) => !equalsCaseInsensitive(combo.initial, COMBO_SEPARATOR), {
        message: `'${COMBO_SEPARATOR}' is a separator, not a choice`,
    })
    .refine((combo) => combo.choices.some((choice) => equalsCaseInsensitive(choice, combo.initial)), {
        message: 'Initial value is not one of the choices',
    });

export type SpinDeclaration = z.infer<typeof SpinDeclarationSchema>;
export type ComboDeclaration = z.infer<typeof ComboDeclarationSchema>;

// ─────────────────────────────────────────────────────────────
// Parsing Functions
// ─────────────────────────────────────────────────────────────

/**
 * Parse check option text.
 *
 * @returns the boolean, or null when the text is neither `true` nor `false`
 */
export function parseCheckText(text: string): boolean | null {

    const result = CheckTextSchema.safeParse(text);

    return result.success ? result.data : null;

}

/**
 * Parse spin option text.
 *
 * @returns the integer, or null when the text is not an integer
 *
 * @example
 * ```typescript
 * parseSpinText('64')   // 64
 * parseSpinText('-10')  // -10
 * parseSpinText('6.5')  // null
 * parseSpinText('64mb') // null
 * ```
 */
export function parseSpinText(text: string): number | null {

    const result = SpinTextSchema.safeParse(text);

    return result.success ? result.data : null;

}

/**
 * Split a combo list into its choices.
 *
 * Tokens are separated by whitespace; the separator token is dropped.
 *
 * @example
 * ```typescript
 * splitChoices('Both var Off var White var Black var Both')
 * // ['Both', 'Off', 'White', 'Black', 'Both']
 * ```
 */
export function splitChoices(list: string): string[] {

    return list
        .split(/\s+/)
        .filter((token) => token.length > 0 && !equalsCaseInsensitive(token, COMBO_SEPARATOR));

}

/**
 * Throw an OptionDeclarationError for the first issue of a failed parse.
 */
function fail(kind: OptionKind, issues: z.ZodIssue[]): never {

    const firstIssue = issues[0];

    throw new OptionDeclarationError(kind, firstIssue?.message ?? 'declaration is invalid');

}

/**
 * Validate a spin declaration.
 *
 * @throws OptionDeclarationError if bounds or default are inconsistent
 */
export function validateSpinDeclaration(declaration: SpinDeclaration): SpinDeclaration {

    const result = SpinDeclarationSchema.safeParse(declaration);

    if (!result.success) {

        fail('spin', result.error.issues);

    }

    return result.data;

}

/**
 * Validate a combo declaration.
 *
 * @throws OptionDeclarationError if the initial value is not a choice
 */
export function validateComboDeclaration(declaration: ComboDeclaration): ComboDeclaration {

    const result = ComboDeclarationSchema.safeParse(declaration);

    if (!result.success) {

        fail('combo', result.error.issues);

    }

    return result.data;

}
