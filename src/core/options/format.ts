/**
 * Option display.
 *
 * Renders options in the line format controllers parse to discover
 * the engine's options:
 *
 *     option name <name> type <kind> [default <value>] [min <min> max <max>]
 *
 * Field order and tokens are fixed.
 */
import type { EngineOption } from './option.js';
import type { OptionsRegistry } from './registry.js';
import type { OptionDescriptor } from './types.js';

/**
 * Render one option.
 *
 * @example
 * ```typescript
 * formatOption('Hash', spinOption(16, 1, 33554432))
 * // 'option name Hash type spin default 16 min 1 max 33554432'
 *
 * formatOption('Clear Hash', buttonOption())
 * // 'option name Clear Hash type button'
 * ```
 */
export function formatOption(name: string, option: EngineOption): string {

    let line = `option name ${name} type ${option.kind}`;

    if (option.kind !== 'button') {

        line += ` default ${option.defaultText}`;

    }

    if (option.kind === 'spin') {

        line += ` min ${option.min} max ${option.max}`;

    }

    return line;

}

/**
 * Render every option in declaration order, one per line.
 */
export function formatRegistry(registry: OptionsRegistry): string {

    const lines: string[] = [];

    for (const [name, option] of registry.entries()) {

        lines.push(formatOption(name, option));

    }

    return lines.join('\n');

}

/**
 * Describe one option as a plain object.
 */
export function describeOption(name: string, option: EngineOption): OptionDescriptor {

    const descriptor: OptionDescriptor = {
        name,
        kind: option.kind,
        rank: option.rank ?? -1,
        value: option.text,
    };

    if (option.kind !== 'button') {

        descriptor.default = option.defaultText;

    }

    if (option.kind === 'spin') {

        descriptor.min = option.min;
        descriptor.max = option.max;

    }

    if (option.kind === 'combo') {

        descriptor.choices = [...option.choices];

    }

    return descriptor;

}

/**
 * Describe every option in declaration order.
 */
export function describeRegistry(registry: OptionsRegistry): OptionDescriptor[] {

    return Array.from(registry.entries(), ([name, option]) => describeOption(name, option));

}
