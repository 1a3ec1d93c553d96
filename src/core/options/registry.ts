/**
 * Options Registry
 *
 * Maps option names to options, comparing names case-insensitively.
 * Entries are kept sorted by name; display order comes from the rank
 * each option receives when declared.
 */
import { attemptSync } from '@logosdx/utils';

import { observer } from '../observer.js';
import { compareCaseInsensitive } from './compare.js';
import { OptionDeclarationError, OptionNotFoundError, OptionRejectedError } from './errors.js';
import type { EngineOption } from './option.js';
import type { WriteResult } from './types.js';

/**
 * Options for OptionsRegistry construction.
 */
export interface OptionsRegistryOptions {

    /** Throw OptionRejectedError on rejected writes instead of ignoring them */
    strict?: boolean;
}

interface RegistryEntry {
    name: string;
    option: EngineOption;
}

/**
 * Ordered, case-insensitive collection of engine options.
 *
 * Created once at startup and handed to whatever needs to read or
 * write options.
 *
 * @example
 * ```typescript
 * const registry = new OptionsRegistry()
 *
 * registry.declare('Threads', spinOption(1, 1, 512, scaleOnChange(pool)))
 * registry.set('threads', '8')
 *
 * registry.get('THREADS').toNumber() // 8
 *
 * for (const [name, option] of registry) {
 *     console.log(formatOption(name, option))
 * }
 * ```
 */
export class OptionsRegistry implements Iterable<[string, EngineOption]> {

    #entries: RegistryEntry[] = [];
    #nextRank = 0;
    #strict: boolean;

    constructor(options: OptionsRegistryOptions = {}) {

        this.#strict = options.strict ?? false;

    }

    /**
     * Number of declared options.
     */
    get size(): number {

        return this.#entries.length;

    }

    get strict(): boolean {

        return this.#strict;

    }

    // ─────────────────────────────────────────────────────────────
    // Declaration
    // ─────────────────────────────────────────────────────────────

    /**
     * Declare an option under a name.
     *
     * Replaces any option already declared under the same name
     * (ignoring case); the name keeps its first spelling. Every call
     * consumes a new rank.
     *
     * @returns the rank assigned to the option
     * @throws OptionDeclarationError if the option was already declared
     */
    declare(name: string, option: EngineOption): number {

        if (!option.bindRank(this.#nextRank)) {

            throw new OptionDeclarationError(option.kind, `already declared with rank ${option.rank}`);

        }

        const rank = this.#nextRank++;
        const index = this.#search(name);
        const existing = this.#entries[index];
        let declaredName = name;

        if (existing && compareCaseInsensitive(existing.name, name) === 0) {

            existing.option = option;
            declaredName = existing.name;

        }
        else {

            this.#entries.splice(index, 0, { name, option });

        }

        observer.emit('option:declared', {
            name: declaredName,
            kind: option.kind,
            rank,
        });

        return rank;

    }

    // ─────────────────────────────────────────────────────────────
    // Lookup
    // ─────────────────────────────────────────────────────────────

    /**
     * Find an option by name, ignoring case.
     */
    find(name: string): EngineOption | undefined {

        return this.#lookup(name)?.option;

    }

    /**
     * Get an option by name, ignoring case.
     *
     * @throws OptionNotFoundError if no option has that name
     */
    get(name: string): EngineOption {

        return this.#require(name).option;

    }

    has(name: string): boolean {

        return this.#lookup(name) !== undefined;

    }

    /**
     * The declared spelling of a name.
     *
     * @throws OptionNotFoundError if no option has that name
     */
    nameOf(name: string): string {

        return this.#require(name).name;

    }

    /**
     * Names in case-insensitive alphabetical order.
     */
    names(): string[] {

        return this.#entries.map((entry) => entry.name);

    }

    // ─────────────────────────────────────────────────────────────
    // Writes
    // ─────────────────────────────────────────────────────────────

    /**
     * Write a textual value to a named option.
     *
     * Rejected values leave the option unchanged and are reported in
     * the result (or thrown, in strict mode). Hook errors are emitted
     * and rethrown.
     *
     * @throws OptionNotFoundError if no option has that name
     * @throws OptionRejectedError if the value is rejected in strict mode
     *
     * @example
     * ```typescript
     * registry.set('Hash', '0')  // { accepted: false, reason: 'out-of-range', value: '0' }
     * registry.set('Hash', '64') // { accepted: true }
     * ```
     */
    set(name: string, value: string): WriteResult {

        const entry = this.#require(name);
        const option = entry.option;

        const [result, err] = attemptSync(() => option.write(value));

        if (err) {

            observer.emit('error', {
                source: 'options',
                error: err,
                context: { name: entry.name, value },
            });

            throw err;

        }

        if (!result.accepted) {

            observer.emit('option:rejected', {
                name: entry.name,
                value,
                reason: result.reason,
            });

            if (this.#strict) {

                throw new OptionRejectedError(entry.name, value, result.reason);

            }

            return result;

        }

        observer.emit('option:changed', {
            name: entry.name,
            kind: option.kind,
            value: option.text,
        });

        return result;

    }

    /**
     * Restore every option to its default. Hooks are not called.
     */
    resetAll(): void {

        for (const entry of this.#entries) {

            entry.option.reset();

        }

        observer.emit('option:reset', { count: this.#entries.length });

    }

    // ─────────────────────────────────────────────────────────────
    // Enumeration
    // ─────────────────────────────────────────────────────────────

    /**
     * Iterate `[name, option]` pairs by ascending rank.
     *
     * Each call starts a fresh pass.
     */
    *entries(): Generator<[string, EngineOption]> {

        const ranked = this.#entries
            .map((entry) => ({ entry, rank: entry.option.rank ?? -1 }))
            .sort((a, b) => a.rank - b.rank);

        for (const { entry } of ranked) {

            yield [entry.name, entry.option];

        }

    }

    [Symbol.iterator](): Iterator<[string, EngineOption]> {

        return this.entries();

    }

    // ─────────────────────────────────────────────────────────────
    // Internals
    // ─────────────────────────────────────────────────────────────

    /**
     * Index of the first entry whose name sorts at or after `name`.
     */
    #search(name: string): number {

        let low = 0;
        let high = this.#entries.length;

        while (low < high) {

            const mid = (low + high) >>> 1;
            const entry = this.#entries[mid];

            if (entry && compareCaseInsensitive(entry.name, name) < 0) {

                low = mid + 1;

            }
            else {

                high = mid;

            }

        }

        return low;

    }

    #lookup(name: string): RegistryEntry | undefined {

        const entry = this.#entries[this.#search(name)];

        if (entry && compareCaseInsensitive(entry.name, name) === 0) {

            return entry;

        }

        return undefined;

    }

    #require(name: string): RegistryEntry {

        const entry = this.#lookup(name);

        if (!entry) {

            throw new OptionNotFoundError(name);

        }

        return entry;

    }

}
