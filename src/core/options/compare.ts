/**
 * Case-insensitive string comparison.
 *
 * The single comparator used for option names (equality and ordering)
 * and for combo token matching. Characters are lowercased one at a time,
 * so two strings are only equal when their lengths match.
 */


/**
 * Lowercase a single UTF-16 code unit.
 *
 * Falls back to the original character when lowercasing would change
 * its length (e.g. 'İ'), keeping the comparison one-to-one.
 */
function lower(char: string): string {

    const lowered = char.toLowerCase();

    return lowered.length === char.length ? lowered : char;

}

/**
 * Compare two strings lexicographically, ignoring case.
 *
 * @returns negative when `a` sorts first, positive when `b` does, 0 when equal
 *
 * @example
 * ```typescript
 * compareCaseInsensitive('Hash', 'hash')     // 0
 * compareCaseInsensitive('Hash', 'Threads')  // < 0
 * compareCaseInsensitive('Book1', 'book')    // > 0
 * ```
 */
export function compareCaseInsensitive(a: string, b: string): number {

    const length = Math.min(a.length, b.length);

    for (let i = 0; i < length; i++) {

        const left = lower(a.charAt(i));
        const right = lower(b.charAt(i));

        if (left !== right) {

            return left < right ? -1 : 1;

        }

    }

    return a.length - b.length;

}

/**
 * Case-insensitive equality.
 *
 * @example
 * ```typescript
 * equalsCaseInsensitive('ThReAdS', 'threads') // true
 * equalsCaseInsensitive('Book', 'Book1')      // false
 * ```
 */
export function equalsCaseInsensitive(a: string, b: string): boolean {

    return a.length === b.length && compareCaseInsensitive(a, b) === 0;

}
