/**
 * @file Node Name Helpers
 *
 * Case-insensitive comparison, the casing policy, path splitting and
 * presentation formatting for node names.
 *
 * @module
 */

import type { NameCasing, NameOrigin } from './types.js';

/** Container entry holding the archive's version signature. */
export const SIGNATURE_NAME: string = '.vdf-signature';

/** Names no node may take: the signature entry and the object prototype key. */
const RESERVED_NAMES: ReadonlySet<string> = new Set([SIGNATURE_NAME, '__proto__']);

/** Internal paths that address the archive root. */
const ROOT_ALIASES: ReadonlySet<string> = new Set(['', '.', '/', '\\', './', '.\\']);

/**
 * Case-insensitive name equality.
 */
export function name_equals(a: string, b: string): boolean {
    return a.toLowerCase() === b.toLowerCase();
}

/**
 * Case-insensitive substring test used by wildcard operations.
 */
export function name_contains(name: string, filter: string): boolean {
    return name.toLowerCase().includes(filter.toLowerCase());
}

/**
 * Apply the casing policy to a name about to be stored.
 */
export function name_apply(name: string, casing: NameCasing, origin: NameOrigin): string {
    switch (casing) {
        case 'upper':
            return name.toUpperCase();
        case 'preserve':
            return name;
        case 'archive':
            return origin === 'file' ? name.toUpperCase() : name;
    }
}

/**
 * Title-case a name for display: the first cased character of every run of
 * letters is upper-cased, the rest lower-cased (`FILE.TXT` → `File.Txt`).
 */
export function name_titleCase(name: string): string {
    let result: string = '';
    let previousCased: boolean = false;
    for (const ch of name) {
        const lower: string = ch.toLowerCase();
        const upper: string = ch.toUpperCase();
        const cased: boolean = lower !== upper;
        result += cased ? (previousCased ? lower : upper) : ch;
        previousCased = cased;
    }
    return result;
}

/**
 * Split an internal path on `/` or `\`, dropping empty and `.` segments.
 *
 * @param path - Internal path, or pre-split segments.
 * @returns Ordered segment names.
 */
export function pathSegments_split(path: string | readonly string[]): string[] {
    const raw: readonly string[] = typeof path === 'string' ? path.split(/[\\/]/) : path;
    return raw.filter((seg: string): boolean => seg !== '' && seg !== '.');
}

/**
 * True when the internal path means "the archive root".
 */
export function pathRoot_check(path: string | undefined): boolean {
    return path === undefined || ROOT_ALIASES.has(path);
}

/**
 * True when a name carries a path separator, is a relative-directory alias
 * or is reserved, i.e. cannot be used as a single node or host file name.
 */
export function nameUnsafe_check(name: string): boolean {
    return name === '' || name === '.' || name === '..' || RESERVED_NAMES.has(name) || /[\\/]/.test(name);
}
