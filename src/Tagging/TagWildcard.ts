/**
 * Operator wildcard over tags: `*` matches any run of characters. Matching is anchored and case-insensitive.
 */

const REGEX_SPECIALS = /[.*+?^${}()|[\]\\]/g;

function EscapeRegex(text: string): string {
    return text.replace(REGEX_SPECIALS, `\\$&`);
}

/**
 * Compiles a wildcard to an anchored regular expression.
 * @example
 * CompileTagWildcard('P-1*').test('p-100'); // true
 * CompileTagWildcard('P-1*').test('XP-100'); // false
 */
export function CompileTagWildcard(wildcard: string): RegExp {
    const body = wildcard.split(`*`).map(EscapeRegex).join(`.*`);
    return new RegExp(`^${body}$`, `i`);
}
