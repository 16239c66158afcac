/**
 * Sequence number discovery over existing tags.
 */

/**
 * Reads the number that follows a prefix, skipping separating `-` or `_`.
 * @returns number | null - Null when the tag does not carry the prefix or no digits follow it
 * @example
 * ExtractSequenceNumber('P-100-PMP-007', 'P-100-PMP'); // 7
 * ExtractSequenceNumber('P-100-PMP-A1', 'P-100-PMP'); // null
 */
export function ExtractSequenceNumber(tag: string, prefix: string): number | null {
    if (!tag.startsWith(prefix)) {
        return null;
    }
    const rest = tag.slice(prefix.length).replace(/^[-_]+/, ``);
    const digits = /^\d+/.exec(rest);
    return digits ? Number.parseInt(digits[0], 10) : null;
}

/**
 * Next free sequence number for a prefix: the highest number found plus one, or 1 when none is found.
 * @example
 * NextSequenceNumber(['PMP-001', 'PMP-004', 'TK-009'], 'PMP'); // 5
 */
export function NextSequenceNumber(existingTags: Iterable<string>, prefix: string): number {
    let highest = 0;

    for (const tag of existingTags) {
        const value = ExtractSequenceNumber(tag, prefix);

        if (value !== null && value > highest) {
            highest = value;
        }
    }
    return highest + 1;
}
