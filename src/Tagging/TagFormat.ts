/**
 * Tag format rules per tagging mode.
 *
 * Custom: `[Prefix]-[Area]-[Type]-[Sequence]`, e.g. `P-100-PMP-001`.
 * KKS: `+[Function] [Location] [Equipment]`, e.g. `+LAA 10 CP001`.
 */

import type { TaggingMode } from '../Domain/index.js';

export interface TagFormatResult {
    valid: boolean;
    errors: string[];
}

function Invalid(message: string): TagFormatResult {
    return { valid: false, errors: [message] };
}

function ValidateCustomFormat(tag: string): TagFormatResult {
    if (tag.length < 3 || tag.length > 50) {
        return Invalid(`Tag length must be between 3 and 50 characters`);
    }
    if (tag.includes(` `)) {
        return Invalid(`Custom tags should not contain spaces`);
    }
    return { valid: true, errors: [] };
}

function ValidateKksFormat(tag: string): TagFormatResult {
    if (!tag.startsWith(`+`)) {
        return Invalid(`KKS tag must start with '+'`);
    }

    const parts = tag.split(` `).filter(part => {
        return part.length > 0;
    });

    if (parts.length !== 3) {
        return Invalid(`KKS tag must have format: +[Function] [Location] [Equipment]`);
    }
    const [functionKey, locationKey, equipmentKey] = parts;

    if (functionKey.length < 3 || functionKey.length > 4) {
        return Invalid(`KKS function key must be 2-3 characters after '+'`);
    }
    if (!/^\d{2}$/.test(locationKey)) {
        return Invalid(`KKS location key must be 2 digits`);
    }
    if (equipmentKey.length < 5) {
        return Invalid(`KKS equipment identifier must be at least 5 characters`);
    }
    return { valid: true, errors: [] };
}

/**
 * Checks a tag against the rules of a tagging mode. Stops at the first violation.
 * @example
 * ValidateTagFormat('+LAA 10 CP001', 'KKS'); // { valid: true, errors: [] }
 * ValidateTagFormat('P 01', 'Custom'); // { valid: false, errors: ['Custom tags should not contain spaces'] }
 */
export function ValidateTagFormat(tag: string, mode: TaggingMode): TagFormatResult {
    if (tag.trim().length === 0) {
        return Invalid(`Tag number cannot be empty`);
    }
    return mode === `KKS` ? ValidateKksFormat(tag) : ValidateCustomFormat(tag);
}
