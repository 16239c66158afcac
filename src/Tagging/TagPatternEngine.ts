/**
 * Declarative tag pattern expansion.
 *
 * Recognized placeholders:
 * - `{TYPE}` – equipment type code
 * - `{AREA}` – area as-is, `00` when empty
 * - `{SEQ}` – sequence number without padding
 * - `{SEQ:<mask>}` – sequence number zero-padded to the mask length (mask of digits or `#`)
 *
 * Anything else in braces is left verbatim so a live preview shows the operator what was not understood.
 * The pattern is scanned once; substituted values are never re-scanned.
 */

import type { TaggingMode } from '../Domain/index.js';
import { ValidationError } from '../Common/Errors.js';
import { CreateTypeCodeLookup, type TypeCodeLookup } from './TypeCodes.js';

/** Values a pattern draws from for one item. */
export interface ExpansionContext {
    equipmentType: string;
    area?: string;
    /** Defaults to the built-in type table. */
    typeCodes?: TypeCodeLookup;
}

const PLACEHOLDER = /\{([A-Z]+)(?::([^{}]*))?\}/g;
const ANY_BRACED = /\{[^{}]*\}/g;
const SEQUENCE_MASK = /^[0-9#]+$/;
const DEFAULT_AREA = `00`;
const DEFAULT_LOOKUP = CreateTypeCodeLookup();

/** Sample values for `DescribePattern`. */
const SAMPLE_CONTEXT: ExpansionContext = {
    equipmentType: `Pump`,
    area: `A01`,
    typeCodes: () => {
        return `PMP`;
    },
};

/**
 * Zero-pads a sequence number. Wider numbers are emitted in full, never truncated.
 * The sign of a negative number precedes the padded magnitude.
 * @example
 * FormatSequence(7, 3); // '007'
 * FormatSequence(12345, 3); // '12345'
 * FormatSequence(-7, 3); // '-007'
 */
export function FormatSequence(sequenceNumber: number, width: number): string {
    const sign = sequenceNumber < 0 ? `-` : ``;
    return sign + String(Math.abs(sequenceNumber)).padStart(width, `0`);
}

function ResolvePlaceholder(name: string, argument: string | undefined, ctx: ExpansionContext, sequenceNumber: number): string | null {
    switch (name) {
        case `TYPE`:
            return argument === undefined ? (ctx.typeCodes ?? DEFAULT_LOOKUP)(ctx.equipmentType) : null;
        case `AREA`:
            return argument === undefined ? ctx.area || DEFAULT_AREA : null;
        case `SEQ`:
            if (argument === undefined) {
                return String(sequenceNumber);
            }
            return SEQUENCE_MASK.test(argument) ? FormatSequence(sequenceNumber, argument.length) : null;
        default:
            return null;
    }
}

/**
 * Expands a pattern for one item.
 * @param pattern string - Pattern such as `{AREA}-{TYPE}-{SEQ:000}`
 * @param ctx ExpansionContext - Type, area and type-code lookup of the item
 * @param sequenceNumber number - Integer sequence value (may be zero or negative)
 * @returns string - Expanded tag; unknown placeholders stay verbatim
 * @throws ValidationError if sequenceNumber is not a safe integer
 * @example
 * Expand('{AREA}-{TYPE}-{SEQ:000}', { equipmentType: 'Pump', area: 'A01' }, 1); // 'A01-P-001'
 */
export function Expand(pattern: string, ctx: ExpansionContext, sequenceNumber: number): string {
    if (!Number.isSafeInteger(sequenceNumber)) {
        throw new ValidationError(`Sequence number must be an integer`, { sequenceNumber });
    }
    return pattern.replace(PLACEHOLDER, (token: string, name: string, argument: string | undefined) => {
        return ResolvePlaceholder(name, argument, ctx, sequenceNumber) ?? token;
    });
}

/**
 * Lists braced tokens the engine will not substitute, in order of first appearance.
 * @example
 * FindUnknownPlaceholders('{TYPE}-{UNIT}-{SEQ:abc}'); // ['{UNIT}', '{SEQ:abc}']
 */
export function FindUnknownPlaceholders(pattern: string): string[] {
    const unknown: string[] = [];

    for (const token of pattern.match(ANY_BRACED) ?? []) {
        const expanded = Expand(token, SAMPLE_CONTEXT, 1);

        if (expanded === token && !unknown.includes(token)) {
            unknown.push(token);
        }
    }
    return unknown;
}

/**
 * Renders a pattern with sample values (type `PMP`, area `A01`, sequence 1) for a live example.
 * @example
 * DescribePattern('{TYPE}-{SEQ:000}'); // 'PMP-001'
 */
export function DescribePattern(pattern: string): string {
    const trimmed = pattern.trim();
    return trimmed ? Expand(trimmed, SAMPLE_CONTEXT, 1) : ``;
}

/** Default renumbering pattern for a project's tagging mode. */
export function DefaultPatternFor(mode: TaggingMode): string {
    return mode === `KKS` ? `={AREA}-{TYPE}-{SEQ:000}` : `{TYPE}-{SEQ:001}`;
}
