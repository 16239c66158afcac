import { describe, it, expect } from 'vitest';
import {
    DefaultPatternFor,
    DescribePattern,
    Expand,
    FindUnknownPlaceholders,
    FormatSequence,
} from '../src/Tagging/TagPatternEngine.js';
import { CreateTypeCodeLookup, FallbackTypeCode } from '../src/Tagging/TypeCodes.js';
import { ValidationError } from '../src/Common/Errors.js';

describe('TagPatternEngine', () => {
    describe('Expand', () => {
        it('should substitute area, type code and padded sequence', () => {
            expect(Expand('{AREA}-{TYPE}-{SEQ:000}', { equipmentType: 'Pump', area: 'A01' }, 1)).toBe('A01-P-001');
        });

        it('should emit an unpadded sequence for plain {SEQ}', () => {
            expect(Expand('X{SEQ}', { equipmentType: 'Tank' }, 42)).toBe('X42');
        });

        it('should pad to the mask length whatever the mask digits are', () => {
            expect(Expand('P-{SEQ:001}', { equipmentType: 'Pump' }, 10)).toBe('P-010');
            expect(Expand('P-{SEQ:####}', { equipmentType: 'Pump' }, 7)).toBe('P-0007');
        });

        it('should never truncate numbers wider than the mask', () => {
            expect(Expand('{SEQ:00}', { equipmentType: 'Pump' }, 1234)).toBe('1234');
        });

        it('should expand every sequence occurrence', () => {
            expect(Expand('{SEQ}/{SEQ:000}', { equipmentType: 'Pump' }, 5)).toBe('5/005');
        });

        it('should use 00 for an empty or missing area', () => {
            expect(Expand('={AREA}', { equipmentType: 'Pump', area: '' }, 1)).toBe('=00');
            expect(Expand('={AREA}', { equipmentType: 'Pump' }, 1)).toBe('=00');
        });

        it('should keep unknown and lowercase placeholders verbatim', () => {
            expect(Expand('{TYPE}-{UNIT}-{seq}', { equipmentType: 'Pump' }, 1)).toBe('P-{UNIT}-{seq}');
        });

        it('should not re-scan substituted values', () => {
            expect(Expand('{AREA}-{SEQ}', { equipmentType: 'Pump', area: '{SEQ}' }, 5)).toBe('{SEQ}-5');
        });

        it('should put the sign of negative numbers before the padding', () => {
            expect(Expand('{SEQ:000}', { equipmentType: 'Pump' }, -7)).toBe('-007');
            expect(Expand('{SEQ:000}', { equipmentType: 'Pump' }, 0)).toBe('000');
        });

        it('should use a supplied type code lookup', () => {
            const typeCodes = CreateTypeCodeLookup([{ name: 'Pump', code: 'PMP' }]);
            expect(Expand('{TYPE}', { equipmentType: 'pump', typeCodes }, 1)).toBe('PMP');
        });

        it('should reject non-integer sequence numbers', () => {
            expect(() => Expand('{SEQ}', { equipmentType: 'Pump' }, 1.5)).toThrow(ValidationError);
        });
    });

    describe('type codes', () => {
        it('should resolve built-in types case-insensitively', () => {
            const lookup = CreateTypeCodeLookup();
            expect(lookup('heat exchanger')).toBe('HX');
            expect(lookup(' Valve ')).toBe('VLV');
        });

        it('should fall back to the first three letters uppercased', () => {
            expect(FallbackTypeCode('Agitator')).toBe('AGI');
            expect(FallbackTypeCode('hx')).toBe('HX');
            expect(CreateTypeCodeLookup()('Unknown')).toBe('UNK');
        });
    });

    describe('helpers', () => {
        it('should list unknown placeholders once, in order', () => {
            expect(FindUnknownPlaceholders('{TYPE}-{UNIT}-{SEQ:abc}-{UNIT}')).toEqual(['{UNIT}', '{SEQ:abc}']);
            expect(FindUnknownPlaceholders('{AREA}-{TYPE}-{SEQ:000}')).toEqual([]);
        });

        it('should describe a pattern with sample values', () => {
            expect(DescribePattern('{AREA}/{TYPE}-{SEQ:000}')).toBe('A01/PMP-001');
            expect(DescribePattern('   ')).toBe('');
        });

        it('should format sequences', () => {
            expect(FormatSequence(7, 3)).toBe('007');
            expect(FormatSequence(12345, 3)).toBe('12345');
        });

        it('should offer a default pattern per tagging mode', () => {
            expect(DefaultPatternFor('KKS')).toBe('={AREA}-{TYPE}-{SEQ:000}');
            expect(DefaultPatternFor('Custom')).toBe('{TYPE}-{SEQ:001}');
        });
    });
});
