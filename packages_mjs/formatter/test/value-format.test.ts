import { describe, expect, it } from '@jest/globals';
import { parseFormatSpec, type Conversion, type FormatSpec } from '@partial-format/syntax';
import { formatDefaultLiteral, formatValue, toPlainString } from '../src/value-format.js';

function spec(text: string): FormatSpec | undefined {
    if (!text) return undefined;
    const parsed = parseFormatSpec(text);
    if (!parsed) throw new Error(`invalid spec ${text}`);
    return parsed;
}

function fmt(value: unknown, text: string, conversion?: Conversion): string {
    const result = formatValue(value, spec(text), conversion);
    if (!result.ok) throw new Error(result.reason);
    return result.text;
}

describe('formatValue', () => {
    describe('numbers', () => {
        const cases: Array<[unknown, string, string]> = [
            [3, '.2f', '3.00'],
            [1 / 3, '.2f', '0.33'],
            [42, '', '42'],
            [42, '05d', '00042'],
            [-42, '05d', '-0042'],
            [2, '+d', '+2'],
            [1234567, ',', '1,234,567'],
            [1234567n, ',d', '1,234,567'],
            [255, '#x', '0xff'],
            [255, '#X', '0XFF'],
            [5, 'b', '101'],
            [65, 'c', 'A'],
            [0.5, '%', '50.000000%'],
            [0.125, '.1%', '12.5%'],
            [12345.678, 'e', '1.234568e+04'],
            [1234567, 'g', '1.23457e+06'],
            [0.0001, 'g', '0.0001'],
            [-0.5, '+.1f', '-0.5'],
            [1234.5, ',.2f', '1,234.50'],
            [3.14159, '>8.3f', '   3.142'],
            [7, '*<4', '7***'],
            [NaN, 'f', 'nan'],
            [-Infinity, 'F', '-INF'],
            [true, 'd', '1']
        ];

        it.each(cases)('%p with "%s" -> %p', (value, text, expected) => {
            expect(fmt(value, text)).toBe(expected);
        });

        it('expands large precisions digit by digit', () => {
            expect(fmt(1, '.120f')).toBe(`1.${'0'.repeat(120)}`);
            expect(fmt(0.5, '.101e')).toBe(`5.${'0'.repeat(101)}e-01`);
        });

        it('keeps fixed notation at and above 1e21', () => {
            expect(fmt(1e21, '.2f')).toBe('1000000000000000000000.00');
            expect(fmt(2 ** 70, '.0%')).toBe('118059162071741130342400%');
            expect(fmt(1e21, ',.0f')).toBe('1,000,000,000,000,000,000,000');
        });

        it('rounds exact ties to even', () => {
            expect(fmt(0.125, '.2f')).toBe('0.12');
            expect(fmt(0.375, '.2f')).toBe('0.38');
            expect(fmt(2.5, '.0f')).toBe('2');
            expect(fmt(2.5, '.0e')).toBe('2e+00');
        });

        it('reports oversized width and precision as a mismatch', () => {
            expect(formatValue(1, spec('.20000f'))).toEqual({
                ok: false,
                reason: 'precision 20000 exceeds 10000'
            });
            expect(formatValue('abc', spec('>20000'))).toEqual({
                ok: false,
                reason: 'width 20000 exceeds 10000'
            });
        });

        it('reports a mismatch for integer codes on fractions', () => {
            expect(formatValue(3.5, spec('d'))).toEqual({
                ok: false,
                reason: "unknown format code 'd' for a non-integer number"
            });
        });
    });

    describe('strings', () => {
        it('pads and aligns', () => {
            expect(fmt('abc', '>5')).toBe('  abc');
            expect(fmt('abc', '*^7')).toBe('**abc**');
            expect(fmt('abc', '5')).toBe('abc  ');
        });

        it('truncates to the precision', () => {
            expect(fmt('abcdef', '.3')).toBe('abc');
        });

        it('reports numeric codes as a mismatch', () => {
            expect(formatValue('abc', spec('.2f'))).toEqual({
                ok: false,
                reason: "unknown format code 'f' for a string"
            });
        });
    });

    describe('conversions', () => {
        it('applies the conversion before the format-spec', () => {
            expect(fmt('hi', '', 'r')).toBe("'hi'");
            expect(fmt('hi', '>6', 'r')).toBe("  'hi'");
            expect(fmt(12, '', 's')).toBe('12');
        });

        it('escapes non-ASCII characters for !a', () => {
            expect(fmt('é', '', 'a')).toBe("'\\xe9'");
        });
    });

    it('formats other values by their plain string form', () => {
        expect(fmt(true, '')).toBe('true');
        expect(fmt({ a: 1 }, '')).toBe('{"a":1}');
        expect(fmt([1, 2], '')).toBe('[1,2]');
        expect(fmt(null, '')).toBe('null');
        expect(fmt(new Date(Date.UTC(2024, 0, 2)), '')).toBe('2024-01-02T00:00:00.000Z');
    });
});

describe('toPlainString', () => {
    it('falls back to inspect for values JSON cannot encode', () => {
        const cyclic: Record<string, unknown> = {};
        cyclic.self = cyclic;
        expect(toPlainString(cyclic)).toBe('<ref *1> { self: [Circular *1] }');
    });
});

describe('formatDefaultLiteral', () => {
    const cases: Array<[string, string, string]> = [
        ['3', '.2f', '3.00'],
        ['~unknown~', '.2f', '~unknown~'],
        ['None', '.2f', 'None'],
        ['---', '.2f', '---'],
        ['3.5', 'd', '3.5'],
        ['7', '03d', '007'],
        ['1e3', ',.0f', '1,000'],
        ['inf', 'f', 'inf'],
        ['--', '>4', '  --'],
        ['abc', '.2', 'ab'],
        ['--', '', '--'],
        ['3', '.20000f', '3']
    ];

    it.each(cases)('%p with "%s" -> %p', (literal, text, expected) => {
        expect(formatDefaultLiteral(literal, spec(text))).toBe(expected);
    });
});
