import { describe, expect, it } from '@jest/globals';
import { parseField } from '../src/field-parser.js';
import { ParseError } from '../src/errors.js';
import type { FieldRef } from '../src/types.js';
import { catchError } from './helpers.js';

function field(inner: string): FieldRef {
    return parseField({ kind: 'field', inner, rawSpan: `{${inner}}`, position: 0 });
}

describe('parseField', () => {
    it('parses attributes, indexes, conversion and format-spec', () => {
        const ref = field('a.b[0][key]!r:>10');
        expect(ref.keyPath).toEqual(['a', 'b', 0, 'key']);
        expect(ref.conversion).toBe('r');
        expect(ref.formatSpec).toBe('>10');
        expect(ref.spec).toMatchObject({ align: '>', width: 10 });
        expect(ref.rawSpan).toBe('{a.b[0][key]!r:>10}');
        expect(ref.autoNumbered).toBe(false);
    });

    it('extracts an inline default and drops it from the key-path', () => {
        const ref = field('x._[~unknown~]:.2f');
        expect(ref.keyPath).toEqual(['x']);
        expect(ref.inlineDefault).toBe('~unknown~');
        expect(ref.formatSpec).toBe('.2f');
    });

    it('takes the default literal verbatim, separators included', () => {
        expect(field('x._[a:b.c]').inlineDefault).toBe('a:b.c');
        expect(field('x.y._[N/A]').inlineDefault).toBe('N/A');
    });

    it('does not treat a non-trailing default shape as a default', () => {
        const ref = field('x._[0].y');
        expect(ref.keyPath).toEqual(['x', '_', 0, 'y']);
        expect(ref.inlineDefault).toBeUndefined();
    });

    it('extracts an inline constraint', () => {
        const ref = field('id._/\\d+/');
        expect(ref.keyPath).toEqual(['id']);
        expect(ref.inlineConstraint).toBe('\\d+');
    });

    it('unescapes slashes inside a constraint', () => {
        expect(field('p._/a\\/b/').inlineConstraint).toBe('a/b');
    });

    it('accepts a default and a constraint in either order', () => {
        for (const inner of ['n._[0]._/\\d+/:d', 'n._/\\d+/._[0]:d']) {
            const ref = field(inner);
            expect(ref.keyPath).toEqual(['n']);
            expect(ref.inlineDefault).toBe('0');
            expect(ref.inlineConstraint).toBe('\\d+');
            expect(ref.formatSpec).toBe('d');
        }
    });

    it('marks empty field names as auto-numbered', () => {
        expect(field('')).toMatchObject({ keyPath: [], autoNumbered: true });
        expect(field(':>4')).toMatchObject({ keyPath: [], autoNumbered: true, formatSpec: '>4' });
    });

    it('reads a leading number as a positional index', () => {
        expect(field('0.name').keyPath).toEqual([0, 'name']);
    });

    describe('errors', () => {
        const cases: Array<[string, string]> = [
            ['._[x]', 'EmptyKeyPath'],
            ['[0]', 'EmptyKeyPath'],
            ['a..b', 'MalformedKeyPath'],
            ['a.', 'MalformedKeyPath'],
            ['a[0]b', 'MalformedKeyPath'],
            ['a[0', 'MalformedKeyPath'],
            ['a[]', 'MalformedKeyPath'],
            ['a._/x/.b', 'MalformedKeyPath'],
            ['a._/x', 'MalformedKeyPath'],
            ['a!x', 'InvalidConversion'],
            ['a!rr', 'InvalidConversion'],
            ['a!', 'InvalidConversion'],
            ['a:zz', 'InvalidFormatSpec'],
            ['a._/(/', 'InvalidConstraint'],
            ['a._/(?<pf_0>\\d+)/', 'InvalidConstraint'],
            ['a._/(\\w)\\1/', 'InvalidConstraint'],
            ['a._/\\k<x>/', 'InvalidConstraint']
        ];

        it.each(cases)('rejects {%s} with %s', (inner, kind) => {
            const error = catchError(() => field(inner));
            expect(error).toBeInstanceOf(ParseError);
            expect(error).toMatchObject({ kind });
        });

        it('names the group reference a constraint must not contain', () => {
            expect(() => field('a._/(?<id>\\d+)/')).toThrow('constraint must not contain a named group (at 0)');
            expect(() => field('a._/(\\w)-\\1/')).toThrow('constraint must not contain a back-reference (at 5)');
        });

        it('allows lookbehinds and escapes inside classes', () => {
            expect(field('a._/(?<!-)\\d+/').inlineConstraint).toBe('(?<!-)\\d+');
            expect(field('a._/[\\1-9]+/').inlineConstraint).toBe('[\\1-9]+');
        });
    });
});
