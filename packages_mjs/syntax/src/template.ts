import { ParseError } from './errors.js';
import { parseField } from './field-parser.js';
import { tokenize } from './tokenizer.js';
import type { FieldRef, Literal, Segment, Template } from './types.js';

/**
 * Parses a template into literal and field segments.
 *
 * `{}` fields are numbered 0, 1, 2... in order of appearance. A template may
 * use automatic or explicit (`{0}`) positional numbering, not both.
 */
export function parseTemplate(source: string): Template {
    const segments: Segment[] = [];
    let autoIndex = 0;
    let explicitAt: number | undefined;
    let autoAt: number | undefined;

    for (const token of tokenize(source)) {
        if (token.kind === 'literal') {
            const literal: Literal = { kind: 'literal', text: token.text };
            segments.push(Object.freeze(literal));
            continue;
        }

        let field = parseField(token);
        if (field.autoNumbered) {
            autoAt ??= field.position;
            field = { ...field, keyPath: [autoIndex++] };
        } else if (typeof field.keyPath[0] === 'number') {
            explicitAt ??= field.position;
        }

        if (autoAt !== undefined && explicitAt !== undefined) {
            throw new ParseError(
                'MixedNumbering',
                Math.max(autoAt, explicitAt),
                'cannot mix automatic {} and explicit {0} field numbering'
            );
        }

        segments.push(Object.freeze({ ...field, keyPath: Object.freeze([...field.keyPath]) }));
    }

    return Object.freeze({ source, segments: Object.freeze(segments) });
}

export function isField(segment: Segment): segment is FieldRef {
    return segment.kind === 'field';
}

/** Fields of a template, in order */
export function fieldsOf(template: Template): FieldRef[] {
    return template.segments.filter(isField);
}

/**
 * Distinct primary keys of a template in order of first appearance;
 * positional keys as decimal strings.
 */
export function fieldKeys(template: Template): string[] {
    const keys = new Set<string>();
    for (const field of fieldsOf(template)) {
        keys.add(String(field.keyPath[0]));
    }
    return [...keys];
}
