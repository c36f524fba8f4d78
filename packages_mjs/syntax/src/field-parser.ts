import { ParseError } from './errors.js';
import { parseFormatSpec } from './format-spec.js';
import type { FieldToken } from './tokenizer.js';
import type { Conversion, FieldRef, KeyComponent } from './types.js';

/** Attribute name that introduces an inline default: `{x._[default]}` */
export const DEFAULT_ATTR = '_';

/** Opening of an inline constraint component: `{x._/pattern/}` */
export const CONSTRAINT_OPEN = '_/';

type PathPart =
    | { type: 'attr'; text: string }
    | { type: 'index'; text: string }
    | { type: 'constraint'; text: string; offset: number };

type ConstraintPart = Extract<PathPart, { type: 'constraint' }>;

interface SplitField {
    fieldName: string;
    conversion?: string;
    formatSpec?: string;
}

const DIGITS = /^\d+$/;

function toComponent(text: string): KeyComponent {
    return DIGITS.test(text) ? Number(text) : text;
}

function isConversion(value: string): value is Conversion {
    return value === 's' || value === 'r' || value === 'a';
}

/**
 * Splits `keypath[!conversion][:formatspec]`, skipping over index and
 * constraint bodies in the key-path.
 */
function splitField(inner: string, base: number): SplitField {
    let i = 0;
    while (i < inner.length) {
        const char = inner[i];
        if (char === '[') {
            const close = inner.indexOf(']', i + 1);
            i = close === -1 ? inner.length : close + 1;
            continue;
        }
        if (char === '_' && inner[i - 1] === '.' && inner[i + 1] === '/') {
            i = findConstraintEnd(inner, i + 2, base) + 1;
            continue;
        }
        if (char === '!' || char === ':') break;
        i++;
    }

    const fieldName = inner.slice(0, i);
    if (i >= inner.length) return { fieldName };

    if (inner[i] === ':') {
        return { fieldName, formatSpec: inner.slice(i + 1) };
    }

    // '!' conversion: exactly one character, then ':' or the end
    const conversion = inner.slice(i + 1, i + 2);
    const after = inner.slice(i + 2);
    if (!conversion || (after && !after.startsWith(':'))) {
        throw new ParseError('InvalidConversion', base + i, "expected one character and then ':' after '!'");
    }
    return {
        fieldName,
        conversion,
        formatSpec: after ? after.slice(1) : undefined
    };
}

function findConstraintEnd(text: string, from: number, base: number): number {
    let i = from;
    while (i < text.length) {
        if (text[i] === '\\') {
            i += 2;
            continue;
        }
        if (text[i] === '/') return i;
        i++;
    }
    throw new ParseError('MalformedKeyPath', base + from, "unterminated constraint, expected closing '/'");
}

function unescapeConstraint(body: string): string {
    return body.replace(/\\\//g, '/');
}

/**
 * Splits a field name into its first key and trailing attribute, index and
 * constraint parts.
 */
function splitPath(fieldName: string, base: number): { first: string; parts: PathPart[] } {
    let i = 0;
    while (i < fieldName.length && fieldName[i] !== '.' && fieldName[i] !== '[') i++;
    const first = fieldName.slice(0, i);
    const parts: PathPart[] = [];

    while (i < fieldName.length) {
        const char = fieldName[i];

        if (char === '.') {
            if (fieldName.startsWith(CONSTRAINT_OPEN, i + 1)) {
                const from = i + 1 + CONSTRAINT_OPEN.length;
                const end = findConstraintEnd(fieldName, from, base);
                parts.push({
                    type: 'constraint',
                    text: unescapeConstraint(fieldName.slice(from, end)),
                    offset: base + i
                });
                i = end + 1;
                continue;
            }
            let j = i + 1;
            while (j < fieldName.length && fieldName[j] !== '.' && fieldName[j] !== '[') j++;
            const name = fieldName.slice(i + 1, j);
            if (!name) {
                throw new ParseError('MalformedKeyPath', base + i, "empty attribute after '.'");
            }
            parts.push({ type: 'attr', text: name });
            i = j;
        } else if (char === '[') {
            const close = fieldName.indexOf(']', i + 1);
            if (close === -1) {
                throw new ParseError('MalformedKeyPath', base + i, "missing ']' in key-path");
            }
            const key = fieldName.slice(i + 1, close);
            if (!key) {
                throw new ParseError('MalformedKeyPath', base + i, "empty index '[]'");
            }
            parts.push({ type: 'index', text: key });
            i = close + 1;
        } else {
            throw new ParseError('MalformedKeyPath', base + i, "expected '.' or '[' after ']'");
        }
    }

    return { first, parts };
}

/**
 * Removes trailing `._[default]` and `._/pattern/` parts, in either order.
 */
function extractEncodings(parts: PathPart[]): { inlineDefault?: string; inlineConstraint?: ConstraintPart } {
    let inlineDefault: string | undefined;
    let inlineConstraint: ConstraintPart | undefined;

    for (let pass = 0; pass < 2; pass++) {
        const last = parts[parts.length - 1];
        const prev = parts[parts.length - 2];

        if (last?.type === 'constraint' && inlineConstraint === undefined) {
            inlineConstraint = last;
            parts.pop();
        } else if (
            last?.type === 'index' &&
            prev?.type === 'attr' &&
            prev.text === DEFAULT_ATTR &&
            inlineDefault === undefined
        ) {
            inlineDefault = last.text;
            parts.splice(-2, 2);
        } else {
            break;
        }
    }

    return { inlineDefault, inlineConstraint };
}

/**
 * Finds a named group or back-reference in a constraint body. Those would
 * clash with the groups the reverse matcher wraps around each field.
 */
function findGroupReference(pattern: string): { index: number; what: string } | undefined {
    let inClass = false;
    for (let i = 0; i < pattern.length; i++) {
        const char = pattern[i];
        if (char === '\\') {
            const next = pattern[i + 1] ?? '';
            if (!inClass && (/[1-9]/.test(next) || next === 'k')) {
                return { index: i, what: 'a back-reference' };
            }
            i++;
        } else if (inClass) {
            if (char === ']') inClass = false;
        } else if (char === '[') {
            inClass = true;
        } else if (char === '(' && pattern.startsWith('?<', i + 1) && !/[=!]/.test(pattern[i + 3] ?? '')) {
            return { index: i, what: 'a named group' };
        }
    }
    return undefined;
}

/**
 * Parses the inside of one field span into a descriptor.
 * Auto-numbered fields (`{}`, `{:spec}`) come back with an empty key-path;
 * the template parser assigns their index.
 */
export function parseField(token: FieldToken): FieldRef {
    const base = token.position + 1;
    const split = splitField(token.inner, base);
    const { first, parts } = splitPath(split.fieldName, base);
    const { inlineDefault, inlineConstraint } = extractEncodings(parts);

    const stray = parts.find((part) => part.type === 'constraint');
    if (stray?.type === 'constraint') {
        throw new ParseError('MalformedKeyPath', stray.offset, 'a constraint must be the last key-path component');
    }

    const autoNumbered = split.fieldName === '';
    if (!first && !autoNumbered) {
        throw new ParseError('EmptyKeyPath', token.position, `no key before '${split.fieldName}'`);
    }

    if (inlineConstraint) {
        try {
            new RegExp(inlineConstraint.text);
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new ParseError('InvalidConstraint', inlineConstraint.offset, reason);
        }
        const reference = findGroupReference(inlineConstraint.text);
        if (reference) {
            throw new ParseError(
                'InvalidConstraint',
                inlineConstraint.offset,
                `constraint must not contain ${reference.what} (at ${reference.index})`
            );
        }
    }

    let conversion: Conversion | undefined;
    if (split.conversion !== undefined) {
        if (!isConversion(split.conversion)) {
            throw new ParseError('InvalidConversion', token.position, `unknown conversion '!${split.conversion}'`);
        }
        conversion = split.conversion;
    }

    const spec = split.formatSpec ? parseFormatSpec(split.formatSpec) : undefined;
    if (split.formatSpec && !spec) {
        throw new ParseError('InvalidFormatSpec', token.position, `invalid format-spec '${split.formatSpec}'`);
    }

    const keyPath: KeyComponent[] = autoNumbered
        ? []
        : [toComponent(first), ...parts.map((part) => (part.type === 'attr' ? part.text : toComponent(part.text)))];

    return {
        kind: 'field',
        keyPath,
        conversion,
        formatSpec: split.formatSpec || undefined,
        spec,
        inlineDefault,
        inlineConstraint: inlineConstraint?.text,
        rawSpan: token.rawSpan,
        position: token.position,
        autoNumbered
    };
}
