import {
    getLogger,
    type FieldRef,
    type FormatSpec,
    type PresentationType,
    type Segment,
    type Template
} from '@partial-format/syntax';
import { PatternMismatchError } from './errors.js';

const logger = getLogger('reverse-match');

/** Capture for a field with no constraint: a run without path separators */
export const DEFAULT_CAPTURE = '[^/\\\\]+?';

const SIGN = '[-+ ]?';
const SPECIAL = 'nan|inf|NAN|INF';

const DIGITS: Partial<Record<PresentationType, string>> = {
    d: '\\d',
    b: '[01]',
    o: '[0-7]',
    x: '[0-9a-f]',
    X: '[0-9A-F]'
};

const BASE_PREFIX: Partial<Record<PresentationType, string>> = {
    b: '0b',
    o: '0o',
    x: '0x',
    X: '0X'
};

const FLOAT_TYPES = new Set<PresentationType>(['e', 'E', 'f', 'F', 'g', 'G', 'n', '%']);

function digitRun(digit: string, grouping: string | undefined): string {
    return grouping ? `${digit}+(?:${escapeRegExp(grouping)}${digit}+)*` : `${digit}+`;
}

/** Body of a number rendered with `spec`, without sign or padding */
function numberBody(spec: FormatSpec): string | undefined {
    const type = spec.type;
    if (type === undefined || type === 's' || type === 'c') return undefined;

    if (FLOAT_TYPES.has(type)) {
        const whole = digitRun('\\d', spec.grouping);
        const decimal = `(?:${whole}\\.?\\d*|\\.\\d+)(?:[eE][-+]?\\d+)?`;
        return `(?:${decimal}|${SPECIAL})${type === '%' ? '%' : ''}`;
    }

    const digit = DIGITS[type];
    if (digit === undefined) return undefined;
    const prefix = BASE_PREFIX[type];
    return `${prefix ? `(?:${prefix})?` : ''}${digitRun(digit, spec.grouping)}`;
}

export interface CompiledPattern {
    regex: RegExp;
    /** Regex source of each template segment, in order */
    parts: readonly string[];
    /** Named group -> primary key of the field it captures */
    groups: ReadonlyMap<string, string>;
}

export function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Pattern for one field around the named group `name`, or around a
 * back-reference to it when the field repeats. Padding from the
 * format-spec's width sits outside the group, except for `=` alignment
 * where it falls between the sign and the digits.
 */
function captureFor(field: FieldRef, name: string, repeat: boolean): string {
    const group = (pattern: string): string => (repeat ? `\\k<${name}>` : `(?<${name}>${pattern})`);

    if (field.inlineConstraint !== undefined) {
        return group(`(?:${field.inlineConstraint})`);
    }

    const spec = field.spec;
    const body = spec ? numberBody(spec) : undefined;
    const value = body ? SIGN + body : DEFAULT_CAPTURE;
    if (!spec || spec.width === undefined) return group(value);

    const fill = `${escapeRegExp(spec.fill ?? (spec.zeroPad ? '0' : ' '))}*`;
    const align = spec.align ?? (body ? (spec.zeroPad ? '=' : '>') : '<');

    switch (align) {
        case '<':
            return `${group(value)}${fill}`;
        case '>':
            return `${fill}${group(value)}`;
        case '^':
            return `${fill}${group(value)}${fill}`;
        case '=':
            return group(body ? `${SIGN}${fill}${body}` : `${fill}${value}`);
    }
}

/** Fields back-reference each other only when they would render identically */
function signature(field: FieldRef): string {
    return JSON.stringify([
        field.keyPath,
        field.conversion ?? null,
        field.formatSpec ?? null,
        field.inlineConstraint ?? null
    ]);
}

/**
 * Compiles a template into an anchored pattern with one named group per
 * distinct field. A field repeated with the same key-path, conversion and
 * format-spec must capture the same text each time. Adjacent fields with no
 * literal between them match ambiguously.
 */
export function compilePattern(template: Template): CompiledPattern {
    const groups = new Map<string, string>();
    const bySignature = new Map<string, string>();

    const parts = template.segments.map((segment) => {
        if (segment.kind === 'literal') return escapeRegExp(segment.text);

        const id = signature(segment);
        const existing = bySignature.get(id);
        if (existing) return captureFor(segment, existing, true);

        const name = `pf_${groups.size}`;
        groups.set(name, String(segment.keyPath[0]));
        bySignature.set(id, name);
        return captureFor(segment, name, false);
    });

    return {
        regex: new RegExp(`^${parts.join('')}$`),
        parts,
        groups
    };
}

function describe(segment: Segment): string {
    return segment.kind === 'literal'
        ? `literal ${JSON.stringify(segment.text)}`
        : `field ${segment.rawSpan}`;
}

/**
 * Finds the first segment the candidate cannot match. The position is where
 * the longest matching prefix that ends in a literal stops.
 */
function locateMismatch(template: Template, compiled: CompiledPattern, candidate: string): PatternMismatchError {
    let position = 0;
    let lastField: Segment | undefined;

    for (let k = 0; k < compiled.parts.length; k++) {
        const segment = template.segments[k];
        const prefix = new RegExp(`^${compiled.parts.slice(0, k + 1).join('')}`);
        const match = prefix.exec(candidate);
        if (!match) {
            return new PatternMismatchError(position, describe(segment), candidate);
        }
        if (segment.kind === 'literal') {
            position = match[0].length;
            lastField = undefined;
        } else {
            lastField = segment;
        }
    }

    return new PatternMismatchError(position, lastField ? describe(lastField) : 'end of input', candidate);
}

/**
 * Extracts field values from a formatted string. Keys are each field's
 * primary key; positional fields use their index as a decimal string. When
 * several fields share a primary key, the first one's capture is kept.
 */
export function matchTemplate(template: Template, candidate: string): Record<string, string> {
    const compiled = compilePattern(template);
    const match = compiled.regex.exec(candidate);

    if (!match) {
        const error = locateMismatch(template, compiled, candidate);
        logger.debug(error.message);
        throw error;
    }

    const captured = match.groups ?? {};
    const values = new Map<string, string>();
    for (const [name, key] of compiled.groups) {
        const text = captured[name];
        if (!values.has(key) && text !== undefined) values.set(key, text);
    }
    return Object.fromEntries(values);
}

export function matchesTemplate(template: Template, candidate: string): boolean {
    return compilePattern(template).regex.test(candidate);
}
