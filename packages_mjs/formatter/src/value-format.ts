import { inspect } from 'node:util';
import {
    INTEGER_TYPES,
    isNumericSpec,
    type Align,
    type Conversion,
    type FormatSpec
} from '@partial-format/syntax';

/**
 * Outcome of applying a format-spec to a value. A mismatch (e.g. `.2f` on a
 * string) is a result, not an exception; callers decide the fallback.
 */
export type FormatResult =
    | { ok: true; text: string }
    | { ok: false; reason: string };

const ok = (text: string): FormatResult => ({ ok: true, text });
const mismatch = (reason: string): FormatResult => ({ ok: false, reason });

const RADIX: Partial<Record<string, number>> = { b: 2, o: 8, x: 16, X: 16 };
const INTEGER_LITERAL = /^[-+]?\d+$/;
const FLOAT_LITERAL = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?$/;
const SPECIAL_LITERAL = /^([-+]?)(inf|infinity|nan)$/i;

function isPlainObject(value: unknown): value is Record<string, unknown> {
    if (value === null || typeof value !== 'object') return false;
    const proto = Object.getPrototypeOf(value);
    return proto === Object.prototype || proto === null;
}

/**
 * Plain string form of a value: strings as is, dates as ISO text, plain
 * objects and arrays as JSON.
 */
export function toPlainString(value: unknown): string {
    if (typeof value === 'string') return value;
    if (value instanceof Date) {
        return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
    }
    if (Array.isArray(value) || isPlainObject(value)) {
        try {
            return JSON.stringify(value);
        } catch {
            // cycles, bigints
            return inspect(value);
        }
    }
    return String(value);
}

function escapeNonAscii(text: string): string {
    return text.replace(/[^\x00-\x7f]/gu, (char) => {
        const code = char.codePointAt(0) ?? 0;
        if (code < 0x100) return `\\x${code.toString(16).padStart(2, '0')}`;
        if (code < 0x10000) return `\\u${code.toString(16).padStart(4, '0')}`;
        return `\\U${code.toString(16).padStart(8, '0')}`;
    });
}

export function convertValue(value: unknown, conversion: Conversion): string {
    switch (conversion) {
        case 's':
            return toPlainString(value);
        case 'r':
            return inspect(value);
        case 'a':
            return escapeNonAscii(inspect(value));
    }
}

function length(text: string): number {
    return Array.from(text).length;
}

function pad(body: string, spec: FormatSpec, defaultAlign: Align, prefix = ''): string {
    const width = spec.width ?? 0;
    const size = length(prefix) + length(body);
    if (size >= width) return prefix + body;

    const fill = spec.fill ?? (spec.zeroPad ? '0' : ' ');
    const align = spec.align ?? defaultAlign;
    const count = width - size;

    switch (align) {
        case '<':
            return prefix + body + fill.repeat(count);
        case '>':
            return fill.repeat(count) + prefix + body;
        case '^': {
            const left = Math.floor(count / 2);
            return fill.repeat(left) + prefix + body + fill.repeat(count - left);
        }
        case '=':
            return prefix + fill.repeat(count) + body;
    }
}

function group(digits: string, separator: string, size: number): string {
    let out = '';
    for (let end = digits.length; end > 0; end -= size) {
        const chunk = digits.slice(Math.max(0, end - size), end);
        out = out ? `${chunk}${separator}${out}` : chunk;
    }
    return out;
}

/** Groups the leading digit run of a formatted number */
function groupLeadingDigits(body: string, separator: string): string {
    const match = /^\d+/.exec(body);
    if (!match) return body;
    return group(match[0], separator, 3) + body.slice(match[0].length);
}

/** Limit on width and precision; larger values are a format mismatch */
export const MAX_SPEC_SIZE = 10_000;

/** Splits a finite non-negative double into `mantissa * 2 ** exponent` */
function decompose(value: number): { mantissa: bigint; exponent: number } {
    const view = new DataView(new ArrayBuffer(8));
    view.setFloat64(0, value);
    const bits = view.getBigUint64(0);
    const biased = Number((bits >> 52n) & 0x7ffn);
    const fraction = bits & 0xfffffffffffffn;
    return biased === 0
        ? { mantissa: fraction, exponent: -1074 }
        : { mantissa: fraction | (1n << 52n), exponent: biased - 1075 };
}

/** `value * 10 ** shift` rounded half to even, computed exactly */
function scaledRound(value: number, shift: number): bigint {
    const { mantissa, exponent } = decompose(value);
    let numerator = exponent >= 0 ? mantissa << BigInt(exponent) : mantissa;
    let denominator = exponent >= 0 ? 1n : 1n << BigInt(-exponent);
    if (shift >= 0) numerator *= 10n ** BigInt(shift);
    else denominator *= 10n ** BigInt(-shift);

    const quotient = numerator / denominator;
    const twice = (numerator % denominator) * 2n;
    if (twice > denominator || (twice === denominator && quotient % 2n === 1n)) {
        return quotient + 1n;
    }
    return quotient;
}

function fixed(value: number, precision: number): string {
    const digits = scaledRound(value, precision).toString().padStart(precision + 1, '0');
    if (precision === 0) return digits;
    return `${digits.slice(0, -precision)}.${digits.slice(-precision)}`;
}

/** `precision + 1` significant digits and the decimal exponent of the first */
function scientific(value: number, precision: number): { digits: string; exponent: number } {
    if (value === 0) return { digits: '0'.repeat(precision + 1), exponent: 0 };

    const lower = 10n ** BigInt(precision);
    const upper = lower * 10n;
    let exponent = Math.floor(Math.log10(value));
    for (;;) {
        const scaled = scaledRound(value, precision - exponent);
        if (scaled >= upper) exponent++;
        else if (scaled < lower) exponent--;
        else return { digits: scaled.toString(), exponent };
    }
}

function exponential(value: number, precision: number, alternate: boolean): string {
    const { digits, exponent } = scientific(value, precision);
    const mantissa = precision > 0 ? `${digits[0]}.${digits.slice(1)}` : digits;
    const point = alternate && precision === 0 ? '.' : '';
    const expSign = exponent < 0 ? '-' : '+';
    return `${mantissa}${point}e${expSign}${String(Math.abs(exponent)).padStart(2, '0')}`;
}

function stripZeros(text: string): string {
    const [mantissa, exponent] = text.split('e');
    const stripped = mantissa.includes('.') ? mantissa.replace(/\.?0+$/, '') : mantissa;
    return exponent !== undefined ? `${stripped}e${exponent}` : stripped;
}

function general(value: number, precision: number, alternate: boolean): string {
    const digits = precision === 0 ? 1 : precision;
    const exponent = scientific(value, digits - 1).exponent;
    const text = exponent >= -4 && exponent < digits
        ? fixed(value, digits - 1 - exponent)
        : exponential(value, digits - 1, false);
    return alternate ? text : stripZeros(text);
}

function checkSize(spec: FormatSpec): FormatResult | undefined {
    if ((spec.width ?? 0) > MAX_SPEC_SIZE) {
        return mismatch(`width ${spec.width} exceeds ${MAX_SPEC_SIZE}`);
    }
    if ((spec.precision ?? 0) > MAX_SPEC_SIZE) {
        return mismatch(`precision ${spec.precision} exceeds ${MAX_SPEC_SIZE}`);
    }
    return undefined;
}

function formatString(text: string, spec: FormatSpec): FormatResult {
    const oversized = checkSize(spec);
    if (oversized) return oversized;
    if (spec.type !== undefined && spec.type !== 's') {
        return mismatch(`unknown format code '${spec.type}' for a string`);
    }
    if (spec.sign !== undefined || spec.alternate || spec.grouping !== undefined || spec.align === '=') {
        return mismatch('sign, #, grouping and = alignment are not allowed for a string');
    }
    const body = spec.precision !== undefined
        ? Array.from(text).slice(0, spec.precision).join('')
        : text;
    return ok(pad(body, spec, '<'));
}

function formatInteger(value: bigint, spec: FormatSpec): FormatResult {
    const type = spec.type ?? 'd';
    if (spec.precision !== undefined) {
        return mismatch('precision is not allowed for an integer presentation');
    }

    if (type === 'c') {
        const code = Number(value);
        if (code < 0 || code > 0x10ffff) return mismatch(`${value} is out of the character range`);
        return ok(pad(String.fromCodePoint(code), spec, '>'));
    }

    const radix = RADIX[type] ?? 10;
    if (spec.grouping === ',' && radix !== 10) {
        return mismatch(`cannot use ',' with '${type}'`);
    }

    const negative = value < 0n;
    let digits = (negative ? -value : value).toString(radix);
    if (type === 'X') digits = digits.toUpperCase();
    if (spec.grouping) digits = group(digits, spec.grouping, radix === 10 ? 3 : 4);

    const base = spec.alternate && radix !== 10 ? `0${type}` : '';
    return ok(pad(digits, spec, spec.zeroPad ? '=' : '>', signOf(negative, spec) + base));
}

function formatFloat(value: number, spec: FormatSpec): FormatResult {
    const type = spec.type;
    const negative = value < 0 || Object.is(value, -0);
    const abs = Math.abs(value);
    const upper = type === 'E' || type === 'F' || type === 'G';

    let body: string;
    if (!Number.isFinite(abs)) {
        body = Number.isNaN(abs) ? 'nan' : 'inf';
        if (upper) body = body.toUpperCase();
        if (type === '%') body += '%';
    } else {
        const precision = spec.precision ?? 6;
        switch (type) {
            case 'f':
            case 'F':
                body = fixed(abs, precision);
                if (spec.alternate && precision === 0) body += '.';
                break;
            case 'e':
            case 'E':
                body = exponential(abs, precision, spec.alternate);
                break;
            case 'g':
            case 'G':
            case 'n':
                body = general(abs, precision, spec.alternate);
                break;
            case '%':
                body = `${fixed(abs * 100, precision)}%`;
                break;
            default:
                body = spec.precision !== undefined
                    ? general(abs, spec.precision, spec.alternate)
                    : String(abs);
        }
        if (upper) body = body.toUpperCase();
        if (spec.grouping) body = groupLeadingDigits(body, spec.grouping);
    }

    return ok(pad(body, spec, spec.zeroPad ? '=' : '>', signOf(negative, spec)));
}

function signOf(negative: boolean, spec: FormatSpec): string {
    if (negative) return '-';
    if (spec.sign === '+') return '+';
    if (spec.sign === ' ') return ' ';
    return '';
}

function formatNumber(value: number | bigint, spec: FormatSpec): FormatResult {
    const oversized = checkSize(spec);
    if (oversized) return oversized;
    if (spec.type === 's') {
        return mismatch(`unknown format code 's' for a ${typeof value}`);
    }

    const integral = typeof value === 'bigint' || Number.isInteger(value);
    const integerType = spec.type !== undefined && INTEGER_TYPES.has(spec.type);
    const integerLike = spec.type === undefined || spec.type === 'n'
        ? integral && spec.precision === undefined
        : integerType;

    if (integerType && !integral) {
        return mismatch(`unknown format code '${spec.type}' for a non-integer number`);
    }
    if (integerLike) {
        return formatInteger(typeof value === 'bigint' ? value : BigInt(value), spec);
    }
    return formatFloat(Number(value), spec);
}

/**
 * Applies a conversion flag and then a format-spec to a resolved value.
 */
export function formatValue(value: unknown, spec?: FormatSpec, conversion?: Conversion): FormatResult {
    const subject: unknown = conversion ? convertValue(value, conversion) : value;
    if (!spec) return ok(toPlainString(subject));

    if (typeof subject === 'string') return formatString(subject, spec);
    if (typeof subject === 'boolean') {
        return isNumericSpec(spec)
            ? formatNumber(subject ? 1 : 0, spec)
            : formatString(String(subject), spec);
    }
    if (typeof subject === 'number' || typeof subject === 'bigint') {
        return formatNumber(subject, spec);
    }
    if (isNumericSpec(spec)) {
        return mismatch(`cannot apply a numeric format-spec to ${toPlainString(subject)}`);
    }
    return formatString(toPlainString(subject), spec);
}

/**
 * Reads an inline default literal as the type the format-spec asks for:
 * a number for numeric specs, text otherwise.
 */
export function parseDefaultLiteral(literal: string, spec: FormatSpec): string | number | bigint | undefined {
    if (!isNumericSpec(spec)) return literal;

    const text = literal.trim();
    if (INTEGER_LITERAL.test(text)) {
        const n = Number(text);
        return Number.isSafeInteger(n) ? n : BigInt(text);
    }
    if (spec.type !== undefined && INTEGER_TYPES.has(spec.type)) return undefined;

    if (FLOAT_LITERAL.test(text)) return Number(text);
    const special = SPECIAL_LITERAL.exec(text);
    if (special) {
        const magnitude = special[2].toLowerCase() === 'nan' ? NaN : Infinity;
        return special[1] === '-' ? -magnitude : magnitude;
    }
    return undefined;
}

/**
 * Formats an inline default. Falls back to the raw literal when the literal
 * cannot satisfy the format-spec.
 */
export function formatDefaultLiteral(literal: string, spec?: FormatSpec): string {
    if (!spec) return literal;

    const subject = parseDefaultLiteral(literal, spec);
    if (subject === undefined) return literal;

    const result = typeof subject === 'string' ? formatString(subject, spec) : formatNumber(subject, spec);
    return result.ok ? result.text : literal;
}
