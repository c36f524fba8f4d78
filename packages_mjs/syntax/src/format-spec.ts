export type Align = '<' | '>' | '=' | '^';
export type Sign = '+' | '-' | ' ';
export type Grouping = ',' | '_';
export type PresentationType =
    | 'b' | 'c' | 'd' | 'e' | 'E' | 'f' | 'F' | 'g' | 'G' | 'n' | 'o' | 's' | 'x' | 'X' | '%';

/**
 * Parsed form of `[[fill]align][sign][#][0][width][grouping][.precision][type]`.
 */
export interface FormatSpec {
    /** Explicit fill character; absent means space, or '0' with zero padding */
    fill?: string;
    align?: Align;
    sign?: Sign;
    alternate: boolean;
    zeroPad: boolean;
    width?: number;
    grouping?: Grouping;
    precision?: number;
    type?: PresentationType;
}

const SPEC_PATTERN =
    /^(?:(.)?([<>=^]))?([-+ ])?(#)?(0)?(\d+)?([,_])?(?:\.(\d+))?([bcdeEfFgGnosxX%])?$/s;

export const INTEGER_TYPES: ReadonlySet<PresentationType> = new Set<PresentationType>(['b', 'c', 'd', 'o', 'x', 'X']);

function isAlign(value: string): value is Align {
    return value === '<' || value === '>' || value === '=' || value === '^';
}

function isSign(value: string): value is Sign {
    return value === '+' || value === '-' || value === ' ';
}

function isGrouping(value: string): value is Grouping {
    return value === ',' || value === '_';
}

function isPresentationType(value: string): value is PresentationType {
    return 'bcdeEfFgGnosxX%'.includes(value) && value.length === 1;
}

/**
 * Parses a format-spec; returns undefined when the text does not fit the grammar.
 */
export function parseFormatSpec(text: string): FormatSpec | undefined {
    const match = SPEC_PATTERN.exec(text);
    if (!match) return undefined;

    const [, fill, align, sign, alternate, zero, width, grouping, precision, type] = match;

    return {
        fill,
        align: align !== undefined && isAlign(align) ? align : undefined,
        sign: sign !== undefined && isSign(sign) ? sign : undefined,
        alternate: alternate !== undefined,
        zeroPad: zero !== undefined,
        width: width !== undefined ? Number(width) : undefined,
        grouping: grouping !== undefined && isGrouping(grouping) ? grouping : undefined,
        precision: precision !== undefined ? Number(precision) : undefined,
        type: type !== undefined && isPresentationType(type) ? type : undefined
    };
}

/**
 * True when a format-spec only makes sense for a number: a numeric presentation
 * type, a sign, `#`, zero padding, grouping or `=` alignment.
 */
export function isNumericSpec(spec: FormatSpec): boolean {
    if (spec.type !== undefined) {
        return spec.type !== 's';
    }
    return spec.sign !== undefined
        || spec.alternate
        || spec.zeroPad
        || spec.grouping !== undefined
        || spec.align === '=';
}
