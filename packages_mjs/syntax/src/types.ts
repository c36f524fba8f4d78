import type { FormatSpec } from './format-spec.js';

/**
 * One step of a field's key-path. Strings are attribute/key access,
 * numbers are index access. The first step is the lookup key: a string
 * names a binding, a number a positional argument.
 */
export type KeyComponent = string | number;

export type Conversion = 's' | 'r' | 'a';

export interface Literal {
    kind: 'literal';
    /** Text with `{{` and `}}` already collapsed */
    text: string;
}

export interface FieldRef {
    kind: 'field';
    keyPath: readonly KeyComponent[];
    conversion?: Conversion;
    /** Raw format-spec text after the `:` */
    formatSpec?: string;
    /** Parsed form of `formatSpec` */
    spec?: FormatSpec;
    /** Literal from a trailing `._[literal]` component */
    inlineDefault?: string;
    /** Regular-expression source from a trailing `._/pattern/` component */
    inlineConstraint?: string;
    /** Exact source text of the field, braces included */
    rawSpan: string;
    /** Offset of the opening brace in the template source */
    position: number;
    /** `{}` style field numbered at parse time */
    autoNumbered: boolean;
}

export type Segment = Literal | FieldRef;

export interface Template {
    readonly source: string;
    readonly segments: readonly Segment[];
}
