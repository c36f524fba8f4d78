import { ParseError } from './errors.js';

export interface LiteralToken {
    kind: 'literal';
    text: string;
}

export interface FieldToken {
    kind: 'field';
    /** Text between the braces */
    inner: string;
    rawSpan: string;
    position: number;
}

export type Token = LiteralToken | FieldToken;

/**
 * Finds the `}` closing the field opened at `start`.
 *
 * Until the first `!` or `:` the field is a key-path, where `[...]` index
 * bodies and `._/.../` constraint bodies are opaque. Constraint bodies honour
 * backslash escapes so they can carry `\/` and brace quantifiers.
 */
function findFieldEnd(template: string, start: number): number {
    let inBracket = false;
    let inConstraint = false;
    let inKeyPath = true;

    let i = start + 1;
    while (i < template.length) {
        const char = template[i];

        if (inConstraint) {
            if (char === '\\') {
                i += 2;
                continue;
            }
            if (char === '/') {
                inConstraint = false;
            }
        } else if (inBracket) {
            if (char === ']') {
                inBracket = false;
            }
        } else if (char === '}') {
            return i;
        } else if (char === '{') {
            throw new ParseError('UnbalancedBrace', i, "'{' inside a field");
        } else if (inKeyPath) {
            if (char === '!' || char === ':') {
                inKeyPath = false;
            } else if (char === '[') {
                inBracket = true;
            } else if (char === '_' && template[i - 1] === '.' && template[i + 1] === '/') {
                inConstraint = true;
                i += 2;
                continue;
            }
        }
        i++;
    }

    throw new ParseError('UnbalancedBrace', start, "'{' has no matching '}'");
}

export function tokenize(template: string): Token[] {
    const tokens: Token[] = [];
    let literal = '';

    const flush = () => {
        if (literal) {
            tokens.push({ kind: 'literal', text: literal });
            literal = '';
        }
    };

    let i = 0;
    while (i < template.length) {
        const char = template[i];

        if (char === '{') {
            if (template[i + 1] === '{') {
                literal += '{';
                i += 2;
                continue;
            }
            flush();
            const end = findFieldEnd(template, i);
            tokens.push({
                kind: 'field',
                inner: template.slice(i + 1, end),
                rawSpan: template.slice(i, end + 1),
                position: i
            });
            i = end + 1;
        } else if (char === '}') {
            if (template[i + 1] === '}') {
                literal += '}';
                i += 2;
                continue;
            }
            throw new ParseError('UnbalancedBrace', i, "single '}' outside a field");
        } else {
            literal += char;
            i++;
        }
    }

    flush();
    return tokens;
}
