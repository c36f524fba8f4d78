export class PartialFormatError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'PartialFormatError';
    }
}

export type ParseErrorKind =
    | 'UnbalancedBrace'
    | 'EmptyKeyPath'
    | 'MalformedKeyPath'
    | 'InvalidConversion'
    | 'InvalidFormatSpec'
    | 'InvalidConstraint'
    | 'MixedNumbering';

export class ParseError extends PartialFormatError {
    constructor(
        public kind: ParseErrorKind,
        public position: number,
        detail: string
    ) {
        super(`${kind} at position ${position}: ${detail}`);
        this.name = 'ParseError';
    }
}
