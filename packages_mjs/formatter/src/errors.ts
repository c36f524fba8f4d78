import { PartialFormatError } from '@partial-format/syntax';

export class PatternMismatchError extends PartialFormatError {
    constructor(
        public position: number,
        public expected: string,
        public candidate: string
    ) {
        super(`Candidate does not match template at position ${position}: expected ${expected}`);
        this.name = 'PatternMismatchError';
    }
}

export class ConstraintViolationError extends PartialFormatError {
    constructor(
        public field: string,
        public value: string,
        public pattern: string
    ) {
        super(`Value '${value}' for field ${field} does not match /${pattern}/`);
        this.name = 'ConstraintViolationError';
    }
}

export class InvalidOptionsError extends PartialFormatError {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidOptionsError';
    }
}
