import { getLogger, type FieldRef } from '@partial-format/syntax';
import type { Mode, ResolvedOptions } from './config.js';
import { ConstraintViolationError } from './errors.js';
import { lookup, type Bindings } from './traversal.js';
import { convertValue, formatDefaultLiteral, formatValue, toPlainString } from './value-format.js';

const logger = getLogger('resolver');

function checkConstraint(field: FieldRef, text: string): void {
    if (field.inlineConstraint === undefined) return;
    const pattern = new RegExp(`^(?:${field.inlineConstraint})$`);
    if (!pattern.test(text)) {
        throw new ConstraintViolationError(field.rawSpan, text, field.inlineConstraint);
    }
}

function formatResolved(field: FieldRef, value: unknown): string {
    const formatted = formatValue(value, field.spec, field.conversion);
    if (formatted.ok) return formatted.text;

    logger.warn(`${field.rawSpan}: ${formatted.reason}; using the unformatted value`);
    return field.conversion ? convertValue(value, field.conversion) : toPlainString(value);
}

/**
 * Text for one field.
 *
 * A resolved value is converted and formatted. A missing field takes its
 * inline default whatever the mode; without one, glob mode emits the marker
 * and partial/default modes emit the field's source text unchanged.
 */
export function resolveField(
    field: FieldRef,
    mode: Mode,
    bindings: Bindings,
    options: ResolvedOptions
): string {
    const result = lookup(field.keyPath, bindings, options.args);

    if (result.found) {
        const text = formatResolved(field, result.value);
        if (options.enforceConstraints) checkConstraint(field, text);
        return text;
    }

    logger.debug(`${field.rawSpan} is missing (key-path step ${result.failedAt})`);

    if (field.inlineDefault !== undefined) {
        return formatDefaultLiteral(field.inlineDefault, field.spec);
    }

    switch (mode) {
        case 'glob':
            return options.globMarker;
        case 'partial':
        case 'default':
            return field.rawSpan;
    }
}
