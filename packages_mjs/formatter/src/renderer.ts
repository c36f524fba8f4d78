import type { Template } from '@partial-format/syntax';
import type { Mode, ResolvedOptions } from './config.js';
import { resolveField } from './resolver.js';
import type { Bindings } from './traversal.js';

export function renderTemplate(
    template: Template,
    mode: Mode,
    bindings: Bindings,
    options: ResolvedOptions
): string {
    let output = '';
    for (const segment of template.segments) {
        output += segment.kind === 'literal'
            ? segment.text
            : resolveField(segment, mode, bindings, options);
    }
    return output;
}
