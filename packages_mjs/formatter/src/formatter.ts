import { getTemplate } from './cache.js';
import { resolveOptions, validateMode, type Mode, type RenderOptions } from './config.js';
import { renderTemplate } from './renderer.js';
import { matchTemplate, matchesTemplate } from './reverse-matcher.js';
import type { Bindings } from './traversal.js';

export interface FormatterOptions extends Omit<RenderOptions, 'args'> {
    mode: Mode;
}

/**
 * Render a template; missing fields are handled according to `mode`.
 * Throws ParseError for malformed templates.
 */
export function render(
    template: string,
    mode: Mode,
    bindings: Bindings = {},
    options: RenderOptions = {}
): string {
    const resolvedMode = validateMode(mode);
    const resolved = resolveOptions(options);
    return renderTemplate(getTemplate(template, resolved.cache), resolvedMode, bindings, resolved);
}

/**
 * Reverse match: extract field values from `candidate` using `template`
 * as a pattern. Throws PatternMismatchError when the candidate does not fit.
 */
export function parse(template: string, candidate: string): Record<string, string> {
    return matchTemplate(getTemplate(template), candidate);
}

export function matches(template: string, candidate: string): boolean {
    return matchesTemplate(getTemplate(template), candidate);
}

export function formatPartial(template: string, bindings: Bindings = {}, options: RenderOptions = {}): string {
    return render(template, 'partial', bindings, options);
}

export function formatGlob(template: string, bindings: Bindings = {}, options: RenderOptions = {}): string {
    return render(template, 'glob', bindings, options);
}

export function formatDefault(template: string, bindings: Bindings = {}, options: RenderOptions = {}): string {
    return render(template, 'default', bindings, options);
}

/**
 * A formatter bound to one mode and option set.
 *
 * @example
 * const glob = new Formatter({ mode: 'glob' });
 * glob.format('{}/loss_{:.2f}', {}, 'abc'); // 'abc/loss_*'
 */
export class Formatter {
    readonly mode: Mode;
    private readonly options: Omit<RenderOptions, 'args'>;

    constructor(options: FormatterOptions) {
        const { mode, ...rest } = options;
        this.mode = validateMode(mode);
        this.options = rest;
        // fail early on bad options
        resolveOptions(rest);
    }

    format(template: string, bindings: Bindings = {}, ...args: unknown[]): string {
        return render(template, this.mode, bindings, { ...this.options, args });
    }

    parse(template: string, candidate: string): Record<string, string> {
        return parse(template, candidate);
    }
}
