import type { KeyComponent } from '@partial-format/syntax';

export type Bindings = Readonly<Record<string, unknown>> | ReadonlyMap<string, unknown>;

export type Lookup =
    | { found: true; value: unknown }
    | { found: false; failedAt: number };

const UNSAFE_SEGMENTS: ReadonlySet<string> = new Set(['__proto__', 'constructor', 'prototype']);

const found = (value: unknown): Lookup => ({ found: true, value });
const missing = (failedAt: number): Lookup => ({ found: false, failedAt });

function isMap(value: unknown): value is ReadonlyMap<unknown, unknown> {
    return value instanceof Map;
}

/**
 * One attribute/index step. Returns undefined when the step cannot be taken.
 */
function step(current: unknown, component: KeyComponent): { value: unknown } | undefined {
    if (current === null || current === undefined) return undefined;

    if (isMap(current)) {
        return current.has(component) ? { value: current.get(component) } : undefined;
    }

    if (typeof component === 'number') {
        if (Array.isArray(current) || typeof current === 'string') {
            return component < current.length ? { value: current[component] } : undefined;
        }
    }

    const key = String(component);
    // Prevent prototype pollution / unsafe access
    if (UNSAFE_SEGMENTS.has(key)) return undefined;

    const target: object = Object(current);
    if (!(key in target)) return undefined;
    return { value: Reflect.get(target, key) };
}

/**
 * Looks up the first key-path component in the bindings (strings) or the
 * positional arguments (numbers), then walks the remaining components.
 * Any failed step, or `undefined` at the end, is reported as missing.
 */
export function lookup(
    keyPath: readonly KeyComponent[],
    bindings: Bindings,
    args: readonly unknown[] = []
): Lookup {
    const [head, ...rest] = keyPath;
    if (head === undefined) return missing(0);

    let current: unknown;
    if (typeof head === 'number') {
        if (head >= args.length) return missing(0);
        current = args[head];
    } else if (isMap(bindings)) {
        if (!bindings.has(head)) return missing(0);
        current = bindings.get(head);
    } else {
        if (UNSAFE_SEGMENTS.has(head) || !Object.prototype.hasOwnProperty.call(bindings, head)) {
            return missing(0);
        }
        current = bindings[head];
    }

    for (let i = 0; i < rest.length; i++) {
        const next = step(current, rest[i]);
        if (!next) return missing(i + 1);
        current = next.value;
    }

    return current === undefined ? missing(keyPath.length - 1) : found(current);
}
