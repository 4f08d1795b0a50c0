// liblazy/src/value.ts
// Constructing and retrieving lazy values.

import type { Computation, Immediate, Value, ValueKind, ZeroKind, ZeroValues } from './types.js';

const VALUE_KINDS: ReadonlySet<unknown> = new Set<ValueKind>(['immediate', 'computation']);

const ZERO_VALUES: { readonly [K in ZeroKind]: ZeroValues[K] } = {
    number: 0,
    string: '',
    boolean: false,
    bigint: 0n,
};

/**
 * Wrap an already-known value.
 *
 * @example
 * get(value(5)); // 5
 */
export function value<T>(v: T): Value<T> {
    const immediate: Immediate<T> = { __lazy: 'immediate', value: v };
    return Object.freeze(immediate);
}

/**
 * Wrap a computation. `fn` is not called here; it runs on every `get`.
 *
 * @example
 * let calls = 0;
 * const counter = lazy(() => ++calls);
 * get(counter); // 1
 * get(counter); // 2
 */
export function lazy<T>(fn: () => T): Value<T> {
    assertFunction('lazy', fn);
    const computation: Computation<T> = { __lazy: 'computation', fn };
    return Object.freeze(computation);
}

/**
 * Retrieve the value. Computations run synchronously, every call.
 * Anything `fn` throws reaches the caller as is.
 *
 * A container built without `value` or `lazy` (no `__lazy` tag) retrieves
 * `undefined`, the unset value, instead of failing.
 */
export function get<T>(v: Value<T>): T {
    switch (v.__lazy) {
        case 'immediate':
            return v.value;
        case 'computation':
            return v.fn();
        default:
            // unset container: only reachable from untyped or deserialized data
            return undefined as T;
    }
}

/** Check if a value is a lazy value wrapper. */
export function isValue(val: unknown): val is Value {
    return (
        val !== null &&
        typeof val === 'object' &&
        '__lazy' in val &&
        VALUE_KINDS.has(val.__lazy)
    );
}

/** The default container: retrieves `undefined`, never fails. */
export function empty<T = never>(): Value<T | undefined> {
    return value<T | undefined>(undefined);
}

/**
 * A container holding the zero value of a primitive kind.
 *
 * @example
 * get(emptyOf('number')); // 0
 * get(emptyOf('string')); // ''
 */
export function emptyOf<K extends ZeroKind>(kind: K): Value<ZeroValues[K]> {
    return value(ZERO_VALUES[kind]);
}

export function assertFunction(caller: string, fn: unknown): void {
    if (typeof fn !== 'function') {
        throw new Error(`${caller}() expects a function, got: ${typeof fn}`);
    }
}
