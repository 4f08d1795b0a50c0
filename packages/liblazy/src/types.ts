// liblazy/src/types.ts
// Core type definitions for lazy values.

// ─── Variants ───────────────────────────────────────────────────────

/** A value that is already known. */
export interface Immediate<T = unknown> {
    readonly __lazy: 'immediate';
    readonly value: T;
}

/**
 * A value produced by running `fn` on every retrieval.
 * The result is never cached.
 */
export interface Computation<T = unknown> {
    readonly __lazy: 'computation';
    readonly fn: () => T;
}

// ─── Value ──────────────────────────────────────────────────────────

/** Lazy value — either an immediate value or an unevaluated computation. */
export type Value<T = unknown> = Immediate<T> | Computation<T>;

/** Variant tag of a Value. */
export type ValueKind = Value['__lazy'];

// ─── Zero Values ────────────────────────────────────────────────────

/** Primitive kinds that have a natural zero value. */
export interface ZeroValues {
    number: number;
    string: string;
    boolean: boolean;
    bigint: bigint;
}

export type ZeroKind = keyof ZeroValues;
