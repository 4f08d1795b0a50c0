// liblazy/src/index.ts
// Public API — re-exports all lazy value primitives.

// Types
export type {
    Immediate,
    Computation,
    Value,
    ValueKind,
    ZeroValues,
    ZeroKind,
} from './types.js';

// Construction and retrieval
export { value, lazy, get, isValue, empty, emptyOf } from './value.js';

// Combinators
export { map } from './map.js';
export { flatMap } from './flat-map.js';
