// liblazy/src/map.ts

import { assertFunction, get, lazy } from './value.js';
import type { Value } from './types.js';

/**
 * Transform a lazy value without forcing it.
 *
 * Every `get` on the result retrieves `source` again and calls `f` again,
 * even when `source` is immediate.
 *
 * @example
 * get(map(value(5), x => x * 2)); // 10
 */
export function map<T, R>(source: Value<T>, f: (x: T) => R): Value<R> {
    assertFunction('map', f);
    return lazy(() => f(get(source)));
}
