// liblazy/src/flat-map.ts

import { assertFunction, get, lazy } from './value.js';
import type { Value } from './types.js';

/**
 * Chain a lazy value into another one, unwrapping one level of nesting.
 *
 * On each `get` of the result: retrieve `source`, pass it to `f`, then
 * retrieve whatever `f` returned. None of it happens before that `get`.
 *
 * @example
 * get(flatMap(value(3), x => lazy(() => x * 4))); // 12
 */
export function flatMap<T, R>(source: Value<T>, f: (x: T) => Value<R>): Value<R> {
    assertFunction('flatMap', f);
    return lazy(() => get(f(get(source))));
}
