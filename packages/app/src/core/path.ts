import * as Option from "effect/Option"

import type { Value } from "./value.js"
import { getElement, getItem } from "./value.js"

// CHANGE: resolve dotted paths (a.b.0) against a document tree
// WHY: the get command addresses nested fields without a query language
// QUOTE(TZ): n/a
// REF: req-cli-get-1
// SOURCE: n/a
// FORMAT THEOREM: resolve(v, "") = Some(v); resolve(v, p.s) = resolve(v, p) >>= step(s)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: array segments must be canonical non-negative integers
// COMPLEXITY: O(depth)

const INDEX_SEGMENT = /^(?:0|[1-9]\d*)$/u

export const splitPath = (path: string): ReadonlyArray<string> => path.length === 0 ? [] : path.split(".")

const step = (current: Value, segment: string): Option.Option<Value> => {
  if (current._tag === "Array") {
    return INDEX_SEGMENT.test(segment) ? getElement(current, Number(segment)) : Option.none()
  }
  return getItem(current, segment)
}

/**
 * Borrow the value at `path`. Object segments are keys, array segments are
 * decimal indices. The empty path is the root.
 *
 * @pure true
 * @complexity O(depth)
 */
export const resolvePath = (root: Value, path: string): Option.Option<Value> => {
  let current: Option.Option<Value> = Option.some(root)
  for (const segment of splitPath(path)) {
    current = Option.flatMap(current, (value) => step(value, segment))
  }
  return current
}
