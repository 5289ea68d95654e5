import * as Option from "effect/Option"
import { pipe } from "effect/Function"

import type { IntegerWidth } from "./numeric.js"
import { narrow, roundHalfEven, toFloat32 } from "./numeric.js"
import { truncateToBytes } from "./utf8.js"
import type { Value } from "./value.js"
import { getElement, getItem, makeBoolean, makeNull, makeNumber, makeString, setElement, setItem } from "./value.js"

// CHANGE: typed get/set helpers over object fields and array elements
// WHY: callers read scalars without re-checking variants at every site
// QUOTE(TZ): "failure if the field is absent or its variant does not match <type> exactly"
// REF: req-accessors-1
// SOURCE: n/a
// FORMAT THEOREM: ∀c,k: get_T(c,k) = Some(x) ↔ lookup(c,k) is a T-compatible variant
// PURITY: CORE
// EFFECT: setters mutate the container
// INVARIANT: getters never coerce between variants (no String → Number)
// COMPLEXITY: O(1) per call (O(n) for bounded strings)

export interface Accessors<K> {
  /**
   * Read a string. With `capacity`, behaves like copying into a buffer of that
   * many UTF-8 bytes including a terminator: at most `capacity - 1` bytes are
   * kept, never splitting a code point, and truncation still counts as success.
   * A fractional capacity is floored; NaN keeps nothing.
   */
  readonly getString: (container: Value, key: K, capacity?: number) => Option.Option<string>
  readonly getInt: (container: Value, key: K) => Option.Option<number>
  readonly getUInt: (container: Value, key: K) => Option.Option<number>
  readonly getInt8: (container: Value, key: K) => Option.Option<number>
  readonly getUInt8: (container: Value, key: K) => Option.Option<number>
  readonly getInt16: (container: Value, key: K) => Option.Option<number>
  readonly getUInt16: (container: Value, key: K) => Option.Option<number>
  /** Single-precision read. */
  readonly getFloat: (container: Value, key: K) => Option.Option<number>
  readonly getNumber: (container: Value, key: K) => Option.Option<number>
  readonly getBool: (container: Value, key: K) => Option.Option<boolean>
  /** True only for a present Null; a missing key is not null. */
  readonly isValNull: (container: Value, key: K) => boolean
  readonly setString: (container: Value, key: K, value: string) => boolean
  readonly setInt: (container: Value, key: K, value: number) => boolean
  readonly setUInt: (container: Value, key: K, value: number) => boolean
  readonly setInt8: (container: Value, key: K, value: number) => boolean
  readonly setUInt8: (container: Value, key: K, value: number) => boolean
  readonly setInt16: (container: Value, key: K, value: number) => boolean
  readonly setUInt16: (container: Value, key: K, value: number) => boolean
  readonly setFloat: (container: Value, key: K, value: number) => boolean
  readonly setNumber: (container: Value, key: K, value: number) => boolean
  readonly setBool: (container: Value, key: K, value: boolean) => boolean
  readonly setNull: (container: Value, key: K) => boolean
}

const asString = (capacity: number | undefined) => (value: Value): Option.Option<string> => {
  if (value._tag !== "String") {
    return Option.none()
  }
  if (capacity === undefined) {
    return Option.some(value.value)
  }
  const budget = Number.isNaN(capacity) ? 0 : Math.max(0, Math.floor(capacity) - 1)
  return Option.some(truncateToBytes(value.value, budget))
}

const asNumber = (value: Value): Option.Option<number> =>
  value._tag === "Number" ? Option.some(value.value) : Option.none()

const asBoolean = (value: Value): Option.Option<boolean> =>
  value._tag === "Boolean" ? Option.some(value.value) : Option.none()

const asInteger = (width: IntegerWidth) => (value: Value): Option.Option<number> =>
  pipe(asNumber(value), Option.map((number) => narrow(roundHalfEven(number), width)))

const integerValue = (value: number, width: IntegerWidth): Value => makeNumber(narrow(Math.trunc(value), width))

const makeAccessors = <K>(
  lookup: (container: Value, key: K) => Option.Option<Value>,
  store: (container: Value, key: K, value: Value) => boolean
): Accessors<K> => {
  const read = <A>(convert: (value: Value) => Option.Option<A>) => (container: Value, key: K): Option.Option<A> =>
    Option.flatMap(lookup(container, key), convert)

  const writeInteger = (width: IntegerWidth) => (container: Value, key: K, value: number): boolean =>
    store(container, key, integerValue(value, width))

  return {
    getString: (container, key, capacity) => Option.flatMap(lookup(container, key), asString(capacity)),
    getInt: read(asInteger("int32")),
    getUInt: read(asInteger("uint32")),
    getInt8: read(asInteger("int8")),
    getUInt8: read(asInteger("uint8")),
    getInt16: read(asInteger("int16")),
    getUInt16: read(asInteger("uint16")),
    getFloat: read((value) => Option.map(asNumber(value), toFloat32)),
    getNumber: read(asNumber),
    getBool: read(asBoolean),
    isValNull: (container, key) => Option.exists(lookup(container, key), (value) => value._tag === "Null"),
    setString: (container, key, value) => store(container, key, makeString(value)),
    setInt: writeInteger("int32"),
    setUInt: writeInteger("uint32"),
    setInt8: writeInteger("int8"),
    setUInt8: writeInteger("uint8"),
    setInt16: writeInteger("int16"),
    setUInt16: writeInteger("uint16"),
    setFloat: (container, key, value) => store(container, key, makeNumber(toFloat32(value))),
    setNumber: (container, key, value) => store(container, key, makeNumber(value)),
    setBool: (container, key, value) => store(container, key, makeBoolean(value)),
    setNull: (container, key) => store(container, key, makeNull())
  }
}

/**
 * Typed access to object fields by key. Setters fail only when the container
 * is not an object.
 */
export const ObjectFields: Accessors<string> = makeAccessors(getItem, setItem)

/**
 * Typed access to array elements by index. Setters replace an existing
 * element or append at `index === length`; other indices fail.
 */
export const ArrayElements: Accessors<number> = makeAccessors(getElement, setElement)
