// CHANGE: integer rounding and fixed-width narrowing for typed accessors
// WHY: integer reads round to nearest and wrap like low-level integer conversion
// QUOTE(TZ): "narrowing silently truncates (matches low-level integer conversion semantics, not saturating)"
// REF: req-numeric-1
// SOURCE: n/a
// FORMAT THEOREM: ∀x finite: toInt32(roundHalfEven(x)) ≡ roundHalfEven(x) (mod 2^32)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: NaN and ±Infinity narrow to 0
// COMPLEXITY: O(1)/O(1)

export type IntegerWidth = "int8" | "uint8" | "int16" | "uint16" | "int32" | "uint32"

/**
 * Round to the nearest integer, ties to even (2.5 → 2, 3.5 → 4, -2.5 → -2).
 */
export const roundHalfEven = (value: number): number => {
  if (!Number.isFinite(value)) {
    return value
  }
  const floor = Math.floor(value)
  const diff = value - floor
  if (diff < 0.5) {
    return floor
  }
  if (diff > 0.5) {
    return floor + 1
  }
  return floor % 2 === 0 ? floor : floor + 1
}

/**
 * Wrap an integral number into `width` using two's complement for signed
 * widths. Non-integral input is truncated toward zero first.
 */
export const narrow = (value: number, width: IntegerWidth): number => {
  // ToInt32 / ToUint32 reduce modulo 2^32 and map NaN / Infinity to 0
  switch (width) {
    case "int8":
      return (value << 24) >> 24
    case "uint8":
      return value & 0xff
    case "int16":
      return (value << 16) >> 16
    case "uint16":
      return value & 0xff_ff
    case "int32":
      return value | 0
    case "uint32":
      return value >>> 0
  }
}

export const toFloat32 = (value: number): number => Math.fround(value)
