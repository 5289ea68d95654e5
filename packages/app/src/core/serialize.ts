import type { Value } from "./value.js"
import { isHighSurrogate, isLowSurrogate } from "./utf8.js"

// CHANGE: render document trees back to JSON text
// WHY: compact output must be byte-for-byte accepted by the parser
// QUOTE(TZ): "prefer the shortest representation that parses back to the same double"
// REF: req-serialize-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v: parse(serialize(v)) = Right(w) ∧ equals(v, w)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: output contains no raw control characters and no lone surrogates
// COMPLEXITY: O(n)

export interface SerializeOptions {
  /** Spaces per level (number) or the literal indent unit. Omitted or empty means compact. */
  readonly indent?: string | number
  readonly newline?: string
}

const SHORT_ESCAPES: Readonly<Record<number, string>> = {
  0x08: "\\b",
  0x09: "\\t",
  0x0a: "\\n",
  0x0c: "\\f",
  0x0d: "\\r",
  0x22: "\\\"",
  0x5c: "\\\\"
}

const unicodeEscape = (code: number): string => `\\u${code.toString(16).padStart(4, "0")}`

const needsEscape = (code: number): boolean =>
  code < 0x20 || code === 0x22 || code === 0x5c || (code >= 0xd8_00 && code <= 0xdf_ff)

/**
 * Quote a string as a JSON string literal.
 *
 * @pure true
 * @complexity O(n)
 */
export const quoteString = (text: string): string => {
  let result = "\""
  let chunkStart = 0
  let index = 0
  while (index < text.length) {
    const code = text.charCodeAt(index)
    if (!needsEscape(code)) {
      index++
      continue
    }
    if (isHighSurrogate(code) && index + 1 < text.length && isLowSurrogate(text.charCodeAt(index + 1))) {
      index += 2
      continue
    }
    result += text.slice(chunkStart, index) + (SHORT_ESCAPES[code] ?? unicodeEscape(code))
    index++
    chunkStart = index
  }
  return result + text.slice(chunkStart) + "\""
}

/**
 * Shortest decimal text that reads back as the same double. Non-finite
 * numbers have no JSON spelling and render as `null`.
 */
export const formatNumber = (value: number): string => Number.isFinite(value) ? String(value) : "null"

const resolveIndent = (indent: string | number | undefined): string => {
  if (typeof indent === "number") {
    return " ".repeat(Math.max(0, Math.min(10, Math.floor(indent))))
  }
  return indent ?? ""
}

interface Layout {
  readonly indent: string
  readonly newline: string
}

const render = (value: Value, layout: Layout, level: number): string => {
  switch (value._tag) {
    case "Null":
      return "null"
    case "Boolean":
      return value.value ? "true" : "false"
    case "Number":
      return formatNumber(value.value)
    case "String":
      return quoteString(value.value)
    case "Object": {
      const parts: Array<string> = []
      const separator = layout.indent.length > 0 ? ": " : ":"
      for (const [key, child] of value.entries) {
        parts.push(quoteString(key) + separator + render(child, layout, level + 1))
      }
      return wrap("{", "}", parts, layout, level)
    }
    case "Array":
      return wrap("[", "]", value.elements.map((child) => render(child, layout, level + 1)), layout, level)
  }
}

const wrap = (
  open: string,
  close: string,
  parts: ReadonlyArray<string>,
  layout: Layout,
  level: number
): string => {
  if (parts.length === 0) {
    return open + close
  }
  if (layout.indent.length === 0) {
    return open + parts.join(",") + close
  }
  const inner = layout.newline + layout.indent.repeat(level + 1)
  const outer = layout.newline + layout.indent.repeat(level)
  return open + inner + parts.join("," + inner) + outer + close
}

/**
 * Serialize a tree. A missing tree serializes as `null`.
 *
 * @param value - Root value, or undefined.
 * @param options - Optional indentation; compact by default.
 * @returns JSON text.
 *
 * @pure true
 * @invariant compact output has no insignificant whitespace
 * @complexity O(n)
 */
export const serialize = (value: Value | undefined, options: SerializeOptions = {}): string => {
  if (value === undefined) {
    return "null"
  }
  return render(value, { indent: resolveIndent(options.indent), newline: options.newline ?? "\n" }, 0)
}
