import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { fromJson } from "../../src/core/convert.js"
import { parse } from "../../src/core/parse.js"
import type { ParseOptions } from "../../src/core/parse.js"
import { equals, getItem, makeNull, size } from "../../src/core/value.js"

const parsed = (input: string | Uint8Array, options?: ParseOptions) =>
  Either.getOrThrow(parse(input, options))

const failure = (input: string | Uint8Array, options?: ParseOptions) =>
  Either.getOrThrow(Either.flip(parse(input, options)))

const nested = (depth: number): string => "[".repeat(depth) + "]".repeat(depth)

describe("parse", () => {
  it.effect("reads a bare null", () =>
    Effect.sync(() => {
      expect(parsed("null")).toEqual(makeNull())
    }))

  it.effect("reads an object with nested array and leading whitespace", () =>
    Effect.sync(() => {
      const root = parsed("  {\"a\": 1, \"b\": [true, false, null]}")
      expect(equals(root, fromJson({ a: 1, b: [true, false, null] }))).toBe(true)
    }))

  it.effect("attaches values after a closed inner object to the outer key", () =>
    Effect.sync(() => {
      const root = parsed("{\"a\":{\"b\":1},\"c\":[{\"d\":{}}],\"e\":2}")
      expect(equals(root, fromJson({ a: { b: 1 }, c: [{ d: {} }], e: 2 }))).toBe(true)
    }))

  it.effect("keeps the last value for a repeated key", () =>
    Effect.sync(() => {
      const root = parsed("{\"a\":1,\"a\":2}")
      expect(size(root)).toBe(1)
      expect(getItem(root, "a")).toEqual(getItem(fromJson({ a: 2 }), "a"))
    }))

  it.effect("reads numbers in every JSON form", () =>
    Effect.sync(() => {
      const root = parsed("[0, -0.5, 12.25, -12.5e2, 1E3, 2e-2, 9007199254740993]")
      expect(equals(root, fromJson([0, -0.5, 12.25, -1250, 1000, 0.02, 9_007_199_254_740_992]))).toBe(true)
    }))

  it.effect("decodes string escapes including surrogate pairs", () =>
    Effect.sync(() => {
      const root = parsed(String.raw`["a\"b\\c\/d\b\f\n\r\t", "é", "😀", "\ud800"]`)
      expect(equals(root, fromJson(["a\"b\\c/d\b\f\n\r\t", "é", "😀", "\ud800"]))).toBe(true)
    }))

  it.effect("accepts 128 nested levels and rejects 129", () =>
    Effect.sync(() => {
      expect(Either.isRight(parse(nested(127)))).toBe(true)
      expect(Either.isRight(parse(nested(128)))).toBe(true)
      const error = failure(nested(129))
      expect(error.reason).toBe("DepthLimitExceeded")
      expect(error.offset).toBe(128)
    }))

  it.effect("honours a custom depth limit", () =>
    Effect.sync(() => {
      expect(failure("[[[]]]", { maxDepth: 2 }).reason).toBe("DepthLimitExceeded")
      expect(Either.isRight(parse("[[]]", { maxDepth: 2 }))).toBe(true)
    }))

  it.effect("falls back to the default depth limit for unusable bounds", () =>
    Effect.sync(() => {
      for (const maxDepth of [Number.NaN, Number.POSITIVE_INFINITY, 0, -3, 2.5]) {
        const error = failure(nested(129), { maxDepth })
        expect(error.reason, String(maxDepth)).toBe("DepthLimitExceeded")
        expect(error.offset, String(maxDepth)).toBe(128)
        expect(Either.isRight(parse(nested(128), { maxDepth })), String(maxDepth)).toBe(true)
      }
      const deep = "[".repeat(100_000) + "]".repeat(99_999)
      expect(failure(deep, { maxDepth: Number.POSITIVE_INFINITY }).reason).toBe("DepthLimitExceeded")
    }))

  it.effect("discards a very deep partial tree without exhausting the call stack", () =>
    Effect.sync(() => {
      const input = "[".repeat(100_000) + "]".repeat(99_999)
      const error = failure(input, { maxDepth: 200_000 })
      expect(error.reason).toBe("UnbalancedContainer")
      expect(error.message).toBe("Unexpected end of input, 1 unclosed '['")
      expect(error.offset).toBe(199_999)
    }))

  it.effect("reads UTF-8 bytes and skips a byte order mark", () =>
    Effect.sync(() => {
      const root = parsed(new TextEncoder().encode("\uFEFF{\"k\":true}"))
      expect(equals(root, fromJson({ k: true }))).toBe(true)
    }))

  it.effect("skips stray characters only when asked to", () =>
    Effect.sync(() => {
      const input = "[1, x 2]"
      expect(failure(input).reason).toBe("UnexpectedCharacter")
      expect(failure(input).offset).toBe(4)
      const root = parsed(input, { skipUnknownCharacters: true })
      expect(equals(root, fromJson([1, 2]))).toBe(true)
    }))
})

describe("parse failures", () => {
  it.effect("rejects a missing object value", () =>
    Effect.sync(() => {
      const error = failure("{\"a\":}")
      expect(error._tag).toBe("JsonParseError")
      expect(error.reason).toBe("UnexpectedCharacter")
      expect(error.message).toBe("Expected value after ':'")
      expect(error.offset).toBe(5)
      expect(error.column).toBe(6)
    }))

  it.effect("rejects unbalanced containers at end of input", () =>
    Effect.sync(() => {
      const error = failure("[1,2,")
      expect(error.reason).toBe("UnbalancedContainer")
      expect(error.offset).toBe(5)
      expect(failure("{\"a\":[1]").reason).toBe("UnbalancedContainer")
    }))

  it.effect("rejects closers without or with the wrong opener", () =>
    Effect.sync(() => {
      expect(failure("]").reason).toBe("UnbalancedContainer")
      expect(failure("[}").message).toBe("Mismatched '}'")
    }))

  it.effect("rejects empty and whitespace-only input", () =>
    Effect.sync(() => {
      expect(failure("").reason).toBe("EmptyInput")
      expect(failure(" \n\t ").reason).toBe("EmptyInput")
    }))

  it.effect("rejects trailing content after the root", () =>
    Effect.sync(() => {
      const error = failure("{} x")
      expect(error.reason).toBe("TrailingCharacters")
      expect(error.offset).toBe(3)
      expect(failure("1 2").reason).toBe("TrailingCharacters")
      expect(failure("[]]").reason).toBe("TrailingCharacters")
    }))

  it.effect("rejects malformed literals", () =>
    Effect.sync(() => {
      expect(failure("tru").reason).toBe("InvalidLiteral")
      expect(failure("[nul]").reason).toBe("InvalidLiteral")
      expect(failure("fals").offset).toBe(0)
    }))

  it.effect("rejects malformed numbers", () =>
    Effect.sync(() => {
      for (const input of ["01", "+1", "1.", "-", "1e", ".5", "1e400", "--1"]) {
        expect(failure(input).reason, input).toBe(input === ".5" ? "UnexpectedCharacter" : "InvalidNumber")
      }
    }))

  it.effect("rejects bad strings", () =>
    Effect.sync(() => {
      expect(failure("\"abc").reason).toBe("UnterminatedString")
      expect(failure("\"abc\\").reason).toBe("UnterminatedString")
      const escape = failure("[\"ok\", \"\\x\"]")
      expect(escape.reason).toBe("InvalidEscape")
      expect(escape.offset).toBe(8)
      expect(failure("\"\\u12G4\"").reason).toBe("InvalidEscape")
      expect(failure("\"line\nbreak\"").reason).toBe("InvalidStringCharacter")
    }))

  it.effect("rejects misplaced separators and keys", () =>
    Effect.sync(() => {
      expect(failure("{\"a\" 1}").message).toBe("Expected ':' but found '1'")
      expect(failure("[1 2]").message).toBe("Expected ',' or ']' but found '2'")
      expect(failure("[1,]").message).toBe("Expected value after ','")
      expect(failure("{\"a\":1,}").message).toBe("Expected string key after ','")
      expect(failure("{,}").message).toBe("Unexpected ','")
      expect(failure("{1:2}").message).toBe("Expected string key but found '1'")
      expect(failure("[1:2]").message).toBe("Unexpected ':'")
      expect(failure("{\"a\"}").message).toBe("Expected ':' after key")
    }))

  it.effect("reports UTF-8 byte offsets with line and column", () =>
    Effect.sync(() => {
      const inline = failure("{\"é\": x}")
      expect(inline.index).toBe(6)
      expect(inline.offset).toBe(7)
      expect(inline.line).toBe(1)
      expect(inline.column).toBe(7)

      const multiline = failure("[\n  1,\n  x]")
      expect(multiline.offset).toBe(9)
      expect(multiline.line).toBe(3)
      expect(multiline.column).toBe(3)
    }))

  it.effect("counts a byte order mark in byte offsets", () =>
    Effect.sync(() => {
      const error = failure(new TextEncoder().encode("\uFEFF[x]"))
      expect(error.index).toBe(1)
      expect(error.offset).toBe(4)
    }))

  it.effect("rejects invalid UTF-8", () =>
    Effect.sync(() => {
      expect(failure(Uint8Array.of(0x5b, 0xff, 0x5d)).reason).toBe("InvalidEncoding")
    }))
})
