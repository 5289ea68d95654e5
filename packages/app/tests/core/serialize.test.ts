import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { fromJson } from "../../src/core/convert.js"
import { parse } from "../../src/core/parse.js"
import { formatNumber, quoteString, serialize } from "../../src/core/serialize.js"
import { equals, makeNumber } from "../../src/core/value.js"

describe("serialize", () => {
  it.effect("writes compact output without insignificant whitespace", () =>
    Effect.sync(() => {
      expect(serialize(fromJson({ x: "hi" }))).toBe("{\"x\":\"hi\"}")
      expect(serialize(fromJson({ a: [1, true, null], b: {} }))).toBe("{\"a\":[1,true,null],\"b\":{}}")
    }))

  it.effect("writes a missing tree as null", () =>
    Effect.sync(() => {
      expect(serialize(undefined)).toBe("null")
    }))

  it.effect("pretty-prints with a numeric indent", () =>
    Effect.sync(() => {
      const text = serialize(fromJson({ a: [1, true], b: {}, c: [] }), { indent: 2 })
      expect(text).toBe("{\n  \"a\": [\n    1,\n    true\n  ],\n  \"b\": {},\n  \"c\": []\n}")
    }))

  it.effect("accepts a literal indent unit and newline", () =>
    Effect.sync(() => {
      expect(serialize(fromJson([1, 2]), { indent: "\t", newline: "\r\n" })).toBe("[\r\n\t1,\r\n\t2\r\n]")
    }))

  it.effect("treats a zero or negative indent as compact", () =>
    Effect.sync(() => {
      expect(serialize(fromJson([1]), { indent: 0 })).toBe("[1]")
      expect(serialize(fromJson([1]), { indent: -4 })).toBe("[1]")
    }))

  it.effect("keeps insertion order of keys", () =>
    Effect.sync(() => {
      expect(serialize(fromJson({ z: 1, a: 2 }))).toBe("{\"z\":1,\"a\":2}")
    }))

  it.effect("reads back to an equal tree", () =>
    Effect.sync(() => {
      const original = fromJson({
        text: "quote \" slash \\ tab \t bell \u0007 emoji 😀",
        numbers: [0, -1.5, 1e21, 5e-324],
        nested: { list: [[], {}, null], flag: false }
      })
      const reparsed = Either.getOrThrow(parse(serialize(original)))
      expect(equals(reparsed, original)).toBe(true)
      const pretty = Either.getOrThrow(parse(serialize(original, { indent: 4 })))
      expect(equals(pretty, original)).toBe(true)
    }))
})

describe("quoteString", () => {
  it.effect("escapes quotes, backslashes and control characters", () =>
    Effect.sync(() => {
      expect(quoteString("a\"b\\c\nd")).toBe("\"a\\\"b\\\\c\\nd\"")
      expect(quoteString("\b\f\r\t")).toBe("\"\\b\\f\\r\\t\"")
      expect(quoteString("\u0001\u001f")).toBe("\"\\u0001\\u001f\"")
    }))

  it.effect("keeps valid surrogate pairs and escapes lone surrogates", () =>
    Effect.sync(() => {
      expect(quoteString("😀")).toBe("\"😀\"")
      expect(quoteString("x\ud800y")).toBe("\"x\\ud800y\"")
      expect(quoteString("\udc00")).toBe("\"\\udc00\"")
    }))

  it.effect("leaves slashes and non-ASCII text alone", () =>
    Effect.sync(() => {
      expect(quoteString("a/é")).toBe("\"a/é\"")
    }))
})

describe("formatNumber", () => {
  it.effect("writes the shortest round-tripping form", () =>
    Effect.sync(() => {
      expect(formatNumber(0.1)).toBe("0.1")
      expect(formatNumber(100)).toBe("100")
      expect(formatNumber(1e21)).toBe("1e+21")
      expect(formatNumber(-0)).toBe("0")
    }))

  it.effect("writes non-finite numbers as null", () =>
    Effect.sync(() => {
      expect(formatNumber(Number.NaN)).toBe("null")
      expect(serialize(makeNumber(Number.POSITIVE_INFINITY))).toBe("null")
    }))
})
