import * as Either from "effect/Either"

import type { JsonParseError, ParseFailureReason, SourceLocation } from "./errors.js"
import { jsonParseError } from "./errors.js"
import { byteLength } from "./utf8.js"
import type { ArrayValue, ObjectValue, Value } from "./value.js"
import {
  appendItem,
  destroy,
  makeArray,
  makeBoolean,
  makeNull,
  makeNumber,
  makeObject,
  makeString,
  setItem
} from "./value.js"

// CHANGE: parse JSON text with an explicit, depth-bounded container stack
// WHY: no recursion on untrusted nesting, and failures never leak partial trees
// QUOTE(TZ): "nesting depth must be bounded by a fixed maximum"
// REF: req-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀s: parse(s) = Right(v) → serialize(v) parses to a tree equal to v
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: stack depth ≤ maxDepth; Left(e) → every container built so far is destroyed
// COMPLEXITY: O(n) where n = input length

export interface ParseOptions {
  /**
   * Deepest container nesting accepted. Defaults to {@link DEFAULT_MAX_DEPTH},
   * which also replaces any value that is not a positive safe integer.
   */
  readonly maxDepth?: number
  /** Skip characters that cannot start a token instead of failing. */
  readonly skipUnknownCharacters?: boolean
}

export const DEFAULT_MAX_DEPTH = 128

type ObjectState = "KeyOrClose" | "Key" | "Colon" | "Value" | "CommaOrClose"
type ArrayState = "ValueOrClose" | "Value" | "CommaOrClose"

interface ObjectFrame {
  readonly kind: "Object"
  readonly container: ObjectValue
  state: ObjectState
  pendingKey: string | undefined
}

interface ArrayFrame {
  readonly kind: "Array"
  readonly container: ArrayValue
  state: ArrayState
}

type Frame = ObjectFrame | ArrayFrame

interface ParserContext {
  readonly input: string
  readonly byteBase: number
  readonly maxDepth: number
  readonly skipUnknown: boolean
  readonly stack: Array<Frame>
  index: number
  root: Value | undefined
}

interface Token<A> {
  readonly value: A
  readonly end: number
}

type Step = JsonParseError | undefined

const NUMBER_PATTERN = /-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?/uy

const NUMBER_CONTINUATION = /[\d.eE+-]/u

const SIMPLE_ESCAPES: Readonly<Record<string, string>> = {
  "\"": "\"",
  "\\": "\\",
  "/": "/",
  b: "\b",
  f: "\f",
  n: "\n",
  r: "\r",
  t: "\t"
}

const HEX4 = /^[\dA-Fa-f]{4}$/u

const isWhitespace = (char: string): boolean => char === " " || char === "\t" || char === "\n" || char === "\r"

const describeChar = (char: string): string => {
  const code = char.charCodeAt(0)
  return code < 0x20 || code === 0x7f
    ? `U+${code.toString(16).toUpperCase().padStart(4, "0")}`
    : `'${char}'`
}

const locate = (context: ParserContext, index: number): SourceLocation => {
  let line = 1
  let column = 1
  for (let cursor = 0; cursor < index; cursor++) {
    if (context.input.charCodeAt(cursor) === 10) {
      line++
      column = 1
    } else {
      column++
    }
  }
  return {
    offset: context.byteBase + byteLength(context.input, 0, index),
    index,
    line,
    column
  }
}

const fail = (
  context: ParserContext,
  reason: ParseFailureReason,
  message: string,
  index: number = context.index
): JsonParseError => jsonParseError(reason, message, locate(context, index))

const top = (context: ParserContext): Frame | undefined => context.stack[context.stack.length - 1]

const expectsKey = (frame: Frame | undefined): boolean =>
  frame !== undefined && frame.kind === "Object" && (frame.state === "KeyOrClose" || frame.state === "Key")

// Scalar readers

const readLiteral = <A>(
  context: ParserContext,
  literal: string,
  value: A
): Either.Either<Token<A>, JsonParseError> =>
  context.input.startsWith(literal, context.index)
    ? Either.right({ value, end: context.index + literal.length })
    : Either.left(fail(context, "InvalidLiteral", `Invalid literal, expected '${literal}'`))

const readNumber = (context: ParserContext): Either.Either<Token<number>, JsonParseError> => {
  NUMBER_PATTERN.lastIndex = context.index
  const match = NUMBER_PATTERN.exec(context.input)
  if (match === null) {
    return Either.left(fail(context, "InvalidNumber", "Invalid number"))
  }
  const lexeme = match[0]
  const end = context.index + lexeme.length
  const next = context.input.charAt(end)
  if (next.length > 0 && NUMBER_CONTINUATION.test(next)) {
    return Either.left(fail(context, "InvalidNumber", `Invalid number '${lexeme}${next}'`))
  }
  const value = Number(lexeme)
  if (!Number.isFinite(value)) {
    return Either.left(fail(context, "InvalidNumber", `Number out of range '${lexeme}'`))
  }
  return Either.right({ value, end })
}

const readEscape = (
  context: ParserContext,
  at: number
): Either.Either<Token<string>, JsonParseError> => {
  const marker = context.input.charAt(at + 1)
  if (marker === "u") {
    const hex = context.input.slice(at + 2, at + 6)
    if (!HEX4.test(hex)) {
      return Either.left(fail(context, "InvalidEscape", "Invalid unicode escape", at))
    }
    // surrogate halves decode to single code units and pair up on concatenation
    return Either.right({ value: String.fromCharCode(Number.parseInt(hex, 16)), end: at + 6 })
  }
  const simple = SIMPLE_ESCAPES[marker]
  if (simple === undefined) {
    return Either.left(
      marker.length === 0
        ? fail(context, "UnterminatedString", "Unterminated string", at)
        : fail(context, "InvalidEscape", `Invalid escape '\\${marker}'`, at)
    )
  }
  return Either.right({ value: simple, end: at + 2 })
}

const readString = (context: ParserContext): Either.Either<Token<string>, JsonParseError> => {
  const { input } = context
  const start = context.index
  let result = ""
  let chunkStart = start + 1
  let cursor = chunkStart
  while (cursor < input.length) {
    const code = input.charCodeAt(cursor)
    if (code === 0x22) {
      return Either.right({ value: result + input.slice(chunkStart, cursor), end: cursor + 1 })
    }
    if (code === 0x5c) {
      const escape = readEscape(context, cursor)
      if (Either.isLeft(escape)) {
        return Either.left(escape.left)
      }
      result += input.slice(chunkStart, cursor) + escape.right.value
      cursor = escape.right.end
      chunkStart = cursor
      continue
    }
    if (code < 0x20) {
      return Either.left(
        fail(context, "InvalidStringCharacter", `Unescaped control character ${describeChar(input.charAt(cursor))} in string`, cursor)
      )
    }
    cursor++
  }
  return Either.left(fail(context, "UnterminatedString", "Unterminated string", start))
}

// Structure

const checkValueSlot = (context: ParserContext): Step => {
  const frame = top(context)
  const char = context.input.charAt(context.index)
  if (frame === undefined) {
    return undefined
  }
  if (frame.kind === "Array") {
    return frame.state === "CommaOrClose"
      ? fail(context, "UnexpectedCharacter", `Expected ',' or ']' but found ${describeChar(char)}`)
      : undefined
  }
  switch (frame.state) {
    case "Value":
      return undefined
    case "KeyOrClose":
    case "Key":
      return fail(context, "UnexpectedCharacter", `Expected string key but found ${describeChar(char)}`)
    case "Colon":
      return fail(context, "UnexpectedCharacter", `Expected ':' but found ${describeChar(char)}`)
    case "CommaOrClose":
      return fail(context, "UnexpectedCharacter", `Expected ',' or '}' but found ${describeChar(char)}`)
  }
}

const attach = (context: ParserContext, value: Value): void => {
  const frame = top(context)
  if (frame === undefined) {
    context.root = value
    return
  }
  if (frame.kind === "Array") {
    appendItem(frame.container, value)
    frame.state = "CommaOrClose"
    return
  }
  setItem(frame.container, frame.pendingKey ?? "", value)
  frame.pendingKey = undefined
  frame.state = "CommaOrClose"
}

const scalar = <A>(
  context: ParserContext,
  token: Either.Either<Token<A>, JsonParseError>,
  build: (value: A) => Value
): Step => {
  if (Either.isLeft(token)) {
    return token.left
  }
  attach(context, build(token.right.value))
  context.index = token.right.end
  return undefined
}

const onValueToken = (context: ParserContext, read: () => Step): Step => checkValueSlot(context) ?? read()

const onQuote = (context: ParserContext): Step => {
  const frame = top(context)
  if (frame !== undefined && frame.kind === "Object" && expectsKey(frame)) {
    const key = readString(context)
    if (Either.isLeft(key)) {
      return key.left
    }
    frame.pendingKey = key.right.value
    frame.state = "Colon"
    context.index = key.right.end
    return undefined
  }
  return onValueToken(context, () => scalar(context, readString(context), makeString))
}

const push = (context: ParserContext, frame: Frame): Step => {
  if (context.stack.length >= context.maxDepth) {
    destroy(frame.container)
    return fail(context, "DepthLimitExceeded", `Nesting deeper than ${context.maxDepth} levels`)
  }
  context.stack.push(frame)
  context.index++
  return undefined
}

const onOpenObject = (context: ParserContext): Step =>
  onValueToken(context, () =>
    push(context, { kind: "Object", container: makeObject(), state: "KeyOrClose", pendingKey: undefined }))

const onOpenArray = (context: ParserContext): Step =>
  onValueToken(context, () => push(context, { kind: "Array", container: makeArray(), state: "ValueOrClose" }))

const closeError = (context: ParserContext, frame: Frame): Step => {
  if (frame.kind === "Array") {
    return frame.state === "Value"
      ? fail(context, "UnexpectedCharacter", "Expected value after ','")
      : undefined
  }
  switch (frame.state) {
    case "KeyOrClose":
    case "CommaOrClose":
      return undefined
    case "Key":
      return fail(context, "UnexpectedCharacter", "Expected string key after ','")
    case "Colon":
      return fail(context, "UnexpectedCharacter", "Expected ':' after key")
    case "Value":
      return fail(context, "UnexpectedCharacter", "Expected value after ':'")
  }
}

const onClose = (context: ParserContext, kind: Frame["kind"]): Step => {
  const closer = kind === "Object" ? "}" : "]"
  const frame = top(context)
  if (frame === undefined) {
    return fail(context, "UnbalancedContainer", `Unexpected '${closer}' without matching opener`)
  }
  if (frame.kind !== kind) {
    return fail(context, "UnbalancedContainer", `Mismatched '${closer}'`)
  }
  const invalid = closeError(context, frame)
  if (invalid !== undefined) {
    return invalid
  }
  context.stack.pop()
  attach(context, frame.container)
  context.index++
  return undefined
}

const onColon = (context: ParserContext): Step => {
  const frame = top(context)
  if (frame === undefined || frame.kind !== "Object" || frame.state !== "Colon") {
    return fail(context, "UnexpectedCharacter", "Unexpected ':'")
  }
  frame.state = "Value"
  context.index++
  return undefined
}

const onComma = (context: ParserContext): Step => {
  const frame = top(context)
  if (frame === undefined || frame.state !== "CommaOrClose") {
    return fail(context, "UnexpectedCharacter", "Unexpected ','")
  }
  if (frame.kind === "Object") {
    frame.state = "Key"
  } else {
    frame.state = "Value"
  }
  context.index++
  return undefined
}

const onOther = (context: ParserContext, char: string): Step => {
  if (isWhitespace(char) || context.skipUnknown) {
    context.index++
    return undefined
  }
  return fail(context, "UnexpectedCharacter", `Unexpected character ${describeChar(char)}`)
}

const dispatch = (context: ParserContext, char: string): Step => {
  if (context.root !== undefined && !isWhitespace(char)) {
    return fail(context, "TrailingCharacters", `Unexpected ${describeChar(char)} after document end`)
  }
  switch (char) {
    case "t":
      return onValueToken(context, () => scalar(context, readLiteral(context, "true", true), makeBoolean))
    case "f":
      return onValueToken(context, () => scalar(context, readLiteral(context, "false", false), makeBoolean))
    case "n":
      return onValueToken(context, () => scalar(context, readLiteral(context, "null", null), makeNull))
    case "\"":
      return onQuote(context)
    case "{":
      return onOpenObject(context)
    case "}":
      return onClose(context, "Object")
    case "[":
      return onOpenArray(context)
    case "]":
      return onClose(context, "Array")
    case ":":
      return onColon(context)
    case ",":
      return onComma(context)
    default:
      if (char === "-" || char === "+" || (char >= "0" && char <= "9")) {
        return onValueToken(context, () => scalar(context, readNumber(context), makeNumber))
      }
      return onOther(context, char)
  }
}

const discardPartial = (context: ParserContext): void => {
  for (const frame of context.stack) {
    destroy(frame.container)
  }
  context.stack.length = 0
  destroy(context.root)
  context.root = undefined
}

const run = (context: ParserContext): Either.Either<Value, JsonParseError> => {
  while (context.index < context.input.length) {
    const failure = dispatch(context, context.input.charAt(context.index))
    if (failure !== undefined) {
      discardPartial(context)
      return Either.left(failure)
    }
  }
  const open = top(context)
  if (open !== undefined) {
    const failure = fail(
      context,
      "UnbalancedContainer",
      `Unexpected end of input, ${context.stack.length} unclosed ${open.kind === "Object" ? "'{'" : "'['"}`
    )
    discardPartial(context)
    return Either.left(failure)
  }
  if (context.root === undefined) {
    return Either.left(fail(context, "EmptyInput", "Empty document"))
  }
  return Either.right(context.root)
}

const UTF8_BOM: ReadonlyArray<number> = [0xef, 0xbb, 0xbf]

const hasBom = (bytes: Uint8Array): boolean => UTF8_BOM.every((byte, index) => bytes[index] === byte)

const decodeBytes = (bytes: Uint8Array): Either.Either<{ readonly text: string; readonly byteBase: number }, JsonParseError> =>
  Either.try({
    try: () => ({
      text: new TextDecoder("utf-8", { fatal: true }).decode(bytes),
      byteBase: hasBom(bytes) ? UTF8_BOM.length : 0
    }),
    catch: () =>
      jsonParseError("InvalidEncoding", "Input is not valid UTF-8", { offset: 0, index: 0, line: 1, column: 1 })
  })

// anything but a positive safe integer falls back to the default bound
const resolveMaxDepth = (maxDepth: number | undefined): number =>
  maxDepth !== undefined && Number.isSafeInteger(maxDepth) && maxDepth >= 1 ? maxDepth : DEFAULT_MAX_DEPTH

const parseText = (text: string, byteBase: number, options: ParseOptions): Either.Either<Value, JsonParseError> =>
  run({
    input: text,
    byteBase,
    maxDepth: resolveMaxDepth(options.maxDepth),
    skipUnknown: options.skipUnknownCharacters ?? false,
    stack: [],
    index: 0,
    root: undefined
  })

/**
 * Parse one JSON document.
 *
 * @param input - Text, or UTF-8 bytes (a leading BOM is skipped).
 * @param options - Depth limit and stray-character handling.
 * @returns Either with the owned root value or a located parse error.
 *
 * @pure true
 * @invariant Left(e) → e.offset is a UTF-8 byte offset into the input
 * @complexity O(n)
 */
export const parse = (
  input: string | Uint8Array,
  options: ParseOptions = {}
): Either.Either<Value, JsonParseError> => {
  if (typeof input === "string") {
    return parseText(input, 0, options)
  }
  const decoded = decodeBytes(input)
  if (Either.isLeft(decoded)) {
    return Either.left(decoded.left)
  }
  return parseText(decoded.right.text, decoded.right.byteBase, options)
}
