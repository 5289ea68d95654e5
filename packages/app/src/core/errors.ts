import { Match } from "effect"

import type { CliError } from "./cli.js"

// CHANGE: unify error algebra for the document engine and its CLI
// WHY: provide typed failures for program flow and exit codes
// QUOTE(TZ): "parse and I/O failures propagate to the immediate caller with no partial result"
// REF: req-errors-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ AppError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique
// COMPLEXITY: O(1)/O(1)

export type ParseFailureReason =
  | "EmptyInput"
  | "InvalidEncoding"
  | "UnexpectedCharacter"
  | "InvalidLiteral"
  | "InvalidNumber"
  | "UnterminatedString"
  | "InvalidEscape"
  | "InvalidStringCharacter"
  | "UnbalancedContainer"
  | "DepthLimitExceeded"
  | "TrailingCharacters"

export interface SourceLocation {
  /** UTF-8 byte offset into the input. */
  readonly offset: number
  /** UTF-16 code unit index into the decoded text. */
  readonly index: number
  readonly line: number
  readonly column: number
}

export interface JsonParseError extends SourceLocation {
  readonly _tag: "JsonParseError"
  readonly reason: ParseFailureReason
  readonly message: string
}

export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type FileError = { readonly _tag: "FileError"; readonly message: string }
export type ParseFileError = {
  readonly _tag: "ParseError"
  readonly file: string
  readonly error: JsonParseError
}
export type PathNotFound = { readonly _tag: "PathNotFound"; readonly path: string }

export type AppError =
  | CliError
  | ConfigError
  | FileError
  | ParseFileError
  | PathNotFound

export const jsonParseError = (
  reason: ParseFailureReason,
  message: string,
  location: SourceLocation
): JsonParseError => ({
  _tag: "JsonParseError",
  reason,
  message,
  ...location
})

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const fileError = (message: string): FileError => ({
  _tag: "FileError",
  message
})

export const parseFileError = (file: string, error: JsonParseError): ParseFileError => ({
  _tag: "ParseError",
  file,
  error
})

export const pathNotFound = (path: string): PathNotFound => ({
  _tag: "PathNotFound",
  path
})

export const formatLocation = (location: SourceLocation): string =>
  `line ${location.line}, column ${location.column} (byte offset ${location.offset})`

export const formatParseError = (error: JsonParseError): string =>
  `${error.message} at ${formatLocation(error)}`

/**
 * Render any application error as a single human-readable line.
 *
 * @pure true
 * @complexity O(1)
 */
export const formatAppError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.tag("CliError", (e) => e.message),
    Match.tag("ConfigError", (e) => `Invalid config: ${e.message}`),
    Match.tag("FileError", (e) => e.message),
    Match.tag("ParseError", (e) => `${e.file}: ${formatParseError(e.error)}`),
    Match.tag("PathNotFound", (e) => `Path not found: ${e.path}`),
    Match.exhaustive
  )
