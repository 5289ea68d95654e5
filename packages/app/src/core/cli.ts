import { Match } from "effect"
import * as Either from "effect/Either"

// CHANGE: implement deterministic CLI parsing for jsondoc
// WHY: keep CLI decoding pure and testable at the boundary
// QUOTE(TZ): n/a
// REF: req-cli-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → args.command ∈ Commands ∧ args.file ≠ ""
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags are rejected; exactly one input file
// COMPLEXITY: O(n) where n = argv length

export type CliCommand = "check" | "format" | "get"

export interface CliArgs {
  readonly command: CliCommand
  readonly file: string
  readonly configPath: string | undefined
  readonly configPathExplicit: boolean
  readonly indent: number | undefined
  readonly compact: boolean
  readonly write: boolean
  readonly path: string
  readonly maxDepth: number | undefined
  readonly skipUnknown: boolean | undefined
  readonly verbose: boolean
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

export const cliError = (message: string): CliError => ({ _tag: "CliError", message })

const isFlag = (value: string): boolean => value.startsWith("-") && value.length > 1

const parseBoolean = (value: string): Either.Either<boolean, CliError> => {
  if (value === "true" || value === "1") {
    return Either.right(true)
  }
  if (value === "false" || value === "0") {
    return Either.right(false)
  }
  return Either.left(cliError(`Invalid boolean value: ${value}`))
}

const parseCount = (flagName: string, minimum: number) => (value: string): Either.Either<number, CliError> => {
  const parsed = /^\d+$/u.test(value) ? Number(value) : Number.NaN
  if (!Number.isSafeInteger(parsed) || parsed < minimum) {
    return Either.left(cliError(`--${flagName} expects an integer ≥ ${minimum}, got: ${value}`))
  }
  return Either.right(parsed)
}

const parseCommand = (value: string): Either.Either<CliCommand, CliError> =>
  Match.value(value).pipe(
    Match.when("check", () => Either.right<CliCommand>("check")),
    Match.when("format", () => Either.right<CliCommand>("format")),
    Match.when("get", () => Either.right<CliCommand>("get")),
    Match.orElse(() => Either.left(cliError(`Unknown command: ${value}`)))
  )

const defaultArgs = (command: CliCommand): CliArgs => ({
  command,
  file: "",
  configPath: undefined,
  configPathExplicit: false,
  indent: undefined,
  compact: false,
  write: false,
  path: "",
  maxDepth: undefined,
  skipUnknown: undefined,
  verbose: false
})

interface FlagStep {
  readonly next: CliArgs
  readonly consumed: number
}

const readFlagValue = (
  flagName: string,
  inlineValue: string | undefined,
  nextValue: string | undefined
): Either.Either<string, CliError> => {
  if (inlineValue !== undefined) {
    return Either.right(inlineValue)
  }
  if (nextValue === undefined || isFlag(nextValue)) {
    return Either.left(cliError(`Missing value for --${flagName}`))
  }
  return Either.right(nextValue)
}

const setParsedFlag = (next: CliArgs, consumed: number): Either.Either<FlagStep, CliError> =>
  Either.right({ next, consumed })

const parseValueFlag = <A>(
  flagName: string,
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  decode: (value: string) => Either.Either<A, CliError>,
  update: (args: CliArgs, value: A) => CliArgs
): Either.Either<FlagStep, CliError> =>
  Either.flatMap(readFlagValue(flagName, inlineValue, nextValue), (raw) =>
    Either.map(decode(raw), (value) => ({
      next: update(current, value),
      consumed: inlineValue === undefined ? 2 : 1
    })))

const parseOptionalBooleanFlag = (
  current: CliArgs,
  inlineValue: string | undefined,
  update: (args: CliArgs, value: boolean) => CliArgs
): Either.Either<FlagStep, CliError> =>
  Either.map(parseBoolean(inlineValue ?? "true"), (value) => ({
    next: update(current, value),
    consumed: 1
  }))

type FlagParser = (
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined
) => Either.Either<FlagStep, CliError>

const asIs = (value: string): Either.Either<string, CliError> => Either.right(value)

const flagParsers: Record<string, FlagParser> = {
  compact: (current) => setParsedFlag({ ...current, compact: true }, 1),
  verbose: (current) => setParsedFlag({ ...current, verbose: true }, 1),
  write: (current, inlineValue) =>
    parseOptionalBooleanFlag(current, inlineValue, (args, value) => ({
      ...args,
      write: value
    })),
  "skip-unknown": (current, inlineValue) =>
    parseOptionalBooleanFlag(current, inlineValue, (args, value) => ({
      ...args,
      skipUnknown: value
    })),
  indent: (current, inlineValue, nextValue) =>
    parseValueFlag("indent", current, inlineValue, nextValue, parseCount("indent", 0), (args, value) => ({
      ...args,
      indent: value
    })),
  "max-depth": (current, inlineValue, nextValue) =>
    parseValueFlag("max-depth", current, inlineValue, nextValue, parseCount("max-depth", 1), (args, value) => ({
      ...args,
      maxDepth: value
    })),
  path: (current, inlineValue, nextValue) =>
    parseValueFlag("path", current, inlineValue, nextValue, asIs, (args, value) => ({
      ...args,
      path: value
    })),
  config: (current, inlineValue, nextValue) =>
    parseValueFlag("config", current, inlineValue, nextValue, asIs, (args, value) => ({
      ...args,
      configPath: value,
      configPathExplicit: true
    }))
}

const parseFlag = (
  raw: string,
  nextValue: string | undefined,
  current: CliArgs
): Either.Either<FlagStep, CliError> => {
  if (!raw.startsWith("--")) {
    return Either.left(cliError(`Unknown flag: ${raw}`))
  }
  const separator = raw.indexOf("=")
  const name = separator === -1 ? raw.slice(2) : raw.slice(2, separator)
  const inlineValue = separator === -1 ? undefined : raw.slice(separator + 1)
  const parser = flagParsers[name]
  if (parser === undefined) {
    return Either.left(cliError(`Unknown flag: --${name}`))
  }
  return parser(current, inlineValue, nextValue)
}

const parseArguments = (
  rawArgs: ReadonlyArray<string>,
  initial: CliArgs
): Either.Either<CliArgs, CliError> => {
  let args = initial
  let index = 1
  while (index < rawArgs.length) {
    const current = rawArgs[index]
    if (current === undefined) {
      return Either.left(cliError("Unexpected end of arguments"))
    }
    if (!isFlag(current)) {
      if (args.file.length > 0) {
        return Either.left(cliError(`Unexpected positional argument: ${current}`))
      }
      args = { ...args, file: current }
      index += 1
      continue
    }
    const parsed = parseFlag(current, rawArgs[index + 1], args)
    if (Either.isLeft(parsed)) {
      return Either.left(parsed.left)
    }
    args = parsed.right.next
    index += parsed.right.consumed
  }
  return Either.right(args)
}

/**
 * Parse CLI arguments into a typed configuration.
 *
 * @param argv - Raw process.argv array.
 * @returns Either with parsed CliArgs or CliError.
 *
 * @pure true
 * @invariant the first argument after the script is the command
 * @complexity O(n)
 */
export const parseCliArgs = (
  argv: ReadonlyArray<string>
): Either.Either<CliArgs, CliError> => {
  const rawArgs = argv.slice(2)
  const first = rawArgs[0]
  if (first === undefined || isFlag(first)) {
    return Either.left(cliError("Missing command (check | format | get)"))
  }
  return Either.flatMap(parseCommand(first), (command) =>
    Either.flatMap(parseArguments(rawArgs, defaultArgs(command)), (args) =>
      args.file.length === 0
        ? Either.left(cliError(`Missing input file for ${command}`))
        : Either.right(args)))
}
