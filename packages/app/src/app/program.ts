import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Effect, Logger, LogLevel, Match } from "effect"
import * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { CliArgs } from "../core/cli.js"
import { parseCliArgs } from "../core/cli.js"
import type { ResolvedConfig } from "../core/config.js"
import { resolveConfig, serializeOptionsFor } from "../core/config.js"
import { type AppError, formatAppError, pathNotFound } from "../core/errors.js"
import { resolvePath } from "../core/path.js"
import { serialize } from "../core/serialize.js"
import type { Value } from "../core/value.js"
import { destroy } from "../core/value.js"
import { loadConfigFile } from "../shell/config-file.js"
import { readDocument, writeDocument } from "../shell/document-file.js"

// CHANGE: orchestrate check/format/get with functional core + imperative shell
// WHY: enforce single entrypoint with typed errors and deterministic outputs
// QUOTE(TZ): n/a
// REF: req-program-1
// SOURCE: n/a
// FORMAT THEOREM: ∀cmd: run(cmd) returns exitCode ∈ {0,1,2}
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, FileSystem>
// INVARIANT: output emitted at most once; the loaded tree is destroyed before returning
// COMPLEXITY: O(n)

export interface ProgramResult {
  readonly output: string
  readonly exitCode: number
}

export const DEFAULT_CONFIG_PATH = "./.jsondocrc.json"

const writeStdout = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(payload.endsWith("\n") ? payload : `${payload}\n`)
  })

const writeStderr = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stderr.write(`${payload}\n`)
  })

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

const withDocument = <A>(
  cli: CliArgs,
  config: ResolvedConfig,
  use: (document: Value) => Effect.Effect<A, AppError, FileSystemService>
): Effect.Effect<A, AppError, FileSystemService> =>
  Effect.acquireUseRelease(
    readDocument(cli.file, config.parse),
    use,
    (document) => Effect.sync(() => destroy(document))
  )

const handleCheck = (
  cli: CliArgs,
  config: ResolvedConfig
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  withDocument(cli, config, () => Effect.succeed({ output: `${cli.file}: ok`, exitCode: 0 }))

const handleFormat = (
  cli: CliArgs,
  config: ResolvedConfig
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  withDocument(cli, config, (document) =>
    Effect.gen(function*(_) {
      const options = serializeOptionsFor(config)
      if (cli.write) {
        yield* _(writeDocument(cli.file, document, options))
        return { output: `${cli.file}: formatted`, exitCode: 0 }
      }
      return { output: serialize(document, options), exitCode: 0 }
    }))

const handleGet = (
  cli: CliArgs,
  config: ResolvedConfig
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  withDocument(cli, config, (document) =>
    Option.match(resolvePath(document, cli.path), {
      onNone: () => Effect.fail(pathNotFound(cli.path)),
      onSome: (value) => Effect.succeed({ output: serialize(value), exitCode: 0 })
    }))

const executeCommand = (
  cli: CliArgs,
  config: ResolvedConfig
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Match.value(cli.command).pipe(
    Match.when("check", () => handleCheck(cli, config)),
    Match.when("format", () => handleFormat(cli, config)),
    Match.when("get", () => handleGet(cli, config)),
    Match.exhaustive
  )

/**
 * Run a command without touching stdout/stderr.
 *
 * @param argv - process.argv array.
 * @returns ProgramResult with the text to print and the exit code.
 *
 * @pure false
 * @effect FileSystem
 * @invariant exitCode is deterministic for fixed inputs
 * @complexity O(n)
 */
export const executeCli = (
  argv: ReadonlyArray<string>
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const cli = yield* _(fromEither(parseCliArgs(argv)))
    const program = Effect.gen(function*(_) {
      const fileConfig = yield* _(loadConfigFile(cli.configPath ?? DEFAULT_CONFIG_PATH, cli.configPathExplicit))
      const config = resolveConfig(cli, fileConfig)
      yield* _(Effect.logDebug(`running ${cli.command}`).pipe(Effect.annotateLogs("file", cli.file)))
      return yield* _(executeCommand(cli, config))
    })
    return yield* _(program.pipe(Logger.withMinimumLogLevel(cli.verbose ? LogLevel.Debug : LogLevel.Info)))
  })

export const exitCodeFor = (error: AppError): number => error._tag === "PathNotFound" ? 2 : 1

/**
 * Run a command and print its output, or the failure on stderr.
 *
 * @pure false
 * @effect FileSystem, Console
 */
export const runCli = (
  argv: ReadonlyArray<string>
): Effect.Effect<ProgramResult, never, FileSystemService> =>
  executeCli(argv).pipe(
    Effect.tap((result) => writeStdout(result.output)),
    Effect.catchAll((error) =>
      writeStderr(formatAppError(error)).pipe(
        Effect.as({ output: "", exitCode: exitCodeFor(error) })
      )
    )
  )
