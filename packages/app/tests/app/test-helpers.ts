import { NodeContext } from "@effect/platform-node"
import type { PlatformError } from "@effect/platform/Error"
import { FileSystem, type FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Path, type Path as PathService } from "@effect/platform/Path"
import { Effect } from "effect"
import type { Scope } from "effect/Scope"

export interface TempContext {
  readonly fs: FileSystemService
  readonly path: PathService
  readonly tempDir: string
}

/**
 * Run `use` against a fresh temporary directory that is removed afterwards.
 */
export const withTempDir = <A, E, R>(
  use: (context: TempContext) => Effect.Effect<A, E, R>
): Effect.Effect<A, E | PlatformError, Exclude<R, Scope> | FileSystemService | PathService> =>
  Effect.scoped(
    Effect.gen(function*(_) {
      const fs = yield* _(FileSystem)
      const path = yield* _(Path)
      const tempDir = yield* _(fs.makeTempDirectoryScoped({ prefix: "jsondoc-" }))
      return yield* _(use({ fs, path, tempDir }))
    })
  )

/**
 * Write `contents` to `name` inside the temporary directory and return the full path.
 */
export const writeFixture = (
  { fs, path, tempDir }: TempContext,
  name: string,
  contents: string
): Effect.Effect<string, PlatformError> => {
  const file = path.join(tempDir, name)
  return fs.writeFileString(file, contents).pipe(Effect.as(file))
}

export const provideNodeContext = <A, E, R>(effect: Effect.Effect<A, E, R>) =>
  effect.pipe(Effect.provide(NodeContext.layer))
