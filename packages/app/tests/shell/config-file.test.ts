import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { decodeConfig, loadConfigFile } from "../../src/shell/config-file.js"
import { provideNodeContext, withTempDir } from "../app/test-helpers.js"

describe("decodeConfig", () => {
  it.effect("keeps only the fields that are present", () =>
    Effect.gen(function*(_) {
      const config = yield* _(decodeConfig("{\"maxDepth\": 5, \"indent\": 0}"))
      expect(config).toEqual({ maxDepth: 5, indent: 0 })
    }))

  it.effect("rejects out-of-range values and invalid JSON", () =>
    Effect.gen(function*(_) {
      const tooWide = yield* _(Effect.flip(decodeConfig("{\"indent\": 11}")))
      const notInteger = yield* _(Effect.flip(decodeConfig("{\"maxDepth\": 1.5}")))
      const notJson = yield* _(Effect.flip(decodeConfig("maxDepth = 5")))

      expect(tooWide._tag).toBe("ConfigError")
      expect(notInteger._tag).toBe("ConfigError")
      expect(notJson._tag).toBe("ConfigError")
    }))
})

describe("loadConfigFile", () => {
  it.effect("returns undefined when the default file is absent", () =>
    withTempDir(({ path, tempDir }) =>
      Effect.gen(function*(_) {
        const result = yield* _(loadConfigFile(path.join(tempDir, ".jsondocrc.json"), false))
        expect(result).toBeUndefined()
        expect(yield* _(loadConfigFile(undefined, false))).toBeUndefined()
      })
    ).pipe(provideNodeContext))

  it.effect("fails when an explicit file is absent", () =>
    withTempDir(({ path, tempDir }) =>
      Effect.gen(function*(_) {
        const file = path.join(tempDir, "custom.json")
        const error = yield* _(Effect.flip(loadConfigFile(file, true)))
        expect(error).toEqual({ _tag: "FileError", message: `Config file not found: ${file}` })
      })
    ).pipe(provideNodeContext))

  it.effect("decodes an existing file", () =>
    withTempDir(({ fs, path, tempDir }) =>
      Effect.gen(function*(_) {
        const file = path.join(tempDir, ".jsondocrc.json")
        yield* _(fs.writeFileString(file, "{\"skipUnknownCharacters\": true}"))
        const result = yield* _(loadConfigFile(file, false))
        expect(result).toEqual({ skipUnknownCharacters: true })
      })
    ).pipe(provideNodeContext))
})
