/**
 * KeyBindingsStore service: keys file creation, loading, default fill and
 * saving for a KeyRegistry.
 */
import path from "node:path"
import { Context, Effect, Layer } from "effect"
import { KeysFileCreateError, KeysStorageError } from "../errors"
import { AppConfig } from "../Config"
import { FileSystem } from "./FileSystem"
import type { KeyRegistry } from "../../core/keys/registry"
import type { TextSink } from "../../core/keys/types"
import {
  checkMissing,
  checkUndefined,
  dumpDefaults,
  fillMissing,
  loadBindings,
  saveBindings,
  type FillResult,
  type KeyLoadIssue,
} from "../../core/keys/config-io"

// =============================================================================
// Types
// =============================================================================

export interface KeysInitReport {
  /** The keys file did not exist and was written from the defaults */
  readonly created: boolean
  readonly issues: ReadonlyArray<KeyLoadIssue>
  /** Result of the default fill, or null when nothing was missing */
  readonly fill: FillResult | null
  readonly hasUndefined: boolean
}

function collectText(write: (sink: TextSink) => void): string {
  const chunks: string[] = []
  write({ write: (text) => chunks.push(text) })
  return chunks.join("")
}

// =============================================================================
// KeyBindingsStore Service
// =============================================================================

export class KeyBindingsStore extends Context.Tag("@termkeys/KeyBindingsStore")<
  KeyBindingsStore,
  {
    /** Write the catalog defaults to the keys file */
    readonly dumpDefaults: () => Effect.Effect<void, KeysFileCreateError>
    /** Replay the keys file into the registry */
    readonly load: (
      registry: KeyRegistry
    ) => Effect.Effect<ReadonlyArray<KeyLoadIssue>, KeysStorageError>
    /** Write the registry's live bindings to the keys file */
    readonly save: (registry: KeyRegistry) => Effect.Effect<void, KeysStorageError>
    /** Bind defaults to never-configured actions and report the outcome */
    readonly fillMissing: (registry: KeyRegistry) => Effect.Effect<FillResult>
    /** Startup sequence: create if missing, load, fill, save if filled */
    readonly initialize: (
      registry: KeyRegistry
    ) => Effect.Effect<KeysInitReport, KeysFileCreateError | KeysStorageError>
  }
>() {
  static readonly layer = Layer.effect(
    KeyBindingsStore,
    Effect.gen(function* () {
      const config = yield* AppConfig
      const fs = yield* FileSystem
      const keysPath = config.keysFilePath

      const dumpDefaultsToFile = Effect.fn("KeyBindingsStore.dumpDefaults")(function* () {
        yield* Effect.gen(function* () {
          yield* fs.ensureDir(path.dirname(keysPath))
          yield* fs.writeText(keysPath, collectText((sink) => dumpDefaults(sink)))
        }).pipe(
          Effect.mapError((error) =>
            KeysFileCreateError.make({ path: keysPath, cause: error })
          )
        )
      })

      const load = Effect.fn("KeyBindingsStore.load")(function* (registry: KeyRegistry) {
        const text = yield* fs.readText(keysPath)
        const issues = loadBindings(registry, text)
        for (const issue of issues) {
          yield* Effect.logWarning(`${keysPath}:${issue.line}: ${issue.message}`)
        }
        return issues
      })

      const save = Effect.fn("KeyBindingsStore.save")(function* (registry: KeyRegistry) {
        yield* fs.ensureDir(path.dirname(keysPath))
        yield* fs.writeText(keysPath, collectText((sink) => saveBindings(registry, sink)))
      })

      const fillMissingWithReport = Effect.fn("KeyBindingsStore.fillMissing")(function* (
        registry: KeyRegistry
      ) {
        const result = fillMissing(registry)
        if (result.status === "conflict") {
          yield* Effect.logWarning(
            `Default keys for "${result.label}" are already in use; bind it from the key configuration menu.`
          )
        } else if (result.count > 0) {
          yield* Effect.logWarning(`Default key(s) assigned to ${result.count} action(s).`)
        }
        return result
      })

      const initialize = Effect.fn("KeyBindingsStore.initialize")(function* (
        registry: KeyRegistry
      ) {
        const created = !(yield* fs.exists(keysPath))
        if (created) {
          yield* dumpDefaultsToFile()
          yield* Effect.logInfo(`Created default keys file at ${keysPath}`)
        }

        const issues = yield* load(registry)

        let fill: FillResult | null = null
        if (checkMissing(registry)) {
          fill = yield* fillMissingWithReport(registry)
          if (fill.status === "filled" && fill.count > 0) {
            yield* save(registry)
          }
        }

        const hasUndefined = checkUndefined(registry)
        if (hasUndefined) {
          yield* Effect.logWarning("Some actions do not have any associated key bindings!")
        }

        return { created, issues, fill, hasUndefined }
      })

      return KeyBindingsStore.of({
        dumpDefaults: dumpDefaultsToFile,
        load,
        save,
        fillMissing: fillMissingWithReport,
        initialize,
      })
    })
  )
}
