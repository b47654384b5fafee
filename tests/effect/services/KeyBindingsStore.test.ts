/**
 * Tests for KeyBindingsStore against an in-memory file system.
 */
import { Effect, Layer } from "effect"
import { describe, expect, it } from "@effect/vitest"
import { AppConfig } from "../../../src/effect/Config"
import { FileSystem } from "../../../src/effect/services/FileSystem"
import { KeyBindingsStore } from "../../../src/effect/services/KeyBindingsStore"
import { TestAppLayer } from "../../../src/effect/runtime"
import { KEYS_FILE_INTRO } from "../../../src/core/keys/config-io"
import { VKEY_COUNT } from "../../../src/core/keys/catalog"
import { KeyRegistry } from "../../../src/core/keys/registry"
import { vkey } from "../../mocks/keys"

const KEYS_PATH = "/tmp/termkeys-test/keys"

const storeLayer = (options: { readOnly?: boolean; files?: Record<string, string> } = {}) =>
  KeyBindingsStore.layer.pipe(
    Layer.provideMerge(Layer.merge(FileSystem.memoryLayer(options), AppConfig.testLayer))
  )

describe("KeyBindingsStore", () => {
  describe("initialize", () => {
    it.effect("creates the keys file from the defaults on first run", () =>
      Effect.gen(function* () {
        const store = yield* KeyBindingsStore
        const fs = yield* FileSystem
        const registry = new KeyRegistry()

        const report = yield* store.initialize(registry)

        expect(report).toEqual({ created: true, issues: [], fill: null, hasUndefined: false })
        expect(registry.all(vkey("generic-quit"))).toBe("q Q")

        const text = yield* fs.readText(KEYS_PATH)
        expect(text.startsWith(`${KEYS_FILE_INTRO}\ngeneric-cancel  ESC\n`)).toBe(true)
      }).pipe(Effect.provide(storeLayer()))
    )

    it.effect("fills and saves actions the file leaves out", () =>
      Effect.gen(function* () {
        const store = yield* KeyBindingsStore
        const fs = yield* FileSystem
        const registry = new KeyRegistry()

        const report = yield* store.initialize(registry)

        expect(report).toEqual({
          created: false,
          issues: [],
          fill: { status: "filled", count: VKEY_COUNT - 2 },
          hasUndefined: true,
        })

        const text = yield* fs.readText(KEYS_PATH)
        expect(text).toContain("\nadd-item  UNDEFINED\n")
        expect(text).toContain("\nmove-down  j\n")
        expect(text).toContain("\ngeneric-quit  q Q\n")
      }).pipe(
        Effect.provide(
          storeLayer({ files: { [KEYS_PATH]: "add-item  UNDEFINED\nmove-down  j\n" } })
        )
      )
    )

    it.effect("leaves the file alone when a default is already taken", () =>
      Effect.gen(function* () {
        const store = yield* KeyBindingsStore
        const fs = yield* FileSystem
        const registry = new KeyRegistry()

        const report = yield* store.initialize(registry)

        expect(report.fill).toEqual({
          status: "conflict",
          index: vkey("add-item"),
          label: "add-item",
        })
        expect(yield* fs.readText(KEYS_PATH)).toBe("del-item  a\n")
      }).pipe(Effect.provide(storeLayer({ files: { [KEYS_PATH]: "del-item  a\n" } })))
    )

    it.effect("fails when the default file cannot be created", () =>
      Effect.gen(function* () {
        const store = yield* KeyBindingsStore

        const error = yield* Effect.flip(store.initialize(new KeyRegistry()))

        expect(error._tag).toBe("KeysFileCreateError")
        expect(error.path).toBe(KEYS_PATH)
      }).pipe(Effect.provide(storeLayer({ readOnly: true })))
    )
  })

  describe("TestAppLayer", () => {
    it.effect("wires the store to the in-memory file system", () =>
      Effect.gen(function* () {
        const store = yield* KeyBindingsStore

        const first = yield* store.initialize(new KeyRegistry())
        const second = yield* store.initialize(new KeyRegistry())

        expect(first.created).toBe(true)
        expect(second).toEqual({ created: false, issues: [], fill: null, hasUndefined: false })
      }).pipe(Effect.provide(Layer.fresh(TestAppLayer)))
    )
  })

  describe("load", () => {
    it.effect("returns the issues found in the file", () =>
      Effect.gen(function* () {
        const store = yield* KeyBindingsStore
        const registry = new KeyRegistry()

        const issues = yield* store.load(registry)

        expect(issues.map((issue) => [issue.line, issue.reason])).toEqual([
          [1, "unknown-label"],
          [2, "unknown-key"],
        ])
        expect(registry.all(vkey("add-item"))).toBe("a")
      }).pipe(
        Effect.provide(
          storeLayer({ files: { [KEYS_PATH]: "no-such-action  x\nadd-item  a NOPE\n" } })
        )
      )
    )

    it.effect("fails with a read error when the file is missing", () =>
      Effect.gen(function* () {
        const store = yield* KeyBindingsStore

        const error = yield* Effect.flip(store.load(new KeyRegistry()))

        expect(error).toMatchObject({ _tag: "KeysStorageError", operation: "read", path: KEYS_PATH })
      }).pipe(Effect.provide(storeLayer()))
    )
  })

  describe("save", () => {
    it.effect("writes the live bindings", () =>
      Effect.gen(function* () {
        const store = yield* KeyBindingsStore
        const fs = yield* FileSystem
        const registry = new KeyRegistry()
        registry.assign(97, vkey("add-item"))

        yield* store.save(registry)

        const text = yield* fs.readText(KEYS_PATH)
        expect(text).toContain("\ngeneric-cancel  UNDEFINED\n")
        expect(text).toContain("\nadd-item  a\n")
      }).pipe(Effect.provide(storeLayer()))
    )
  })

  describe("fillMissing", () => {
    it.effect("reports how many actions received defaults", () =>
      Effect.gen(function* () {
        const store = yield* KeyBindingsStore
        const registry = new KeyRegistry()
        registry.markUndefined(vkey("add-item"))

        const result = yield* store.fillMissing(registry)

        expect(result).toEqual({ status: "filled", count: VKEY_COUNT - 1 })
      }).pipe(Effect.provide(storeLayer()))
    )
  })
})
