/**
 * FileSystem service for the text files the keybinding core persists.
 */
import fs from "node:fs/promises"
import { Context, Effect, Layer } from "effect"
import { KeysStorageError } from "../errors"

// =============================================================================
// FileSystem Service
// =============================================================================

export interface FileSystemShape {
  /** Check if a file or directory exists */
  readonly exists: (path: string) => Effect.Effect<boolean>

  /** Ensure a directory exists (creates recursively if needed) */
  readonly ensureDir: (path: string) => Effect.Effect<void, KeysStorageError>

  /** Read raw text from a file */
  readonly readText: (path: string) => Effect.Effect<string, KeysStorageError>

  /** Write raw text to a file */
  readonly writeText: (
    path: string,
    content: string
  ) => Effect.Effect<void, KeysStorageError>
}

export class FileSystem extends Context.Tag("@termkeys/FileSystem")<
  FileSystem,
  FileSystemShape
>() {
  /** Production layer - uses node:fs/promises */
  static readonly layer = Layer.sync(FileSystem, () => {
    const exists = (path: string): Effect.Effect<boolean> =>
      Effect.tryPromise({
        try: async () => {
          await fs.access(path)
          return true
        },
        catch: () => false,
      }).pipe(Effect.merge)

    const ensureDir = (path: string): Effect.Effect<void, KeysStorageError> =>
      Effect.tryPromise({
        try: async () => {
          await fs.mkdir(path, { recursive: true })
        },
        catch: (error) =>
          KeysStorageError.make({ operation: "write", path, cause: error }),
      })

    const readText = (path: string): Effect.Effect<string, KeysStorageError> =>
      Effect.tryPromise({
        try: () => fs.readFile(path, "utf8"),
        catch: (error) =>
          KeysStorageError.make({ operation: "read", path, cause: error }),
      })

    const writeText = (
      path: string,
      content: string
    ): Effect.Effect<void, KeysStorageError> =>
      Effect.tryPromise({
        try: () => fs.writeFile(path, content, "utf8"),
        catch: (error) =>
          KeysStorageError.make({ operation: "write", path, cause: error }),
      })

    return FileSystem.of({ exists, ensureDir, readText, writeText })
  })

  /**
   * In-memory file system for tests. With `readOnly` every write fails,
   * as on a configuration directory without write permission.
   */
  static memoryLayer(options: { readOnly?: boolean; files?: Record<string, string> } = {}) {
    return Layer.sync(FileSystem, () => {
      const files = new Map<string, string>(Object.entries(options.files ?? {}))
      const directories = new Set<string>()

      const denied = (path: string) =>
        KeysStorageError.make({
          operation: "write",
          path,
          cause: new Error("Permission denied"),
        })

      const exists = (path: string): Effect.Effect<boolean> =>
        Effect.succeed(files.has(path) || directories.has(path))

      const ensureDir = (path: string): Effect.Effect<void, KeysStorageError> =>
        options.readOnly
          ? Effect.fail(denied(path))
          : Effect.sync(() => {
              directories.add(path)
            })

      const readText = (path: string): Effect.Effect<string, KeysStorageError> =>
        Effect.gen(function* () {
          const content = files.get(path)
          if (content === undefined) {
            return yield* KeysStorageError.make({
              operation: "read",
              path,
              cause: new Error("File not found"),
            })
          }
          return content
        })

      const writeText = (
        path: string,
        content: string
      ): Effect.Effect<void, KeysStorageError> =>
        options.readOnly
          ? Effect.fail(denied(path))
          : Effect.sync(() => {
              files.set(path, content)
            })

      return FileSystem.of({ exists, ensureDir, readText, writeText })
    })
  }

  /** Test layer - empty in-memory file system */
  static readonly testLayer = FileSystem.memoryLayer()
}
