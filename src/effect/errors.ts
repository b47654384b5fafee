/**
 * Domain errors with Schema.TaggedError for type-safe, serializable errors.
 */
import { Schema } from "effect"

// =============================================================================
// Keys File Errors
// =============================================================================

/** The default keys file could not be created. Fatal at first run. */
export class KeysFileCreateError extends Schema.TaggedError<KeysFileCreateError>()(
  "KeysFileCreateError",
  {
    path: Schema.String,
    cause: Schema.Defect,
  }
) {}

/** Keys file I/O error */
export class KeysStorageError extends Schema.TaggedError<KeysStorageError>()(
  "KeysStorageError",
  {
    operation: Schema.Literal("read", "write"),
    path: Schema.String,
    cause: Schema.Defect,
  }
) {}

/** Union of all keys file errors */
export const KeysFileError = Schema.Union(KeysFileCreateError, KeysStorageError)
export type KeysFileError = typeof KeysFileError.Type

// =============================================================================
// Catalog Errors
// =============================================================================

/** A virtual key index outside the catalog reached a catalog accessor */
export class VirtualKeyRangeError extends Schema.TaggedError<VirtualKeyRangeError>()(
  "VirtualKeyRangeError",
  {
    index: Schema.Number,
  }
) {}

// =============================================================================
// Input Errors
// =============================================================================

/** An input source was read after it ran out of units */
export class InputExhaustedError extends Schema.TaggedError<InputExhaustedError>()(
  "InputExhaustedError",
  {
    source: Schema.String,
  }
) {}
