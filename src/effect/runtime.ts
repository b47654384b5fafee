/**
 * Effect runtime for the application.
 * Provides a managed runtime with all services composed.
 */
import { Effect, Layer, ManagedRuntime } from "effect"
import { AppConfig } from "./Config"
import { FileSystem, KeyBindingsStore } from "./services"

// =============================================================================
// Layer Composition
// =============================================================================

/** Keys file layer (depends on FileSystem and Config) */
const KeysLayer = KeyBindingsStore.layer.pipe(
  Layer.provide(Layer.merge(FileSystem.layer, AppConfig.layer))
)

/** Full application layer */
export const AppLayer = Layer.mergeAll(AppConfig.layer, FileSystem.layer, KeysLayer)

/** Test layer composition */
const TestKeysLayer = KeyBindingsStore.layer.pipe(
  Layer.provide(Layer.merge(FileSystem.testLayer, AppConfig.testLayer))
)

export const TestAppLayer = Layer.mergeAll(
  AppConfig.testLayer,
  FileSystem.testLayer,
  TestKeysLayer
)

// =============================================================================
// Runtime Types
// =============================================================================

/** All services provided by the app layer */
export type AppServices = AppConfig | FileSystem | KeyBindingsStore

// =============================================================================
// Managed Runtime
// =============================================================================

/** Managed runtime for the application */
export const AppRuntime = ManagedRuntime.make(AppLayer)

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Run an effect with the app runtime.
 * Returns a promise that resolves with the result.
 */
export const runEffect = <A, E>(
  effect: Effect.Effect<A, E, AppServices>
): Promise<A> => AppRuntime.runPromise(effect)

/**
 * Run an effect with the app runtime, returning Exit.
 * Useful when you need to handle errors explicitly.
 */
export const runEffectExit = <A, E>(
  effect: Effect.Effect<A, E, AppServices>
) => AppRuntime.runPromiseExit(effect)

/**
 * Run an effect and ignore errors (log them instead).
 */
export const runEffectIgnore = <A, E>(
  effect: Effect.Effect<A, E, AppServices>
): Promise<void> =>
  AppRuntime.runPromise(
    effect.pipe(
      Effect.catchAll((error) =>
        Effect.logError("Effect failed", error).pipe(Effect.asVoid)
      ),
      Effect.asVoid
    )
  )

// =============================================================================
// Runtime Lifecycle
// =============================================================================

/**
 * Dispose the app runtime.
 * Call this when shutting down the application.
 */
export const disposeRuntime = (): Promise<void> =>
  AppRuntime.dispose()
