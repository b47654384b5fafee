/**
 * Bridge module: plain async functions backed by Effect services, for
 * callers outside Effect (the terminal UI loop, the config menu).
 */
import { Cause, Effect, Exit, Option } from "effect"
import { runEffect, runEffectExit, runEffectIgnore } from "./runtime"
import { KeyBindingsStore, type KeysInitReport } from "./services"
import { KeyRegistry } from "../core/keys/registry"

const EXIT_FATAL = 1

export interface KeyBindingsBootstrap {
  readonly registry: KeyRegistry
  readonly report: KeysInitReport
}

function exitFatal(message: string): never {
  console.error(message)
  process.exit(EXIT_FATAL)
}

/**
 * Build the registry from the keys file, creating the file on first run.
 * Not being able to create the keys file ends the process.
 */
export async function bootstrapKeyBindings(
  onFatal: (message: string) => never = exitFatal
): Promise<KeyBindingsBootstrap> {
  const registry = new KeyRegistry()
  const exit = await runEffectExit(
    Effect.gen(function* () {
      const store = yield* KeyBindingsStore
      return yield* store.initialize(registry)
    })
  )

  if (Exit.isSuccess(exit)) {
    return { registry, report: exit.value }
  }

  const failure = Cause.failureOption(exit.cause)
  if (Option.isSome(failure) && failure.value._tag === "KeysFileCreateError") {
    return onFatal(`FATAL ERROR: could not create default keys file ${failure.value.path}.`)
  }
  throw Cause.squash(exit.cause)
}

/** Persist the registry, e.g. when leaving the key configuration menu. */
export async function saveKeyBindings(registry: KeyRegistry): Promise<void> {
  await runEffect(
    Effect.gen(function* () {
      const store = yield* KeyBindingsStore
      yield* store.save(registry)
    })
  )
}

/** Persist the registry, logging instead of throwing on failure. */
export function saveKeyBindingsQuietly(registry: KeyRegistry): Promise<void> {
  return runEffectIgnore(
    Effect.gen(function* () {
      const store = yield* KeyBindingsStore
      yield* store.save(registry)
    })
  )
}
