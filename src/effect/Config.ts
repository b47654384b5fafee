/**
 * Application configuration service using Effect.Config.
 */
import path from "node:path"
import { Config, Context, Effect, Layer, Option } from "effect"

// =============================================================================
// Config Service
// =============================================================================

/** Application configuration */
export interface AppConfigShape {
  /** Directory holding the keys file and config.toml */
  readonly configDir: string
  readonly keysFilePath: string
}

const KEYS_FILE_NAME = "keys"

export class AppConfig extends Context.Tag("@termkeys/AppConfig")<
  AppConfig,
  AppConfigShape
>() {
  /** Production layer - reads from environment with sensible defaults */
  static readonly layer = Layer.effect(
    AppConfig,
    Effect.gen(function* () {
      const home = yield* Config.string("HOME").pipe(
        Config.orElse(() => Config.string("USERPROFILE")),
        Config.orElse(() => Config.succeed("/tmp"))
      )

      const xdgConfigHome = yield* Config.option(Config.string("XDG_CONFIG_HOME"))
      const configDirOverride = yield* Config.option(Config.string("TERMKEYS_CONFIG_DIR"))

      const configDir = Option.getOrElse(configDirOverride, () =>
        path.join(
          Option.getOrElse(xdgConfigHome, () => path.join(home, ".config")),
          "termkeys"
        )
      )

      return AppConfig.of({
        configDir,
        keysFilePath: path.join(configDir, KEYS_FILE_NAME),
      })
    })
  )

  /** Test layer - hardcoded values for testing */
  static readonly testLayer = Layer.succeed(AppConfig, {
    configDir: "/tmp/termkeys-test",
    keysFilePath: "/tmp/termkeys-test/keys",
  })
}
