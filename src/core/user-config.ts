/**
 * User configuration loader for ~/.config/termkeys/config.toml.
 */

import fs from 'node:fs';
import path from 'node:path';
import * as TOML from '@iarna/toml';
import { Schema } from 'effect';

export interface StatusBarSettings {
  /** Columns reserved for the key of each hint */
  keyWidth: number;
  /** Columns reserved for the label of each hint */
  labelWidth: number;
}

export interface InfoPopupSettings {
  height: number;
  /** Columns left free around the popup */
  margin: number;
}

export interface UserConfig {
  statusBar: StatusBarSettings;
  infoPopup: InfoPopupSettings;
}

export const DEFAULT_USER_CONFIG: UserConfig = {
  statusBar: {
    keyWidth: 3,
    labelWidth: 8,
  },
  infoPopup: {
    height: 10,
    margin: 4,
  },
};

const UserConfigOverrides = Schema.Struct({
  statusBar: Schema.optional(
    Schema.Struct({
      keyWidth: Schema.optional(Schema.Number),
      labelWidth: Schema.optional(Schema.Number),
    })
  ),
  infoPopup: Schema.optional(
    Schema.Struct({
      height: Schema.optional(Schema.Number),
      margin: Schema.optional(Schema.Number),
    })
  ),
});
type UserConfigOverrides = typeof UserConfigOverrides.Type;

const CONFIG_FILE_NAME = 'config.toml';

type Env = Record<string, string | undefined>;

export function getConfigDir(env: Env = process.env): string {
  if (env.TERMKEYS_CONFIG_DIR) return env.TERMKEYS_CONFIG_DIR;
  const home = env.HOME ?? env.USERPROFILE;
  const base = env.XDG_CONFIG_HOME ?? (home ? path.join(home, '.config') : path.join(process.cwd(), '.config'));
  return path.join(base, 'termkeys');
}

export function getConfigPath(env: Env = process.env): string {
  return path.join(getConfigDir(env), CONFIG_FILE_NAME);
}

export function stringifyUserConfig(config: UserConfig): string {
  return TOML.stringify({
    statusBar: {
      keyWidth: config.statusBar.keyWidth,
      labelWidth: config.statusBar.labelWidth,
    },
    infoPopup: {
      height: config.infoPopup.height,
      margin: config.infoPopup.margin,
    },
  });
}

function writeDefaultConfig(configPath: string): void {
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, stringifyUserConfig(DEFAULT_USER_CONFIG), 'utf8');
}

function coerceNumber(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) return parsed;
  }
  return undefined;
}

function positiveInt(value: number | undefined, fallback: number): number {
  if (value === undefined || !Number.isFinite(value)) return fallback;
  return Math.max(1, Math.floor(value));
}

export function applyEnvOverrides(config: UserConfig, env: Env = process.env): UserConfig {
  const overridden: UserConfig = {
    ...config,
    statusBar: { ...config.statusBar },
  };

  const keyWidth = coerceNumber(env.TERMKEYS_KEY_WIDTH);
  if (keyWidth !== undefined) {
    overridden.statusBar.keyWidth = positiveInt(keyWidth, config.statusBar.keyWidth);
  }

  const labelWidth = coerceNumber(env.TERMKEYS_LABEL_WIDTH);
  if (labelWidth !== undefined) {
    overridden.statusBar.labelWidth = positiveInt(labelWidth, config.statusBar.labelWidth);
  }

  return overridden;
}

function mergeUserConfig(base: UserConfig, overrides: UserConfigOverrides): UserConfig {
  return {
    statusBar: {
      keyWidth: positiveInt(overrides.statusBar?.keyWidth, base.statusBar.keyWidth),
      labelWidth: positiveInt(overrides.statusBar?.labelWidth, base.statusBar.labelWidth),
    },
    infoPopup: {
      height: positiveInt(overrides.infoPopup?.height, base.infoPopup.height),
      margin: Math.max(0, Math.floor(overrides.infoPopup?.margin ?? base.infoPopup.margin)),
    },
  };
}

/** Parse config.toml text over the defaults. Throws on malformed input. */
export function parseUserConfig(text: string): UserConfig {
  const raw = Schema.decodeUnknownSync(UserConfigOverrides)(TOML.parse(text));
  return mergeUserConfig(DEFAULT_USER_CONFIG, raw);
}

export function loadUserConfigSync(options?: { createIfMissing?: boolean; configPath?: string }): UserConfig {
  const configPath = options?.configPath ?? getConfigPath();

  if (options?.createIfMissing && !fs.existsSync(configPath)) {
    writeDefaultConfig(configPath);
  }

  if (!fs.existsSync(configPath)) {
    return applyEnvOverrides(DEFAULT_USER_CONFIG);
  }

  try {
    return applyEnvOverrides(parseUserConfig(fs.readFileSync(configPath, 'utf8')));
  } catch (error) {
    console.warn('[termkeys] Failed to parse config, using defaults:', error);
    return applyEnvOverrides(DEFAULT_USER_CONFIG);
  }
}
