export * from './core/keys';
export {
  DEFAULT_USER_CONFIG,
  applyEnvOverrides,
  getConfigDir,
  getConfigPath,
  loadUserConfigSync,
  parseUserConfig,
  stringifyUserConfig,
  type InfoPopupSettings,
  type StatusBarSettings,
  type UserConfig,
} from './core/user-config';
export {
  InputExhaustedError,
  KeysFileCreateError,
  KeysStorageError,
  VirtualKeyRangeError,
} from './effect/errors';
export { AppConfig, type AppConfigShape } from './effect/Config';
export { FileSystem, KeyBindingsStore, type KeysInitReport } from './effect/services';
export {
  bootstrapKeyBindings,
  saveKeyBindings,
  saveKeyBindingsQuietly,
  type KeyBindingsBootstrap,
} from './effect/bridge';
export { AppLayer, TestAppLayer, disposeRuntime } from './effect/runtime';
