/**
 * Keybinding core: catalog, codec, registry, input reader, keys file I/O and
 * status bar presentation.
 */

export type {
  AssignResult,
  BindingState,
  InputSource,
  InputUnit,
  KeyCommand,
  PhysicalKey,
  TextSink,
  Translate,
  VirtualKey,
} from './keys/types';

export {
  CatalogEntry,
  KEY_CATALOG,
  VKEY_COUNT,
  VKEY_OTHER_COMMANDS,
  findVirtualKey,
  getDefaultBinding,
  getDescription,
  getLabel,
  getStatusLabel,
  isVirtualKey,
  tokenizeBinding,
} from './keys/catalog';

export {
  ASCII_KEY_LIMIT,
  ESCAPE,
  EXTENDED_KEY_BASE,
  EXTENDED_KEY_LIMIT,
  KEY_NAMES,
  KEY_RESIZE,
  NO_KEY,
  RETURN,
  SPACE,
  TAB,
  UNICODE_KEY_OFFSET,
  extendedKey,
  isExtendedKey,
  isUnicodeKey,
  type ExtendedEvent,
} from './keys/key-codes';

export { codeToName, nameToCode } from './keys/codec';
export { REPLACEMENT_CHARACTER, decodeUtf8, encodeUtf8, utf8SequenceLength } from './keys/utf8';
export { KeyRegistry, UNBOUND_PLACEHOLDER, UNDEFINED_TOKEN } from './keys/registry';

export {
  StreamInputSource,
  createStreamInputSource,
  readCommand,
  readKey,
  waitForAnyKey,
} from './keys/input-reader';

export {
  KEYS_FILE_INTRO,
  checkMissing,
  checkUndefined,
  dumpDefaults,
  fillMissing,
  fillMissingCode,
  loadBindings,
  saveBindings,
  type FillResult,
  type KeyLoadIssue,
  type KeyLoadIssueReason,
} from './keys/config-io';

export {
  chopToWidth,
  displayWidth,
  renderHintBar,
  renderInfoPopup,
  type ConfigMenuEntry,
  type HintBarOptions,
  type HintItem,
  type InfoPopupOptions,
  type PopupHost,
  type PopupSpec,
  type PopupWindow,
  type StatusSurface,
  type TextStyle,
} from './keys/presentation';
