/**
 * Conversion between physical key codes and their display names.
 */

import {
  ASCII_KEY_LIMIT,
  KEY_NAMES,
  MAX_CODE_POINT,
  RETURN,
  UNICODE_KEY_OFFSET,
  extendedKey,
} from './key-codes';
import type { PhysicalKey } from './types';

/** Names accepted from keys files written by older releases. */
const LEGACY_ALIASES = new Map<string, PhysicalKey>([
  ['^J', RETURN],
  ['KEY_HOME', extendedKey('home')],
  ['KEY_END', extendedKey('end')],
]);

const CODE_BY_NAME = new Map<string, PhysicalKey>();
KEY_NAMES.forEach((name, code) => {
  if (name && !CODE_BY_NAME.has(name)) {
    CODE_BY_NAME.set(name, code);
  }
});

export function nameToCode(name: string | null | undefined): PhysicalKey | null {
  if (!name) return null;

  const alias = LEGACY_ALIASES.get(name);
  if (alias !== undefined) return alias;

  const named = CODE_BY_NAME.get(name);
  if (named !== undefined) return named;

  // A single non-ASCII character names itself.
  const chars = Array.from(name);
  if (chars.length !== 1) return null;
  const codePoint = name.codePointAt(0);
  if (codePoint === undefined || codePoint < ASCII_KEY_LIMIT) return null;
  return codePoint + UNICODE_KEY_OFFSET;
}

export function codeToName(code: PhysicalKey): string | null {
  if (!Number.isInteger(code) || code < 0) return null;

  if (code < UNICODE_KEY_OFFSET) {
    return KEY_NAMES[code] || null;
  }

  const codePoint = code - UNICODE_KEY_OFFSET;
  if (codePoint < ASCII_KEY_LIMIT || codePoint > MAX_CODE_POINT) return null;
  return String.fromCodePoint(codePoint);
}
