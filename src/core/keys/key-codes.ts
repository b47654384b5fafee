/**
 * Physical key identities and the cached display-name table.
 *
 * Codes are split into three disjoint ranges:
 *  - `0..ASCII_KEY_LIMIT-1`: single-byte characters
 *  - `EXTENDED_KEY_BASE..EXTENDED_KEY_LIMIT-1`: non-character terminal events
 *  - `UNICODE_KEY_OFFSET + codePoint`: multi-byte characters
 */

import type { PhysicalKey } from './types';

export const NO_KEY: PhysicalKey = -1;

export const ASCII_KEY_LIMIT = 128;

export const TAB = 9;
export const RETURN = 10;
export const ESCAPE = 27;
export const SPACE = 32;
export const DELETE_CHAR = 127;

interface ExtendedEventDef {
  event: string;
  name: string;
  shortName?: string;
}

const EXTENDED_EVENTS = [
  { event: 'down', name: 'KEY_DOWN', shortName: 'DWN' },
  { event: 'up', name: 'KEY_UP', shortName: 'UP' },
  { event: 'left', name: 'KEY_LEFT', shortName: 'LFT' },
  { event: 'right', name: 'KEY_RIGHT', shortName: 'RGT' },
  { event: 'home', name: 'KEY_HOME', shortName: 'HOM' },
  { event: 'backspace', name: 'KEY_BACKSPACE' },
  { event: 'f1', name: 'KEY_F(1)', shortName: 'F1' },
  { event: 'f2', name: 'KEY_F(2)', shortName: 'F2' },
  { event: 'f3', name: 'KEY_F(3)', shortName: 'F3' },
  { event: 'f4', name: 'KEY_F(4)', shortName: 'F4' },
  { event: 'f5', name: 'KEY_F(5)', shortName: 'F5' },
  { event: 'f6', name: 'KEY_F(6)', shortName: 'F6' },
  { event: 'f7', name: 'KEY_F(7)', shortName: 'F7' },
  { event: 'f8', name: 'KEY_F(8)', shortName: 'F8' },
  { event: 'f9', name: 'KEY_F(9)', shortName: 'F9' },
  { event: 'f10', name: 'KEY_F(10)', shortName: 'F10' },
  { event: 'f11', name: 'KEY_F(11)', shortName: 'F11' },
  { event: 'f12', name: 'KEY_F(12)', shortName: 'F12' },
  { event: 'delete', name: 'KEY_DC', shortName: 'DEL' },
  { event: 'insert', name: 'KEY_IC', shortName: 'INS' },
  { event: 'pagedown', name: 'KEY_NPAGE', shortName: 'PgD' },
  { event: 'pageup', name: 'KEY_PPAGE', shortName: 'PgU' },
  { event: 'enter', name: 'KEY_ENTER' },
  { event: 'backtab', name: 'KEY_BTAB' },
  { event: 'end', name: 'KEY_END', shortName: 'END' },
  { event: 'shift-home', name: 'KEY_SHOME' },
  { event: 'shift-end', name: 'KEY_SEND' },
  { event: 'shift-left', name: 'KEY_SLEFT' },
  { event: 'shift-right', name: 'KEY_SRIGHT' },
  { event: 'resize', name: 'KEY_RESIZE' },
  { event: 'mouse', name: 'KEY_MOUSE' },
] as const satisfies readonly ExtendedEventDef[];

export type ExtendedEvent = (typeof EXTENDED_EVENTS)[number]['event'];

export const EXTENDED_KEY_BASE = ASCII_KEY_LIMIT;
export const EXTENDED_KEY_LIMIT = EXTENDED_KEY_BASE + EXTENDED_EVENTS.length;

/** Range 3 codes are `UNICODE_KEY_OFFSET + codePoint`. */
export const UNICODE_KEY_OFFSET = EXTENDED_KEY_LIMIT;

export const MAX_CODE_POINT = 0x10ffff;

export function extendedKey(event: ExtendedEvent): PhysicalKey {
  return EXTENDED_KEY_BASE + EXTENDED_EVENTS.findIndex((def) => def.event === event);
}

export const KEY_RESIZE = extendedKey('resize');

export function isExtendedKey(code: PhysicalKey): boolean {
  return code >= EXTENDED_KEY_BASE && code < EXTENDED_KEY_LIMIT;
}

export function isUnicodeKey(code: PhysicalKey): boolean {
  return Number.isInteger(code) && code >= UNICODE_KEY_OFFSET;
}

function asciiName(code: number): string {
  if (code === 0) return '';
  if (code < SPACE) return `^${String.fromCharCode(code + 64)}`;
  if (code === DELETE_CHAR) return '^?';
  return String.fromCharCode(code);
}

function buildKeyNames(): string[] {
  const names = new Array<string>(EXTENDED_KEY_LIMIT).fill('');

  for (let code = 1; code < ASCII_KEY_LIMIT; code += 1) {
    names[code] = asciiName(code);
  }
  EXTENDED_EVENTS.forEach((def: ExtendedEventDef, index) => {
    names[EXTENDED_KEY_BASE + index] = def.shortName ?? def.name;
  });

  names[TAB] = 'TAB';
  names[RETURN] = 'RET';
  names[ESCAPE] = 'ESC';
  names[SPACE] = 'SPC';

  return names;
}

/** Display names for ranges 1-2; an empty slot has no printable name. */
export const KEY_NAMES: readonly string[] = buildKeyNames();
