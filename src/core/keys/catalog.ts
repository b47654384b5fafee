/**
 * Virtual key catalog: the fixed, ordered list of bindable actions.
 */

import { Schema } from 'effect';
import { VirtualKeyRangeError } from '../../effect/errors';
import catalogData from './catalog.json';
import type { VirtualKey } from './types';

export const CatalogEntry = Schema.Struct({
  /** Persisted name of the action in the keys file */
  label: Schema.String,
  /** Space-separated default key names */
  binding: Schema.String,
  /** Short status bar label, translated at render time */
  statusLabel: Schema.String,
  /** One-line help text, translated at render time */
  description: Schema.String,
});
export type CatalogEntry = typeof CatalogEntry.Type;

export const KEY_CATALOG: ReadonlyArray<CatalogEntry> = Schema.decodeUnknownSync(
  Schema.Array(CatalogEntry)
)(catalogData);

export const VKEY_COUNT = KEY_CATALOG.length;

const INDEX_BY_LABEL = new Map<string, VirtualKey>(
  KEY_CATALOG.map((entry, index) => [entry.label, index])
);

export function isVirtualKey(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value < VKEY_COUNT;
}

export function findVirtualKey(label: string): VirtualKey | null {
  return INDEX_BY_LABEL.get(label) ?? null;
}

function entryAt(action: VirtualKey): CatalogEntry {
  if (!isVirtualKey(action)) {
    throw VirtualKeyRangeError.make({ index: action });
  }
  return KEY_CATALOG[action];
}

export function getLabel(action: VirtualKey): string {
  return entryAt(action).label;
}

export function getDefaultBinding(action: VirtualKey): string {
  return entryAt(action).binding;
}

export function getStatusLabel(action: VirtualKey): string {
  return entryAt(action).statusLabel;
}

export function getDescription(action: VirtualKey): string {
  return entryAt(action).description;
}

export function tokenizeBinding(binding: string): string[] {
  return binding.split(' ').filter(Boolean);
}

function requireVirtualKey(label: string): VirtualKey {
  const action = findVirtualKey(label);
  if (action === null) {
    throw new Error(`Missing catalog entry: ${label}`);
  }
  return action;
}

/** Shown in the last slot of a full hint bar page. */
export const VKEY_OTHER_COMMANDS = requireVirtualKey('generic-other-cmd');
