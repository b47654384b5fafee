/**
 * Keys file format: defaults dump, live save, replay into a registry, and
 * default fill for actions the file does not mention.
 *
 * One record per line: `<label>  <key names>`, or `<label>  UNDEFINED` for
 * an action the user cleared.
 */

import {
  KEY_CATALOG,
  VKEY_COUNT,
  findVirtualKey,
  getLabel,
  tokenizeBinding,
} from './catalog';
import { nameToCode } from './codec';
import { UNDEFINED_TOKEN, type KeyRegistry } from './registry';
import type { TextSink, Translate, VirtualKey } from './types';

export const KEYS_FILE_INTRO =
  '#\n' +
  '# termkeys keys configuration file\n' +
  '#\n' +
  '# In this file the keybindings used by termkeys are defined.\n' +
  '# It is generated automatically by termkeys and is maintained\n' +
  '# via the key configuration menu of the interactive user\n' +
  '# interface. It should not be edited directly.\n';

const identity: Translate = (message) => message;

export type FillResult =
  | { readonly status: 'filled'; readonly count: number }
  | { readonly status: 'conflict'; readonly index: VirtualKey; readonly label: string };

export type KeyLoadIssueReason = 'unknown-label' | 'duplicate-label' | 'unknown-key' | 'conflict';

export interface KeyLoadIssue {
  line: number;
  reason: KeyLoadIssueReason;
  label: string;
  token?: string;
  message: string;
}

function writeIntro(sink: TextSink, translate: Translate): void {
  sink.write(`${translate(KEYS_FILE_INTRO)}\n`);
}

function formatRecord(label: string, keys: string): string {
  return `${label}  ${keys}\n`;
}

export function dumpDefaults(sink: TextSink, translate: Translate = identity): void {
  writeIntro(sink, translate);
  for (const entry of KEY_CATALOG) {
    sink.write(formatRecord(entry.label, entry.binding));
  }
}

export function saveBindings(
  registry: KeyRegistry,
  sink: TextSink,
  translate: Translate = identity
): void {
  writeIntro(sink, translate);
  for (let action = 0; action < VKEY_COUNT; action += 1) {
    sink.write(formatRecord(getLabel(action), registry.all(action)));
  }
}

export function checkUndefined(registry: KeyRegistry): boolean {
  return registry.isUndefinedAny();
}

export function checkMissing(registry: KeyRegistry): boolean {
  return registry.isUninitializedAny();
}

/**
 * Bind catalog defaults to every Uninitialized action, in catalog order.
 *
 * Stops at the first key that cannot be assigned. Keys assigned before that
 * point stay assigned.
 */
export function fillMissing(registry: KeyRegistry): FillResult {
  let assigned = 0;

  for (let action = 0; action < VKEY_COUNT; action += 1) {
    if (registry.state(action)?._tag !== 'Uninitialized') continue;

    const entry = KEY_CATALOG[action];
    let applied = false;
    for (const token of tokenizeBinding(entry.binding)) {
      const code = nameToCode(token);
      const result = code === null ? 'invalid' : registry.assign(code, action);
      if (result !== 'ok') {
        return { status: 'conflict', index: action, label: entry.label };
      }
      applied = true;
    }
    if (applied) assigned += 1;
  }

  return { status: 'filled', count: assigned };
}

/** `fillMissing` as a single number: the count, or minus the failing index. */
export function fillMissingCode(registry: KeyRegistry): number {
  const result = fillMissing(registry);
  return result.status === 'filled' ? result.count : -result.index;
}

/**
 * Replay a keys file into `registry`. Problem lines are reported and
 * skipped; loading carries on with the next token or line.
 */
export function loadBindings(registry: KeyRegistry, text: string): KeyLoadIssue[] {
  const issues: KeyLoadIssue[] = [];
  const seen = new Set<VirtualKey>();

  text.split(/\r?\n/).forEach((raw, index) => {
    const line = index + 1;
    const trimmed = raw.trim();
    if (!trimmed || trimmed.startsWith('#')) return;

    const [label, ...tokens] = trimmed.split(/\s+/);
    const action = findVirtualKey(label);
    if (action === null) {
      issues.push({ line, reason: 'unknown-label', label, message: `unknown action "${label}"` });
      return;
    }
    if (seen.has(action)) {
      issues.push({ line, reason: 'duplicate-label', label, message: `"${label}" is defined twice` });
      return;
    }
    seen.add(action);
    if (tokens.length === 0) {
      registry.markUndefined(action);
      return;
    }

    for (const token of tokens) {
      if (token === UNDEFINED_TOKEN) {
        registry.markUndefined(action);
        continue;
      }

      const code = nameToCode(token);
      if (code === null) {
        issues.push({
          line,
          reason: 'unknown-key',
          label,
          token,
          message: `unknown key "${token}" for "${label}"`,
        });
        continue;
      }

      if (registry.assign(code, action) === 'conflict') {
        const holder = registry.lookup(code);
        const owner = holder === null ? 'another action' : `"${getLabel(holder)}"`;
        issues.push({
          line,
          reason: 'conflict',
          label,
          token,
          message: `key "${token}" for "${label}" is already bound to ${owner}`,
        });
      }
    }
  });

  return issues;
}
