/**
 * KeyRegistry - both directions of the key binding map.
 *
 * Forward: virtual key -> ordered key names (first one is the primary key).
 * Reverse: physical key -> virtual key, a dense slot array for single-byte
 * and extended codes plus a Map for code points.
 *
 * A physical key is bound to at most one virtual key. Every mutation updates
 * both directions before returning.
 */

import { VKEY_COUNT, isVirtualKey } from './catalog';
import { codeToName } from './codec';
import { UNICODE_KEY_OFFSET } from './key-codes';
import type { AssignResult, BindingState, PhysicalKey, VirtualKey } from './types';

/** `first()` result for an action with no keys. */
export const UNBOUND_PLACEHOLDER = 'XXX';

/** Keys file token for an explicitly cleared action. */
export const UNDEFINED_TOKEN = 'UNDEFINED';

const UNINITIALIZED: BindingState = { _tag: 'Uninitialized' };
const UNDEFINED: BindingState = { _tag: 'Undefined' };

export class KeyRegistry {
  private readonly slots: Array<VirtualKey | null>;
  private readonly extended = new Map<PhysicalKey, VirtualKey>();
  private readonly states: BindingState[];

  constructor() {
    this.slots = new Array<VirtualKey | null>(UNICODE_KEY_OFFSET).fill(null);
    this.states = new Array<BindingState>(VKEY_COUNT).fill(UNINITIALIZED);
  }

  /**
   * Bind `code` to `action`. A key already bound elsewhere is a conflict and
   * nothing changes; binding it again to the same action is a no-op.
   */
  assign(code: PhysicalKey, action: VirtualKey): AssignResult {
    if (!isVirtualKey(action)) return 'invalid';

    const name = codeToName(code);
    if (name === null) return 'invalid';

    const holder = this.lookup(code);
    if (holder !== null) {
      return holder === action ? 'ok' : 'conflict';
    }

    if (code < UNICODE_KEY_OFFSET) {
      this.slots[code] = action;
    } else {
      this.extended.set(code, action);
    }

    this.states[action] = { _tag: 'Bound', keys: [...this.bindings(action), name] };
    return 'ok';
  }

  /**
   * Unbind `code` from `action`. Leaves the action Undefined when no keys
   * remain, which is distinct from never having been configured.
   */
  remove(code: PhysicalKey, action: VirtualKey): void {
    if (!Number.isInteger(code) || code < 0 || !isVirtualKey(action)) return;

    // Only this action's own binding is cleared; a key held by another
    // action stays with it, so no key ever maps to two actions.
    if (this.lookup(code) === action) {
      if (code < UNICODE_KEY_OFFSET) {
        this.slots[code] = null;
      } else {
        this.extended.delete(code);
      }
    }

    const name = codeToName(code);
    const keys = [...this.bindings(action)];
    const index = name === null ? -1 : keys.indexOf(name);
    if (index >= 0) {
      keys.splice(index, 1);
    }

    this.states[action] = keys.length > 0 ? { _tag: 'Bound', keys } : UNDEFINED;
  }

  /** Mark a never-configured action as explicitly cleared. */
  markUndefined(action: VirtualKey): void {
    if (!isVirtualKey(action)) return;
    if (this.states[action]._tag === 'Uninitialized') {
      this.states[action] = UNDEFINED;
    }
  }

  lookup(code: PhysicalKey): VirtualKey | null {
    if (!Number.isInteger(code) || code < 0) return null;
    if (code < UNICODE_KEY_OFFSET) {
      return this.slots[code];
    }
    return this.extended.get(code) ?? null;
  }

  state(action: VirtualKey): BindingState | null {
    return isVirtualKey(action) ? this.states[action] : null;
  }

  bindings(action: VirtualKey): readonly string[] {
    const state = this.state(action);
    return state?._tag === 'Bound' ? state.keys : [];
  }

  count(action: VirtualKey): number {
    return this.bindings(action).length;
  }

  first(action: VirtualKey): string {
    return this.bindings(action)[0] ?? UNBOUND_PLACEHOLDER;
  }

  nth(action: VirtualKey, index: number): string | null {
    return this.bindings(action)[index] ?? null;
  }

  all(action: VirtualKey): string {
    const keys = this.bindings(action);
    return keys.length > 0 ? keys.join(' ') : UNDEFINED_TOKEN;
  }

  isUndefinedAny(): boolean {
    return this.states.some((state) => state._tag === 'Undefined');
  }

  isUninitializedAny(): boolean {
    return this.states.some((state) => state._tag === 'Uninitialized');
  }

  /** Drop every binding; all actions return to Uninitialized. */
  dispose(): void {
    this.slots.fill(null);
    this.extended.clear();
    this.states.fill(UNINITIALIZED);
  }
}
