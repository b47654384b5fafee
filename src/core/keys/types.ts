/**
 * Shared key types.
 */

/**
 * Integer identity of a keyboard key: a single-byte code, an extended
 * terminal event, or an offset code point. See `key-codes.ts`.
 */
export type PhysicalKey = number;

/** Index into the virtual key catalog. */
export type VirtualKey = number;

export type BindingState =
  | { readonly _tag: 'Uninitialized' }
  | { readonly _tag: 'Undefined' }
  | { readonly _tag: 'Bound'; readonly keys: readonly string[] };

export type AssignResult = 'ok' | 'conflict' | 'invalid';

export type Translate = (message: string) => string;

export type InputUnit =
  | { readonly type: 'byte'; readonly value: number }
  | { readonly type: 'event'; readonly key: PhysicalKey };

/** Source of terminal input. `read` resolves once a unit is available. */
export interface InputSource {
  read(): Promise<InputUnit>;
}

export type KeyCommand =
  | { readonly type: 'resize' }
  | {
      readonly type: 'action';
      readonly key: PhysicalKey;
      readonly action: VirtualKey | null;
      readonly count: number;
      readonly register: number;
    };

export interface TextSink {
  write(text: string): unknown;
}
