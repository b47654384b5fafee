/**
 * Reads logical key events from terminal input and resolves them to
 * virtual keys, including vi-style count and register prefixes.
 */

import type { Readable } from 'node:stream';
import { InputExhaustedError } from '../../effect/errors';
import { ASCII_KEY_LIMIT, KEY_RESIZE, UNICODE_KEY_OFFSET } from './key-codes';
import type { KeyRegistry } from './registry';
import type { InputSource, InputUnit, KeyCommand, PhysicalKey } from './types';
import { REPLACEMENT_CHARACTER, decodeUtf8, isValidLeadByte, utf8SequenceLength } from './utf8';

const CHAR_0 = 0x30;
const CHAR_1 = 0x31;
const CHAR_9 = 0x39;
const CHAR_A = 0x61;
const CHAR_Z = 0x7a;
const CHAR_QUOTE = 0x22;

/** Registers `a`..`z` follow the numbered registers 1..9. */
const FIRST_LETTER_REGISTER = 10;

const MAX_COUNT = Number.MAX_SAFE_INTEGER;

/**
 * Read one key. Extended events and single bytes come back as they are;
 * a multi-byte character is assembled from continuation units and offset
 * into the code point range.
 */
export async function readKey(source: InputSource): Promise<PhysicalKey> {
  const unit = await source.read();
  if (unit.type === 'event') return unit.key;

  const lead = unit.value & 0xff;
  if (lead < ASCII_KEY_LIMIT) return lead;
  if (!isValidLeadByte(lead)) return REPLACEMENT_CHARACTER + UNICODE_KEY_OFFSET;

  const bytes = [lead];
  const length = utf8SequenceLength(lead);
  while (bytes.length < length) {
    const next = await source.read();
    // An event cuts the character short; the event wins.
    if (next.type === 'event') return next.key;
    bytes.push(next.value & 0xff);
  }
  return decodeUtf8(bytes) + UNICODE_KEY_OFFSET;
}

export function waitForAnyKey(source: InputSource): Promise<PhysicalKey> {
  return readKey(source);
}

function isDigit(key: PhysicalKey, from: number): boolean {
  return key >= from && key <= CHAR_9;
}

/**
 * Read a command: `[count]["register]key`. A leading `0` is a key of its
 * own, not a count. The resize event bypasses the registry.
 */
export async function readCommand(
  registry: KeyRegistry,
  source: InputSource,
  options: { prefixes?: boolean } = {}
): Promise<KeyCommand> {
  let count = 0;
  let register = 0;
  let key = await readKey(source);

  if (options.prefixes ?? true) {
    while ((key === CHAR_0 && count > 0) || isDigit(key, CHAR_1)) {
      count = Math.min(count * 10 + (key - CHAR_0), MAX_COUNT);
      key = await readKey(source);
    }

    if (key === CHAR_QUOTE) {
      const selector = await readKey(source);
      if (isDigit(selector, CHAR_1)) {
        register = selector - CHAR_1 + 1;
      } else if (selector >= CHAR_A && selector <= CHAR_Z) {
        register = selector - CHAR_A + FIRST_LETTER_REGISTER;
      }
      key = await readKey(source);
    }
  }

  if (count === 0) count = 1;

  if (key === KEY_RESIZE) {
    return { type: 'resize' };
  }

  return { type: 'action', key, action: registry.lookup(key), count, register };
}

/**
 * InputSource over a Node readable stream (usually stdin in raw mode).
 * Extended events are pushed by the host's terminal layer.
 */
export class StreamInputSource implements InputSource {
  private readonly queue: InputUnit[] = [];
  private readonly waiters: Array<{
    resolve: (unit: InputUnit) => void;
    reject: (error: unknown) => void;
  }> = [];
  private ended = false;
  private failure: Error | null = null;

  private readonly onData = (chunk: Buffer | string): void => {
    const bytes = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
    for (const value of bytes) {
      this.push({ type: 'byte', value });
    }
  };

  private readonly onEnd = (): void => {
    this.ended = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(this.endReason());
    }
  };

  private readonly onError = (error: Error): void => {
    if (this.failure === null) this.failure = error;
    this.onEnd();
  };

  constructor(private readonly stream: Readable) {
    stream.on('data', this.onData);
    stream.on('end', this.onEnd);
    // A destroyed stream emits close without end.
    stream.on('close', this.onEnd);
    stream.on('error', this.onError);
  }

  pushEvent(key: PhysicalKey): void {
    this.push({ type: 'event', key });
  }

  read(): Promise<InputUnit> {
    const unit = this.queue.shift();
    if (unit) return Promise.resolve(unit);
    if (this.ended) return Promise.reject(this.endReason());
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  close(): void {
    this.stream.off('data', this.onData);
    this.stream.off('end', this.onEnd);
    this.stream.off('close', this.onEnd);
    this.stream.off('error', this.onError);
    this.onEnd();
  }

  private endReason(): unknown {
    return this.failure ?? InputExhaustedError.make({ source: 'stream' });
  }

  private push(unit: InputUnit): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(unit);
    } else {
      this.queue.push(unit);
    }
  }
}

export function createStreamInputSource(stream: Readable): StreamInputSource {
  return new StreamInputSource(stream);
}
