/**
 * Minimal UTF-8 helpers for terminal byte input.
 *
 * Decoding takes the sequence length from the lead byte alone and never
 * throws; malformed input decodes to some code point or U+FFFD.
 */

export const REPLACEMENT_CHARACTER = 0xfffd;

export function utf8SequenceLength(lead: number): number {
  if (lead < 0x80) return 1;
  if ((lead & 0xe0) === 0xc0) return 2;
  if ((lead & 0xf0) === 0xe0) return 3;
  if ((lead & 0xf8) === 0xf0) return 4;
  // Stray continuation byte or 5/6-byte lead.
  return 1;
}

export function isValidLeadByte(lead: number): boolean {
  return lead < 0x80 || utf8SequenceLength(lead) > 1;
}

const LEAD_MASKS = [0, 0x7f, 0x1f, 0x0f, 0x07];

export function decodeUtf8(bytes: ArrayLike<number>): number {
  if (bytes.length === 0) return REPLACEMENT_CHARACTER;

  const lead = bytes[0] & 0xff;
  if (!isValidLeadByte(lead)) return REPLACEMENT_CHARACTER;

  const length = utf8SequenceLength(lead);
  let codePoint = lead & LEAD_MASKS[length];
  for (let i = 1; i < length; i += 1) {
    const next = i < bytes.length ? bytes[i] : 0;
    codePoint = (codePoint << 6) | (next & 0x3f);
  }
  return codePoint;
}

export function encodeUtf8(codePoint: number): number[] {
  if (!Number.isInteger(codePoint) || codePoint < 0 || codePoint > 0x10ffff) {
    throw new RangeError(`Invalid code point: ${codePoint}`);
  }
  if (codePoint < 0x80) {
    return [codePoint];
  }
  if (codePoint < 0x800) {
    return [0xc0 | (codePoint >> 6), 0x80 | (codePoint & 0x3f)];
  }
  if (codePoint < 0x10000) {
    return [
      0xe0 | (codePoint >> 12),
      0x80 | ((codePoint >> 6) & 0x3f),
      0x80 | (codePoint & 0x3f),
    ];
  }
  return [
    0xf0 | (codePoint >> 18),
    0x80 | ((codePoint >> 12) & 0x3f),
    0x80 | ((codePoint >> 6) & 0x3f),
    0x80 | (codePoint & 0x3f),
  ];
}
