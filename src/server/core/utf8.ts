import { InvalidEncodingError } from "./errors";

export const LINE_FEED = 0x0a;

/** Byte width of the sequence a lead byte opens, 0 if it cannot open one. */
export function sequenceWidth(lead: number): number {
  if (lead < 0x80) return 1;
  if (lead >= 0xc2 && lead <= 0xdf) return 2;
  if (lead >= 0xe0 && lead <= 0xef) return 3;
  if (lead >= 0xf0 && lead <= 0xf4) return 4;
  return 0;
}

export function isContinuation(byte: number): boolean {
  return (byte & 0xc0) === 0x80;
}

/**
 * Walk `count` characters forward from `from` over already validated bytes.
 * Returns the offset reached, or -1 when the bytes run out first.
 */
export function skipChars(bytes: Uint8Array, from: number, count: number): number {
  let pos = from;
  for (let i = 0; i < count; i++) {
    if (pos >= bytes.length) return -1;
    pos += sequenceWidth(bytes[pos]) || 1;
  }
  return pos > bytes.length ? -1 : pos;
}

export type CharListener = (start: number, width: number, lead: number) => void;

/**
 * Incremental UTF-8 validator. Accepts exactly the well-formed byte
 * sequences of Unicode table 3-7 (no overlongs, no surrogates, nothing past
 * U+10FFFF) and reports every completed character with its absolute start
 * offset. Sequences may straddle `write` calls.
 */
export class Utf8Validator {
  private need = 0;
  private lower = 0x80;
  private upper = 0xbf;
  private lead = 0;
  private leadOffset = 0;
  private offset: number;

  constructor(startOffset = 0) {
    this.offset = startOffset;
  }

  /** Absolute offset of the next byte to be written. */
  get position(): number {
    return this.offset;
  }

  write(chunk: Uint8Array, onChar?: CharListener): void {
    const base = this.offset;

    for (let i = 0; i < chunk.length; i++) {
      const byte = chunk[i];
      const at = base + i;

      if (this.need === 0) {
        if (byte < 0x80) {
          onChar?.(at, 1, byte);
          continue;
        }
        this.open(byte, at);
        continue;
      }

      if (byte < this.lower || byte > this.upper) throw new InvalidEncodingError(at);
      this.lower = 0x80;
      this.upper = 0xbf;
      this.need--;
      if (this.need === 0) onChar?.(this.leadOffset, sequenceWidth(this.lead), this.lead);
    }

    this.offset = base + chunk.length;
  }

  /** Fails if the input stopped in the middle of a sequence. */
  end(): void {
    if (this.need > 0) throw new InvalidEncodingError(this.leadOffset);
  }

  private open(byte: number, at: number): void {
    if (byte >= 0xc2 && byte <= 0xdf) {
      this.expect(1, 0x80, 0xbf);
    } else if (byte === 0xe0) {
      this.expect(2, 0xa0, 0xbf);
    } else if (byte === 0xed) {
      this.expect(2, 0x80, 0x9f);
    } else if (byte >= 0xe1 && byte <= 0xef) {
      this.expect(2, 0x80, 0xbf);
    } else if (byte === 0xf0) {
      this.expect(3, 0x90, 0xbf);
    } else if (byte === 0xf4) {
      this.expect(3, 0x80, 0x8f);
    } else if (byte >= 0xf1 && byte <= 0xf3) {
      this.expect(3, 0x80, 0xbf);
    } else {
      throw new InvalidEncodingError(at);
    }
    this.lead = byte;
    this.leadOffset = at;
  }

  private expect(need: number, lower: number, upper: number): void {
    this.need = need;
    this.lower = lower;
    this.upper = upper;
  }
}

/** Throws InvalidEncodingError (offset relative to `baseOffset`) unless `bytes` is complete UTF-8. */
export function validateUtf8(bytes: Uint8Array, baseOffset = 0): void {
  const validator = new Utf8Validator(baseOffset);
  validator.write(bytes);
  validator.end();
}
