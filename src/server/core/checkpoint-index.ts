import { OffsetOutOfBoundsError } from "./errors";
import { skipChars } from "./utf8";

/** Every this many characters the index records a checkpoint. */
export const DEFAULT_STRIDE = 4_096;

/**
 *  Offsets are kept in the narrowest array that can hold the file size:
 *    • Uint16Array  below 64 KiB
 *    • Uint32Array  below 4 GiB
 *    • Float64Array beyond (exact up to 2^53)
 */
export type OffsetArray = Uint16Array | Uint32Array | Float64Array;

export function toOffsetArray(values: ArrayLike<number>, max: number): OffsetArray {
  if (max < 0x1_0000) return Uint16Array.from(values);
  if (max < 0x1_0000_0000) return Uint32Array.from(values);
  return Float64Array.from(values);
}

export interface Checkpoint {
  readonly charOffset: number;
  readonly byteOffset: number;
  /** Byte width shared by every char up to the next checkpoint, 0 if mixed. */
  readonly width: number;
}

/**
 * Supplies the bytes of the file starting at `startByte`, ideally through
 * `endByte`. A shorter window is allowed; `undefined` means "not available".
 */
export type ByteWindowReader = (startByte: number, endByte: number) => Uint8Array | undefined;

export interface CheckpointIndexData {
  readonly stride: number;
  readonly totalChars: number;
  readonly totalBytes: number;
  readonly chars: OffsetArray;
  readonly bytes: OffsetArray;
  readonly widths: Uint8Array;
}

/**
 * Sparse character → byte map. Resolving an offset costs a binary search
 * plus at most `stride` characters of forward decoding, whatever the file
 * size.
 */
export class CheckpointIndex {
  readonly stride: number;
  readonly totalChars: number;
  readonly totalBytes: number;
  private readonly chars: OffsetArray;
  private readonly bytes: OffsetArray;
  private readonly widths: Uint8Array;

  constructor(data: CheckpointIndexData) {
    const { chars, bytes, widths } = data;
    if (chars.length === 0 || chars.length !== bytes.length || chars.length !== widths.length) {
      throw new RangeError("checkpoint arrays must be non-empty and of equal length");
    }
    if (chars[0] !== 0 || bytes[0] !== 0) {
      throw new RangeError("first checkpoint must sit at (0, 0)");
    }
    for (let i = 1; i < chars.length; i++) {
      if (chars[i] <= chars[i - 1] || bytes[i] <= bytes[i - 1]) {
        throw new RangeError(`checkpoint ${i} is not strictly increasing`);
      }
    }
    if (chars[chars.length - 1] >= data.totalChars || bytes[bytes.length - 1] >= data.totalBytes) {
      throw new RangeError("last checkpoint lies beyond the end of the text");
    }

    this.stride = data.stride;
    this.totalChars = data.totalChars;
    this.totalBytes = data.totalBytes;
    this.chars = chars;
    this.bytes = bytes;
    this.widths = widths;
  }

  get size(): number {
    return this.chars.length;
  }

  checkpoint(i: number): Checkpoint {
    return { charOffset: this.chars[i], byteOffset: this.bytes[i], width: this.widths[i] };
  }

  /** Index of the greatest checkpoint whose char offset is ≤ `charOffset`. */
  locate(charOffset: number): number {
    let lo = 0;
    let hi = this.chars.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >>> 1;
      if (this.chars[mid] <= charOffset) lo = mid;
      else hi = mid - 1;
    }
    return lo;
  }

  /** Byte offset where segment `i` stops: the next checkpoint or end of file. */
  segmentEnd(i: number): number {
    return i + 1 < this.bytes.length ? this.bytes[i + 1] : this.totalBytes;
  }

  /**
   * Resolve without decoding anything: the end of the text, a checkpoint
   * hit, or arithmetic inside a uniform-width segment.
   */
  resolveDirect(charOffset: number): number | undefined {
    this.assertInBounds(charOffset);
    if (charOffset === this.totalChars) return this.totalBytes;

    const i = this.locate(charOffset);
    const delta = charOffset - this.chars[i];
    if (delta === 0) return this.bytes[i];
    if (this.widths[i] > 0) return this.bytes[i] + delta * this.widths[i];
    return undefined;
  }

  /**
   * Exact byte offset of `charOffset`, decoding forward from its checkpoint
   * through bytes handed out by `read`. Undefined when `read` cannot supply
   * enough of the segment.
   */
  resolve(charOffset: number, read: ByteWindowReader): number | undefined {
    const direct = this.resolveDirect(charOffset);
    if (direct !== undefined) return direct;

    const i = this.locate(charOffset);
    const start = this.bytes[i];
    const window = read(start, this.segmentEnd(i));
    if (!window) return undefined;

    const pos = skipChars(window, 0, charOffset - this.chars[i]);
    return pos < 0 ? undefined : start + pos;
  }

  toData(): CheckpointIndexData {
    return {
      stride: this.stride,
      totalChars: this.totalChars,
      totalBytes: this.totalBytes,
      chars: this.chars,
      bytes: this.bytes,
      widths: this.widths,
    };
  }

  private assertInBounds(charOffset: number): void {
    if (!Number.isInteger(charOffset) || charOffset < 0 || charOffset > this.totalChars) {
      throw new OffsetOutOfBoundsError(charOffset, this.totalChars);
    }
  }
}
