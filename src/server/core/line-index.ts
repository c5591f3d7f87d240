import type { OffsetArray } from "./checkpoint-index";
import { LineOutOfBoundsError } from "./errors";
import { resolveRange } from "./range-resolver";

/**
 * One line of the text. The terminating "\n" belongs to the line it ends;
 * a final "\n" does not open an extra empty line.
 */
export interface LineEntry {
  readonly line: number;
  readonly startChar: number;
  readonly endChar: number;
  readonly startByte: number;
  readonly endByte: number;
}

export interface LineRange {
  readonly startLine: number;
  readonly endLine: number;
  readonly startChar: number;
  readonly endChar: number;
  readonly startByte: number;
  readonly endByte: number;
}

export interface LineIndexData {
  readonly totalChars: number;
  readonly totalBytes: number;
  /** Start offsets of every line. */
  readonly chars: OffsetArray;
  readonly bytes: OffsetArray;
}

export class LineIndex {
  readonly totalChars: number;
  readonly totalBytes: number;
  private readonly chars: OffsetArray;
  private readonly bytes: OffsetArray;

  constructor(data: LineIndexData) {
    if (data.chars.length === 0 || data.chars.length !== data.bytes.length) {
      throw new RangeError("line arrays must be non-empty and of equal length");
    }
    if (data.chars[0] !== 0 || data.bytes[0] !== 0) {
      throw new RangeError("first line must start at (0, 0)");
    }
    for (let i = 1; i < data.chars.length; i++) {
      if (data.chars[i] <= data.chars[i - 1] || data.bytes[i] <= data.bytes[i - 1]) {
        throw new RangeError(`line ${i} does not start after line ${i - 1}`);
      }
    }
    if (data.chars[data.chars.length - 1] >= data.totalChars) {
      throw new RangeError("last line starts beyond the end of the text");
    }

    this.totalChars = data.totalChars;
    this.totalBytes = data.totalBytes;
    this.chars = data.chars;
    this.bytes = data.bytes;
  }

  get count(): number {
    return this.chars.length;
  }

  entry(line: number): LineEntry {
    if (!Number.isInteger(line) || line < 0 || line >= this.count) {
      throw new LineOutOfBoundsError(line, this.count);
    }
    return {
      line,
      startChar: this.chars[line],
      endChar: this.charBoundary(line + 1),
      startByte: this.bytes[line],
      endByte: this.byteBoundary(line + 1),
    };
  }

  /** Char and byte range covered by lines [begin, end), with the usual negative / zero-as-end rules. */
  resolveLineRange(begin: number, end: number): LineRange {
    const { start, end: stop } = resolveRange(begin, end, this.count, "line");
    return {
      startLine: start,
      endLine: stop,
      startChar: this.charBoundary(start),
      endChar: this.charBoundary(stop),
      startByte: this.byteBoundary(start),
      endByte: this.byteBoundary(stop),
    };
  }

  toData(): LineIndexData {
    return {
      totalChars: this.totalChars,
      totalBytes: this.totalBytes,
      chars: this.chars,
      bytes: this.bytes,
    };
  }

  private charBoundary(line: number): number {
    return line === this.count ? this.totalChars : this.chars[line];
  }

  private byteBoundary(line: number): number {
    return line === this.count ? this.totalBytes : this.bytes[line];
  }
}
