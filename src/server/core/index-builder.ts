import { CheckpointIndex, DEFAULT_STRIDE, toOffsetArray } from "./checkpoint-index";
import { EmptyTextError } from "./errors";
import { LineIndex } from "./line-index";
import { LINE_FEED, Utf8Validator } from "./utf8";
import { createDigest } from "../storage/digest";
import type { TextSource } from "../storage/text-source";

export interface IndexBuildOptions {
  /** Characters between two checkpoints. */
  stride?: number;
  lineIndex: boolean;
}

/** Everything a single pass over the file produces. */
export interface BuiltIndex {
  readonly checkpoints: CheckpointIndex;
  readonly lines?: LineIndex;
  readonly digest: Uint8Array;
}

/**
 * Single streaming pass over the raw bytes: validates UTF-8, counts
 * characters, drops a checkpoint every `stride` characters, records line
 * starts and feeds the digest, all at once.
 */
export class IndexBuilder {
  private readonly validator = new Utf8Validator();
  private readonly hash = createDigest();
  private readonly stride: number;

  private chars = 0;
  private readonly checkpointChars: number[] = [];
  private readonly checkpointBytes: number[] = [];
  private readonly checkpointWidths: number[] = [];

  private readonly lineChars: number[] | undefined;
  private readonly lineBytes: number[] | undefined;
  private atLineStart = true;

  constructor(options: IndexBuildOptions, private readonly label = "<memory>") {
    this.stride = options.stride ?? DEFAULT_STRIDE;
    if (!Number.isInteger(this.stride) || this.stride < 1) {
      throw new RangeError(`checkpoint stride must be a positive integer, got ${this.stride}`);
    }
    if (options.lineIndex) {
      this.lineChars = [];
      this.lineBytes = [];
    }
  }

  write(chunk: Uint8Array): void {
    this.hash.update(chunk);
    this.validator.write(chunk, this.onChar);
  }

  finish(): BuiltIndex {
    this.validator.end();
    const totalBytes = this.validator.position;
    if (totalBytes === 0) throw new EmptyTextError(this.label);

    const totalChars = this.chars;
    const checkpoints = new CheckpointIndex({
      stride: this.stride,
      totalChars,
      totalBytes,
      chars: toOffsetArray(this.checkpointChars, totalBytes),
      bytes: toOffsetArray(this.checkpointBytes, totalBytes),
      widths: Uint8Array.from(this.checkpointWidths),
    });

    const lines = this.lineChars && this.lineBytes
      ? new LineIndex({
          totalChars,
          totalBytes,
          chars: toOffsetArray(this.lineChars, totalBytes),
          bytes: toOffsetArray(this.lineBytes, totalBytes),
        })
      : undefined;

    return { checkpoints, lines, digest: this.hash.digest() };
  }

  private readonly onChar = (start: number, width: number, lead: number): void => {
    if (this.chars % this.stride === 0) {
      this.checkpointChars.push(this.chars);
      this.checkpointBytes.push(start);
      this.checkpointWidths.push(width);
    } else {
      const last = this.checkpointWidths.length - 1;
      if (this.checkpointWidths[last] !== width) this.checkpointWidths[last] = 0;
    }

    if (this.lineChars && this.lineBytes) {
      if (this.atLineStart) {
        this.lineChars.push(this.chars);
        this.lineBytes.push(start);
        this.atLineStart = false;
      }
      if (lead === LINE_FEED) this.atLineStart = true;
    }

    this.chars++;
  };
}

/** Build the index of a file on disk in one pass. */
export function buildIndex(source: TextSource, options: IndexBuildOptions): BuiltIndex {
  const builder = new IndexBuilder(options, source.path);
  source.scan(chunk => builder.write(chunk));
  return builder.finish();
}
