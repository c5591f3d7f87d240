import { FrameNotLoadedError } from "../core/errors";
import { validateUtf8 } from "../core/utf8";
import type { ByteSource } from "./text-source";
import { storeLogger as logger } from "../utils/logger";

/** End-exclusive character span. */
export interface CharSpan {
  readonly start: number;
  readonly end: number;
}

/**
 *  A loaded excerpt of the source file.
 *    • starts and ends on character boundaries
 *    • owns its bytes (one allocation per frame, never shared or reused)
 *    • never mutated, merged or dropped while its store lives
 */
export interface Frame {
  readonly handle: number;
  readonly startByte: number;
  readonly endByte: number;
  /** Only known for frames loaded through a char or line range. */
  readonly chars?: CharSpan;
  readonly bytes: Buffer;
  readonly text: string;
}

export type AnchoredFrame = Frame & { readonly chars: CharSpan };

/**
 *  find(s,e)      – excerpt of any frame covering [s,e), no I/O
 *  get(s,e)       – same, FrameNotLoadedError on a miss
 *  load(s,e)      – read [s,e) from the source and append a new frame
 *  frameAt(b)     – frame holding byte b
 *  frameAtChar(c) – char-anchored frame holding char c
 *
 *  Append-only: handles are indices into `frames`, and a sorted table of
 *  distinct start offsets lets lookups walk backwards from the requested
 *  start instead of scanning everything.
 */
export class FrameStore {
  private readonly frames: Frame[] = [];
  private readonly starts: number[] = [];
  private readonly handlesByStart = new Map<number, number[]>();
  private bytesLoaded = 0;

  constructor(private readonly source: ByteSource) {}

  get size(): number {
    return this.frames.length;
  }

  get loadedBytes(): number {
    return this.bytesLoaded;
  }

  findCovering(startByte: number, endByte: number): Frame | undefined {
    for (let i = this.lastStartAtOrBefore(startByte); i >= 0; i--) {
      for (const handle of this.handlesAt(i)) {
        const frame = this.frames[handle];
        if (frame.endByte >= endByte) return frame;
      }
    }
    return undefined;
  }

  find(startByte: number, endByte: number): string | undefined {
    const frame = this.findCovering(startByte, endByte);
    return frame && excerpt(frame, startByte, endByte);
  }

  get(startByte: number, endByte: number): string {
    const text = this.find(startByte, endByte);
    if (text === undefined) throw new FrameNotLoadedError("byte", startByte, endByte);
    return text;
  }

  /**
   * Read [startByte, endByte) from the source (the caller guarantees
   * character boundaries), validate it and register it as a new frame.
   */
  load(startByte: number, endByte: number, chars?: CharSpan): string {
    const startTime = Date.now();
    const bytes = this.source.read(startByte, endByte);
    validateUtf8(bytes, startByte);

    const frame: Frame = Object.freeze({
      handle: this.frames.length,
      startByte,
      endByte,
      chars: chars && Object.freeze({ start: chars.start, end: chars.end }),
      bytes,
      text: bytes.toString("utf8"),
    });

    this.frames.push(frame);
    this.index(frame);
    this.bytesLoaded += bytes.length;

    logger.debug({
      handle: frame.handle,
      startByte,
      endByte,
      frames: this.frames.length,
      loadedBytes: this.bytesLoaded,
      duration: Date.now() - startTime,
    }, 'Frame loaded');

    return frame.text;
  }

  /** The frame holding byte `offset` that reaches furthest, if any. */
  frameAt(offset: number): Frame | undefined {
    let best: Frame | undefined;
    for (let i = this.lastStartAtOrBefore(offset); i >= 0; i--) {
      for (const handle of this.handlesAt(i)) {
        const frame = this.frames[handle];
        if (frame.endByte > offset && (!best || frame.endByte > best.endByte)) best = frame;
      }
    }
    return best;
  }

  /** Bytes from `offset` to the end of the furthest-reaching frame holding it. */
  bytesFrom(offset: number): Buffer | undefined {
    const frame = this.frameAt(offset);
    return frame?.bytes.subarray(offset - frame.startByte);
  }

  /**
   * Char-anchored frame whose span contains `charOffset`, preferring the
   * latest start. Linear in the number of frames.
   */
  frameAtChar(charOffset: number): AnchoredFrame | undefined {
    let best: AnchoredFrame | undefined;
    for (const frame of this.frames) {
      if (!isAnchored(frame)) continue;
      if (frame.chars.start > charOffset || frame.chars.end < charOffset) continue;
      if (!best || frame.chars.start > best.chars.start) best = frame;
    }
    return best;
  }

  private index(frame: Frame): void {
    const existing = this.handlesByStart.get(frame.startByte);
    if (existing) {
      existing.push(frame.handle);
      return;
    }
    this.handlesByStart.set(frame.startByte, [frame.handle]);
    this.starts.splice(this.lastStartAtOrBefore(frame.startByte) + 1, 0, frame.startByte);
  }

  private handlesAt(i: number): readonly number[] {
    return this.handlesByStart.get(this.starts[i]) ?? [];
  }

  /** Position in `starts` of the greatest start ≤ `offset`, -1 if none. */
  private lastStartAtOrBefore(offset: number): number {
    let lo = 0;
    let hi = this.starts.length - 1;
    let found = -1;
    while (lo <= hi) {
      const mid = (lo + hi) >>> 1;
      if (this.starts[mid] <= offset) {
        found = mid;
        lo = mid + 1;
      } else {
        hi = mid - 1;
      }
    }
    return found;
  }
}

function isAnchored(frame: Frame): frame is AnchoredFrame {
  return frame.chars !== undefined;
}

/** Text of [startByte, endByte) inside `frame`; the range must lie within it. */
export function excerpt(frame: Frame, startByte: number, endByte: number): string {
  if (startByte === frame.startByte && endByte === frame.endByte) return frame.text;
  return frame.bytes.toString("utf8", startByte - frame.startByte, endByte - frame.startByte);
}
