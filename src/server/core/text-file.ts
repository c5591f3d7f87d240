import { DEFAULT_STRIDE } from "./checkpoint-index";
import {
  DecodeError,
  EmptyTextError,
  FrameNotLoadedError,
  InvertedRangeError,
  IoError,
  LineIndexDisabledError,
  MisalignedByteOffsetError,
  OffsetOutOfBoundsError,
  StaleCacheError,
} from "./errors";
import { buildIndex, type BuiltIndex } from "./index-builder";
import type { LineIndex } from "./line-index";
import { resolveRange, type AbsoluteRange } from "./range-resolver";
import { isContinuation, skipChars } from "./utf8";
import { digestFile, digestsEqual, toHex } from "../storage/digest";
import { excerpt, FrameStore, type Frame } from "../storage/frame-store";
import { readIndexCache, writeIndexCache } from "../storage/index-cache";
import { TextSource } from "../storage/text-source";
import { textFileLogger as logger, logPerformance } from "../utils/logger";

export type TextFileMode = "with-line-index" | "no-line-index";

export interface TextFileOptions {
  path: string;
  /** Side-car cache for the index: reused when its digest matches, (re)written otherwise. */
  indexPath?: string;
  /** Defaults to "with-line-index". */
  mode?: TextFileMode;
  /** Characters between checkpoints when a fresh index is built. */
  stride?: number;
}

export interface ByteRange {
  readonly startByte: number;
  readonly endByte: number;
}

/**
 * The non-loading half of a TextFile. Nothing reachable through this type
 * reads the source file or adds frames, so it can be handed to any number
 * of readers while one owner keeps loading through the full TextFile.
 */
export interface ReadonlyTextFile {
  readonly path: string;
  /** Length in Unicode code points. */
  readonly length: number;
  readonly byteLength: number;
  readonly hasLineIndex: boolean;
  readonly lineCount: number;
  readonly frameCount: number;
  readonly loadedBytes: number;
  readonly checksumDigest: string;
  get(begin: number, end: number): string;
  getLines(begin: number, end: number): string;
  getBytes(startByte: number, endByte: number): string;
}

/**
 * A UTF-8 file on disk addressed by character (code point), line or byte
 * offsets, with excerpts loaded on demand into frames that live as long as
 * the TextFile does.
 *
 * Char ranges take the usual begin/end conventions: negative values count
 * from the end and an end of 0 means the end of the text. All ranges are
 * end-exclusive. The file must not change while a TextFile is open on it.
 */
export class TextFile implements ReadonlyTextFile {
  private readonly frames: FrameStore;
  /** Char → byte pairs already resolved through the disk or the line index. */
  private readonly anchors = new Map<number, number>();

  private constructor(
    private readonly source: TextSource,
    private readonly index: BuiltIndex,
    private readonly indexPath: string | undefined,
    private readonly modified: Date,
  ) {
    this.frames = new FrameStore(source);
  }

  /**
   * Open `options.path`, reusing the cached index when its digest still
   * matches and scanning the file otherwise. Cache problems never fail the
   * open; an empty file, malformed UTF-8 or unreadable source do.
   */
  static open(options: TextFileOptions): TextFile {
    const startTime = Date.now();
    const source = new TextSource(options.path);
    const stats = source.stat();
    if (stats.size === 0) throw new EmptyTextError(options.path);

    const withLines = (options.mode ?? "with-line-index") === "with-line-index";
    let index = options.indexPath
      ? loadCachedIndex(source, options.indexPath, withLines, stats.size)
      : undefined;
    const cached = index !== undefined;

    if (!index) {
      index = buildIndex(source, { stride: options.stride ?? DEFAULT_STRIDE, lineIndex: withLines });
      if (options.indexPath) writeIndexCache(options.indexPath, index);
    }

    logPerformance(logger, cached ? 'index-cache-load' : 'index-build', startTime, {
      path: options.path,
      chars: index.checkpoints.totalChars,
      bytes: index.checkpoints.totalBytes,
      checkpoints: index.checkpoints.size,
      lines: index.lines?.count,
    });

    return new TextFile(source, index, options.indexPath, stats.mtime);
  }

  /* ── Metadata ───────────────────────────────────────────── */

  get path(): string {
    return this.source.path;
  }

  get length(): number {
    return this.index.checkpoints.totalChars;
  }

  get byteLength(): number {
    return this.index.checkpoints.totalBytes;
  }

  get hasLineIndex(): boolean {
    return this.index.lines !== undefined;
  }

  /** Number of lines; throws LineIndexDisabledError without a line index. */
  get lineCount(): number {
    return this.lines().count;
  }

  get frameCount(): number {
    return this.frames.size;
  }

  get loadedBytes(): number {
    return this.frames.loadedBytes;
  }

  /** SHA-256 of the file contents (a copy). */
  get checksum(): Uint8Array {
    return Uint8Array.from(this.index.digest);
  }

  get checksumDigest(): string {
    return toHex(this.index.digest);
  }

  /** Modification time when opened, in unix seconds. Informational only. */
  get mtime(): number {
    return Math.floor(this.modified.getTime() / 1000);
  }

  asReadonly(): ReadonlyTextFile {
    return this;
  }

  /* ── Char ranges ────────────────────────────────────────── */

  /** Text of the char range, loaded from disk when no frame covers it. */
  getOrLoad(begin: number, end: number): string {
    const chars = resolveRange(begin, end, this.length);
    if (chars.start === chars.end) return "";

    const { startByte, endByte } = this.charRangeToBytes(chars);
    return this.frames.find(startByte, endByte)
      ?? this.frames.load(startByte, endByte, chars);
  }

  /** Text of the char range if already loaded; FrameNotLoadedError otherwise. Never reads the file. */
  get(begin: number, end: number): string {
    const chars = resolveRange(begin, end, this.length);
    if (chars.start === chars.end) return "";

    const startByte = this.resolveInMemory(chars.start);
    const endByte = this.resolveInMemory(chars.end);
    if (startByte === undefined || endByte === undefined) {
      throw new FrameNotLoadedError("char", chars.start, chars.end);
    }
    return this.frames.get(startByte, endByte);
  }

  /** Make sure the char range is held by a frame. */
  load(begin: number, end: number): void {
    this.getOrLoad(begin, end);
  }

  /** Byte offset of a char offset in 0..length. */
  charsToBytes(offset: number): number {
    return this.resolveInMemory(offset) ?? this.resolveFromDisk(offset);
  }

  /** Byte range a char request maps to, without loading it. */
  resolveByteRange(begin: number, end: number): ByteRange {
    return this.charRangeToBytes(resolveRange(begin, end, this.length));
  }

  /* ── Line ranges ────────────────────────────────────────── */

  /** Lines [begin, end) including their terminators. */
  getOrLoadLines(begin: number, end: number): string {
    const range = this.lines().resolveLineRange(begin, end);
    if (range.startByte === range.endByte) return "";

    this.anchors.set(range.startChar, range.startByte);
    this.anchors.set(range.endChar, range.endByte);
    return this.frames.find(range.startByte, range.endByte)
      ?? this.frames.load(range.startByte, range.endByte, { start: range.startChar, end: range.endChar });
  }

  getLines(begin: number, end: number): string {
    const range = this.lines().resolveLineRange(begin, end);
    if (range.startByte === range.endByte) return "";
    return this.frames.get(range.startByte, range.endByte);
  }

  resolveLineByteRange(begin: number, end: number): ByteRange {
    const { startByte, endByte } = this.lines().resolveLineRange(begin, end);
    return { startByte, endByte };
  }

  /* ── Byte ranges ────────────────────────────────────────── */

  /** Absolute, non-negative byte offsets that must both fall on character boundaries. */
  getOrLoadBytes(startByte: number, endByte: number): string {
    this.checkByteRange(startByte, endByte);

    const frame = this.frames.findCovering(startByte, endByte);
    if (frame) {
      assertAlignedIn(frame, startByte);
      assertAlignedIn(frame, endByte);
      return excerpt(frame, startByte, endByte);
    }

    this.assertAlignedOnDisk(startByte);
    this.assertAlignedOnDisk(endByte);
    if (startByte === endByte) return "";
    return this.frames.load(startByte, endByte);
  }

  getBytes(startByte: number, endByte: number): string {
    this.checkByteRange(startByte, endByte);

    const frame = this.frames.findCovering(startByte, endByte);
    if (!frame) throw new FrameNotLoadedError("byte", startByte, endByte);
    assertAlignedIn(frame, startByte);
    assertAlignedIn(frame, endByte);
    return excerpt(frame, startByte, endByte);
  }

  /* ── Persistence ────────────────────────────────────────── */

  /** Write the index to `path` (default: the index path given at open). Returns the path written. */
  saveIndex(path: string | undefined = this.indexPath): string {
    if (!path) throw new Error("no index path configured");
    writeIndexCache(path, this.index);
    return path;
  }

  /* ── Internals ──────────────────────────────────────────── */

  private lines(): LineIndex {
    if (!this.index.lines) throw new LineIndexDisabledError();
    return this.index.lines;
  }

  private charRangeToBytes(chars: AbsoluteRange): ByteRange {
    return { startByte: this.charsToBytes(chars.start), endByte: this.charsToBytes(chars.end) };
  }

  /**
   * Char → byte without touching the disk: checkpoints, uniform segments,
   * recorded anchors, then decoding inside frames already in memory.
   * Undefined when the needed bytes are not loaded.
   */
  private resolveInMemory(offset: number): number | undefined {
    const checkpoints = this.index.checkpoints;
    const direct = checkpoints.resolveDirect(offset);
    if (direct !== undefined) return direct;

    const known = this.anchors.get(offset);
    if (known !== undefined) return known;

    // A frame that starts past the checkpoint is a closer anchor.
    const nearest = checkpoints.checkpoint(checkpoints.locate(offset));
    const anchored = this.frames.frameAtChar(offset);
    if (anchored && anchored.chars.start >= nearest.charOffset) {
      const pos = skipChars(anchored.bytes, 0, offset - anchored.chars.start);
      if (pos >= 0) return anchored.startByte + pos;
    }

    return checkpoints.resolve(offset, start => this.frames.bytesFrom(start));
  }

  private resolveFromDisk(offset: number): number {
    const resolved = this.index.checkpoints.resolve(offset, (start, end) => this.source.read(start, end));
    if (resolved === undefined) {
      throw new IoError(this.path, new Error(`index does not match file contents at char ${offset}`));
    }
    this.anchors.set(offset, resolved);
    return resolved;
  }

  private checkByteRange(startByte: number, endByte: number): void {
    const total = this.byteLength;
    if (!Number.isInteger(startByte) || startByte < 0 || startByte > total) {
      throw new OffsetOutOfBoundsError(startByte, total);
    }
    if (!Number.isInteger(endByte) || endByte < 0 || endByte > total) {
      throw new OffsetOutOfBoundsError(endByte, total);
    }
    if (startByte > endByte) throw new InvertedRangeError(startByte, endByte);
  }

  private assertAlignedOnDisk(offset: number): void {
    if (offset === 0 || offset === this.byteLength) return;
    const [byte] = this.source.read(offset, offset + 1);
    if (isContinuation(byte)) throw new MisalignedByteOffsetError(offset);
  }
}

/** Frame edges are boundaries; inside, a boundary is anything but a continuation byte. */
function assertAlignedIn(frame: Frame, offset: number): void {
  if (offset === frame.startByte || offset === frame.endByte) return;
  if (isContinuation(frame.bytes[offset - frame.startByte])) {
    throw new MisalignedByteOffsetError(offset);
  }
}

/**
 * Cached index for `source` when it is readable, current and carries what
 * the requested mode needs. Every failure is logged and answered with
 * undefined so the caller rebuilds.
 */
function loadCachedIndex(
  source: TextSource,
  indexPath: string,
  withLines: boolean,
  size: number,
): BuiltIndex | undefined {
  let cached: BuiltIndex | undefined;
  try {
    cached = readIndexCache(indexPath);
  } catch (error) {
    if (!(error instanceof DecodeError)) throw error;
    logger.warn({ indexPath, err: error }, 'Discarding unreadable index cache');
    return undefined;
  }
  if (!cached) return undefined;

  // A size change settles it without hashing; otherwise the digest decides.
  if (cached.checkpoints.totalBytes !== size || !digestsEqual(cached.digest, digestFile(source))) {
    const stale = new StaleCacheError(indexPath);
    logger.warn({ indexPath, err: stale }, 'Discarding stale index cache');
    return undefined;
  }

  if (withLines && !cached.lines) {
    logger.info({ indexPath }, 'Index cache has no line index, rebuilding');
    return undefined;
  }

  return withLines ? cached : { ...cached, lines: undefined };
}
