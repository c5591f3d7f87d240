/**
 *  Error taxonomy for text files, indices and frames.
 *
 *  Everything thrown on purpose extends TextFrameError and carries a stable
 *  `code`, so callers (the HTTP layer in particular) can switch on it
 *  without instanceof chains.
 */

export type TextFrameErrorCode =
  | "EMPTY_TEXT"
  | "INVALID_ENCODING"
  | "OFFSET_OUT_OF_BOUNDS"
  | "INVERTED_RANGE"
  | "LINE_OUT_OF_BOUNDS"
  | "LINE_INDEX_DISABLED"
  | "MISALIGNED_BYTE_OFFSET"
  | "FRAME_NOT_LOADED"
  | "STALE_CACHE"
  | "IO_ERROR"
  | "DECODE_ERROR";

export abstract class TextFrameError extends Error {
  abstract readonly code: TextFrameErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The source file holds zero bytes. */
export class EmptyTextError extends TextFrameError {
  readonly code = "EMPTY_TEXT";

  constructor(readonly path: string) {
    super(`text is empty: ${path}`);
  }
}

export class InvalidEncodingError extends TextFrameError {
  readonly code = "INVALID_ENCODING";

  /** @param offset absolute byte offset of the offending byte */
  constructor(readonly offset: number) {
    super(`invalid UTF-8 at byte ${offset}`);
  }
}

export class OffsetOutOfBoundsError extends TextFrameError {
  readonly code = "OFFSET_OUT_OF_BOUNDS";

  constructor(readonly requested: number, readonly total: number) {
    super(`offset ${requested} out of bounds (0..${total})`);
  }
}

export class InvertedRangeError extends TextFrameError {
  readonly code = "INVERTED_RANGE";

  constructor(readonly begin: number, readonly end: number) {
    super(`inverted range (${begin},${end})`);
  }
}

export class LineOutOfBoundsError extends TextFrameError {
  readonly code = "LINE_OUT_OF_BOUNDS";

  constructor(readonly requested: number, readonly total: number) {
    super(`line ${requested} out of bounds (0..${total})`);
  }
}

export class LineIndexDisabledError extends TextFrameError {
  readonly code = "LINE_INDEX_DISABLED";

  constructor() {
    super("no line index enabled");
  }
}

export class MisalignedByteOffsetError extends TextFrameError {
  readonly code = "MISALIGNED_BYTE_OFFSET";

  constructor(readonly offset: number) {
    super(`byte offset ${offset} is not on a character boundary`);
  }
}

export class FrameNotLoadedError extends TextFrameError {
  readonly code = "FRAME_NOT_LOADED";

  /** `unit` tells whether start/end are char or byte offsets. */
  constructor(readonly unit: "char" | "byte", readonly start: number, readonly end: number) {
    super(`text not loaded (${unit} ${start}..${end})`);
  }
}

/** Cached index digest differs from the source file. Recovered by a rebuild. */
export class StaleCacheError extends TextFrameError {
  readonly code = "STALE_CACHE";

  constructor(readonly indexPath: string) {
    super(`index cache is stale: ${indexPath}`);
  }
}

export class IoError extends TextFrameError {
  readonly code = "IO_ERROR";

  constructor(readonly path: string, cause: unknown) {
    super(`I/O error on ${path}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
  }
}

/** Index cache unreadable or malformed. Recovered by a rebuild. */
export class DecodeError extends TextFrameError {
  readonly code = "DECODE_ERROR";

  constructor(message: string, options?: { cause?: unknown }) {
    super(`index cache decode failed: ${message}`, options);
  }
}
