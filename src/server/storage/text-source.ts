import fs from "node:fs";
import { IoError, TextFrameError } from "../core/errors";

/** Read size used when streaming through a whole file (64 KiB). */
export const SCAN_CHUNK_SIZE = 65_536;

/** Anything that can hand out an exact byte range of the text. */
export interface ByteSource {
  read(startByte: number, endByte: number): Buffer;
}

/**
 *  Blocking access to a source file on disk.
 *  The file is opened for each operation and closed right after, so a
 *  TextSource holds no descriptor between calls.
 */
export class TextSource implements ByteSource {
  constructor(readonly path: string) {}

  stat(): fs.Stats {
    try {
      return fs.statSync(this.path);
    } catch (error) {
      throw new IoError(this.path, error);
    }
  }

  /** Exactly the bytes [startByte, endByte), in a buffer of their own. */
  read(startByte: number, endByte: number): Buffer {
    const length = endByte - startByte;
    // Buffer.alloc never hands out a slice of the shared pool.
    const buffer = Buffer.alloc(length);

    this.withDescriptor(fd => {
      let done = 0;
      while (done < length) {
        const n = fs.readSync(fd, buffer, done, length - done, startByte + done);
        if (n === 0) throw new Error(`unexpected end of file at byte ${startByte + done}`);
        done += n;
      }
    });

    return buffer;
  }

  /**
   * Stream the whole file through `onChunk`. The chunk buffer is reused
   * between calls, so listeners must not keep it. Returns the byte count.
   */
  scan(onChunk: (chunk: Buffer) => void, chunkSize = SCAN_CHUNK_SIZE): number {
    const buffer = Buffer.alloc(chunkSize);

    return this.withDescriptor(fd => {
      let total = 0;
      for (;;) {
        const n = fs.readSync(fd, buffer, 0, chunkSize, total);
        if (n === 0) return total;
        onChunk(buffer.subarray(0, n));
        total += n;
      }
    });
  }

  private withDescriptor<T>(fn: (fd: number) => T): T {
    let fd: number;
    try {
      fd = fs.openSync(this.path, "r");
    } catch (error) {
      throw new IoError(this.path, error);
    }

    try {
      return fn(fd);
    } catch (error) {
      if (error instanceof TextFrameError) throw error;
      throw new IoError(this.path, error);
    } finally {
      fs.closeSync(fd);
    }
  }
}
