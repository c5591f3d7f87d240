import fs from "node:fs";
import { decode, encode } from "cbor-x";
import { z } from "zod";
import { CheckpointIndex, toOffsetArray } from "../core/checkpoint-index";
import { DecodeError, IoError } from "../core/errors";
import type { BuiltIndex } from "../core/index-builder";
import { LineIndex } from "../core/line-index";
import { DIGEST_SIZE } from "./digest";
import { cacheLogger as logger } from "../utils/logger";

/** Bumped whenever the persisted layout changes; older caches are rebuilt. */
export const INDEX_CACHE_VERSION = 1;

const offsets = z.array(z.number().int().nonnegative());

const persistedIndexSchema = z.object({
  version: z.literal(INDEX_CACHE_VERSION),
  stride: z.number().int().positive(),
  totalChars: z.number().int().positive(),
  totalBytes: z.number().int().positive(),
  digest: z.instanceof(Uint8Array).refine(d => d.length === DIGEST_SIZE, {
    message: `digest must be ${DIGEST_SIZE} bytes`,
  }),
  checkpoints: z.object({
    chars: offsets,
    bytes: offsets,
    widths: z.instanceof(Uint8Array),
  }),
  lines: z.object({ chars: offsets, bytes: offsets }).nullable(),
}).superRefine((data, ctx) => {
  // Offsets past the totals would wrap once packed into a typed array.
  const bounded: Array<[string[], number[], number]> = [
    [["checkpoints", "chars"], data.checkpoints.chars, data.totalChars],
    [["checkpoints", "bytes"], data.checkpoints.bytes, data.totalBytes],
  ];
  if (data.lines) {
    bounded.push(
      [["lines", "chars"], data.lines.chars, data.totalChars],
      [["lines", "bytes"], data.lines.bytes, data.totalBytes],
    );
  }

  for (const [path, values, max] of bounded) {
    const at = values.findIndex(value => value > max);
    if (at >= 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [...path, at],
        message: `offset ${values[at]} exceeds ${max}`,
      });
    }
  }
});

export type PersistedIndex = z.infer<typeof persistedIndexSchema>;

export function toPersisted(index: BuiltIndex): PersistedIndex {
  const checkpoints = index.checkpoints.toData();
  const lines = index.lines?.toData();
  return {
    version: INDEX_CACHE_VERSION,
    stride: checkpoints.stride,
    totalChars: checkpoints.totalChars,
    totalBytes: checkpoints.totalBytes,
    digest: Uint8Array.from(index.digest),
    checkpoints: {
      chars: Array.from(checkpoints.chars),
      bytes: Array.from(checkpoints.bytes),
      widths: Uint8Array.from(checkpoints.widths),
    },
    lines: lines ? { chars: Array.from(lines.chars), bytes: Array.from(lines.bytes) } : null,
  };
}

/** Rebuild index objects from a validated record; invariant violations become DecodeError. */
export function fromPersisted(data: PersistedIndex): BuiltIndex {
  const { totalChars, totalBytes } = data;
  try {
    const checkpoints = new CheckpointIndex({
      stride: data.stride,
      totalChars,
      totalBytes,
      chars: toOffsetArray(data.checkpoints.chars, totalBytes),
      bytes: toOffsetArray(data.checkpoints.bytes, totalBytes),
      widths: Uint8Array.from(data.checkpoints.widths),
    });
    const lines = data.lines
      ? new LineIndex({
          totalChars,
          totalBytes,
          chars: toOffsetArray(data.lines.chars, totalBytes),
          bytes: toOffsetArray(data.lines.bytes, totalBytes),
        })
      : undefined;
    return { checkpoints, lines, digest: Uint8Array.from(data.digest) };
  } catch (error) {
    throw new DecodeError(error instanceof Error ? error.message : String(error), { cause: error });
  }
}

export function encodeIndex(index: BuiltIndex): Buffer {
  return encode(toPersisted(index));
}

export function decodeIndex(bytes: Uint8Array): BuiltIndex {
  let raw: unknown;
  try {
    raw = decode(bytes);
  } catch (error) {
    throw new DecodeError(error instanceof Error ? error.message : String(error), { cause: error });
  }

  const parsed = persistedIndexSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new DecodeError(issue ? `${issue.path.join(".") || "<root>"}: ${issue.message}` : "invalid layout");
  }
  return fromPersisted(parsed.data);
}

/**
 * Cached index at `path`, or undefined when there is none. An unreadable
 * or malformed file is a DecodeError; callers treat it as absent.
 */
export function readIndexCache(path: string): BuiltIndex | undefined {
  let bytes: Buffer;
  try {
    bytes = fs.readFileSync(path);
  } catch (error) {
    if (isMissingFile(error)) return undefined;
    throw new DecodeError(`cannot read ${path}`, { cause: error });
  }

  const index = decodeIndex(bytes);
  logger.debug({ indexPath: path, size: bytes.length }, 'Index cache decoded');
  return index;
}

export function writeIndexCache(path: string, index: BuiltIndex): void {
  const bytes = encodeIndex(index);
  try {
    fs.writeFileSync(path, bytes);
  } catch (error) {
    throw new IoError(path, error);
  }
  logger.info({
    indexPath: path,
    size: bytes.length,
    checkpoints: index.checkpoints.size,
    lines: index.lines?.count ?? 0,
  }, 'Index cache written');
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
