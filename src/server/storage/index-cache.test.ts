import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { encode } from "cbor-x";
import { afterAll, describe, expect, it } from "vitest";
import { DecodeError } from "../core/errors";
import { IndexBuilder, type BuiltIndex } from "../core/index-builder";
import {
  decodeIndex,
  encodeIndex,
  readIndexCache,
  toPersisted,
  writeIndexCache,
} from "./index-cache";

function indexOf(text: string): BuiltIndex {
  const builder = new IndexBuilder({ stride: 2, lineIndex: true });
  builder.write(Buffer.from(text));
  return builder.finish();
}

describe("index cache", () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "textframe-cache-"));
  const index = indexOf("a\nbé\nc中\n");

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("decodes what it encodes", () => {
    const decoded = decodeIndex(encodeIndex(index));
    const before = index.checkpoints.toData();
    const after = decoded.checkpoints.toData();

    expect(after.totalChars).toBe(before.totalChars);
    expect(after.totalBytes).toBe(before.totalBytes);
    expect(Array.from(after.chars)).toEqual(Array.from(before.chars));
    expect(Array.from(after.bytes)).toEqual(Array.from(before.bytes));
    expect(Array.from(after.widths)).toEqual(Array.from(before.widths));
    expect(decoded.lines?.count).toBe(3);
    expect(Buffer.from(decoded.digest).equals(Buffer.from(index.digest))).toBe(true);
  });

  it("keeps the absence of a line index", () => {
    const builder = new IndexBuilder({ lineIndex: false });
    builder.write(Buffer.from("no lines here"));
    expect(decodeIndex(encodeIndex(builder.finish())).lines).toBeUndefined();
  });

  it("rejects bytes that are not an index", () => {
    expect(() => decodeIndex(Buffer.from("not an index at all"))).toThrow(DecodeError);
  });

  it("rejects other layout versions", () => {
    const bytes = encode({ ...toPersisted(index), version: 99 });
    expect(() => decodeIndex(bytes)).toThrow(DecodeError);
  });

  it("rejects records that break the index invariants", () => {
    const persisted = toPersisted(index);
    const bytes = encode({
      ...persisted,
      checkpoints: { ...persisted.checkpoints, chars: [0, 0, 0, 0, 0] },
    });
    expect(() => decodeIndex(bytes)).toThrow(DecodeError);
  });

  it("rejects offsets past the end of the text", () => {
    // bytes [0, 2, 5, 7] of an 11-byte text; 65543 would wrap to 7 in a Uint16Array
    const persisted = toPersisted(index);
    expect(persisted.checkpoints.bytes).toEqual([0, 2, 5, 7]);

    const bytes = encode({
      ...persisted,
      checkpoints: { ...persisted.checkpoints, bytes: [0, 2, 5, 65_543] },
    });
    expect(() => decodeIndex(bytes)).toThrow(
      new DecodeError("checkpoints.bytes.3: offset 65543 exceeds 11"),
    );
  });

  it("treats a missing file as no cache", () => {
    expect(readIndexCache(path.join(dir, "missing.idx"))).toBeUndefined();
  });

  it("reports unreadable files as decode errors", () => {
    expect(() => readIndexCache(dir)).toThrow(DecodeError);
  });

  it("writes and reads back through the file system", () => {
    const file = path.join(dir, "roundtrip.idx");
    writeIndexCache(file, index);

    const cached = readIndexCache(file);
    expect(cached?.checkpoints.totalChars).toBe(index.checkpoints.totalChars);
    expect(cached?.lines?.entry(2)).toEqual(index.lines?.entry(2));
  });
});
