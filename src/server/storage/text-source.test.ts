import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterAll, describe, expect, it } from "vitest";
import { IoError } from "../core/errors";
import { TextSource } from "./text-source";

describe("TextSource", () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "textframe-source-"));
  const file = path.join(dir, "sample.txt");
  fs.writeFileSync(file, "0123456789abcdef");

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("reads exact ranges into buffers of their own", () => {
    const source = new TextSource(file);
    const bytes = source.read(3, 7);

    expect(bytes.toString()).toBe("3456");
    expect(bytes.buffer.byteLength).toBe(4);
  });

  it("streams the whole file in chunks", () => {
    const chunks: string[] = [];
    const total = new TextSource(file).scan(chunk => chunks.push(chunk.toString()), 6);

    expect(total).toBe(16);
    expect(chunks).toEqual(["012345", "6789ab", "cdef"]);
  });

  it("wraps reads past the end of the file", () => {
    expect(() => new TextSource(file).read(10, 20)).toThrow(IoError);
  });

  it("wraps missing files", () => {
    const missing = new TextSource(path.join(dir, "missing.txt"));
    expect(() => missing.stat()).toThrow(IoError);
    expect(() => missing.read(0, 1)).toThrow(IoError);
  });
});
