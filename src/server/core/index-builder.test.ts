import { createHash } from "node:crypto";
import { describe, expect, it } from "vitest";
import { EmptyTextError, InvalidEncodingError } from "./errors";
import { IndexBuilder, type IndexBuildOptions } from "./index-builder";

function build(input: string | Buffer, options: IndexBuildOptions, chunkSize = 4) {
  const bytes = typeof input === "string" ? Buffer.from(input) : input;
  const builder = new IndexBuilder(options);
  for (let i = 0; i < bytes.length; i += chunkSize) {
    builder.write(bytes.subarray(i, i + chunkSize));
  }
  return builder.finish();
}

describe("IndexBuilder", () => {
  it("drops a checkpoint every stride characters", () => {
    const { checkpoints } = build("hello", { stride: 2, lineIndex: false });
    const data = checkpoints.toData();

    expect(Array.from(data.chars)).toEqual([0, 2, 4]);
    expect(Array.from(data.bytes)).toEqual([0, 2, 4]);
    expect(Array.from(data.widths)).toEqual([1, 1, 1]);
    expect(data.totalChars).toBe(5);
    expect(data.totalBytes).toBe(5);
  });

  it("marks segments that mix widths", () => {
    // a@0 é@1 中@3 😀@6 b@10
    const { checkpoints } = build("aé中😀b", { stride: 2, lineIndex: false });
    const data = checkpoints.toData();

    expect(Array.from(data.chars)).toEqual([0, 2, 4]);
    expect(Array.from(data.bytes)).toEqual([0, 3, 10]);
    expect(Array.from(data.widths)).toEqual([0, 0, 1]);
    expect(data.totalChars).toBe(5);
    expect(data.totalBytes).toBe(11);
  });

  it("does not depend on how the input is chunked", () => {
    const text = "Καλημέρα κόσμε 🌍\nsecond line\n";
    const whole = build(text, { stride: 3, lineIndex: true }, 1 << 16).checkpoints.toData();
    const bytewise = build(text, { stride: 3, lineIndex: true }, 1).checkpoints.toData();

    expect(Array.from(bytewise.chars)).toEqual(Array.from(whole.chars));
    expect(Array.from(bytewise.bytes)).toEqual(Array.from(whole.bytes));
    expect(Array.from(bytewise.widths)).toEqual(Array.from(whole.widths));
  });

  it("keeps the terminator on the line it ends", () => {
    const { lines } = build("a\nb\nc\n", { lineIndex: true });

    expect(lines?.count).toBe(3);
    expect(lines?.entry(2)).toEqual({ line: 2, startChar: 4, endChar: 6, startByte: 4, endByte: 6 });
  });

  it("counts an unterminated last line", () => {
    const { lines } = build("a\nb", { lineIndex: true });

    expect(lines?.count).toBe(2);
    expect(lines?.entry(1)).toEqual({ line: 1, startChar: 2, endChar: 3, startByte: 2, endByte: 3 });
  });

  it("gives each blank line an entry", () => {
    const { lines } = build("\n\n", { lineIndex: true });

    expect(lines?.count).toBe(2);
    expect(lines?.entry(1)).toEqual({ line: 1, startChar: 1, endChar: 2, startByte: 1, endByte: 2 });
  });

  it("skips the line index when not asked for", () => {
    expect(build("a\nb\n", { lineIndex: false }).lines).toBeUndefined();
  });

  it("hashes the raw bytes", () => {
    const text = "digest me\n";
    const { digest } = build(text, { lineIndex: false });
    expect(Buffer.from(digest).toString("hex")).toBe(createHash("sha256").update(text).digest("hex"));
  });

  it("refuses empty input", () => {
    expect(() => new IndexBuilder({ lineIndex: false }).finish()).toThrow(EmptyTextError);
  });

  it("reports malformed input at the offending byte", () => {
    const bytes = Buffer.concat([Buffer.from("abc"), Buffer.from([0xff])]);
    expect(() => build(bytes, { lineIndex: false })).toThrow(new InvalidEncodingError(3));
  });

  it("rejects a stride below one", () => {
    expect(() => new IndexBuilder({ stride: 0, lineIndex: false })).toThrow(RangeError);
  });
});
