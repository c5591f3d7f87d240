import { once } from "node:events";
import fs from "node:fs";
import type { Server } from "node:http";
import os from "node:os";
import path from "node:path";
import type { Express } from "express";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { createApp } from "./app";
import { TextFile } from "./core/text-file";

const PROSE = "\nChapter 1\n\nThe lighthouse keeper counted ships at dusk.\nNobody answered the radio that night.\n";

interface Running {
  server: Server;
  url: string;
}

async function serve(app: Express): Promise<Running> {
  const server = app.listen(0, "127.0.0.1");
  await once(server, "listening");
  const address = server.address();
  if (address === null || typeof address === "string") throw new Error("expected a TCP address");
  return { server, url: `http://127.0.0.1:${address.port}/v1` };
}

async function stop({ server }: Running): Promise<void> {
  server.closeAllConnections();
  await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
}

describe("HTTP API", () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "textframe-http-"));
  const textPath = path.join(dir, "prose.txt");
  const indexPath = path.join(dir, "prose.idx");
  fs.writeFileSync(textPath, PROSE);

  let full: Running;
  let restricted: Running;

  beforeAll(async () => {
    full = await serve(createApp(TextFile.open({ path: textPath }), { maxExcerptBytes: 1_000, indexPath }));
    restricted = await serve(createApp(
      TextFile.open({ path: textPath, mode: "no-line-index" }),
      { maxExcerptBytes: 10, indexPath: undefined },
    ));
  });

  afterAll(async () => {
    await stop(full);
    await stop(restricted);
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("reports status", async () => {
    const res = await fetch(`${full.url}/status`);

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      path: textPath,
      chars: 95,
      bytes: 95,
      lines: 5,
      frames: 0,
      loadedBytes: 0,
    });
  });

  it("serves char ranges", async () => {
    const res = await fetch(`${full.url}/text?begin=1&end=10`);

    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toBe("text/plain; charset=utf-8");
    expect(await res.text()).toBe("Chapter 1");
    expect(await (await fetch(`${full.url}/text?begin=-7`)).text()).toBe("night.\n");
  });

  it("serves line and byte ranges", async () => {
    expect(await (await fetch(`${full.url}/lines?begin=1&end=2`)).text()).toBe("Chapter 1\n");
    expect(await (await fetch(`${full.url}/bytes?begin=1&end=10`)).text()).toBe("Chapter 1");
  });

  it("answers cached requests only for loaded text", async () => {
    const miss = await fetch(`${full.url}/text?begin=20&end=30&cached=true`);
    expect(miss.status).toBe(404);
    expect(await miss.json()).toEqual({ error: "text not loaded (byte 20..30)", code: "FRAME_NOT_LOADED" });

    await fetch(`${full.url}/text?begin=20&end=30`);
    const hit = await fetch(`${full.url}/text?begin=20&end=30&cached=true`);
    expect(hit.status).toBe(200);
    expect(await hit.text()).toBe(PROSE.slice(20, 30));
  });

  it("maps range errors to 400", async () => {
    const res = await fetch(`${full.url}/text?begin=-150`);

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "offset -150 out of bounds (0..95)", code: "OFFSET_OUT_OF_BOUNDS" });
  });

  it("rejects malformed queries", async () => {
    const res = await fetch(`${full.url}/text?begin=abc`);

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Invalid range", code: "INVALID_QUERY" });
  });

  it("refuses excerpts above the size cap", async () => {
    const res = await fetch(`${restricted.url}/text`);

    expect(res.status).toBe(413);
    expect(await res.json()).toEqual({ error: "Excerpt too large", bytes: 95, limit: 10 });
  });

  it("reports a missing line index as a conflict", async () => {
    const res = await fetch(`${restricted.url}/lines?begin=0&end=1`);

    expect(res.status).toBe(409);
    expect(await res.json()).toEqual({ error: "no line index enabled", code: "LINE_INDEX_DISABLED" });
  });

  it("saves the index when a path is configured", async () => {
    const saved = await fetch(`${full.url}/index`, { method: "POST" });
    expect(saved.status).toBe(201);
    expect(await saved.json()).toEqual({ indexPath });
    expect(fs.existsSync(indexPath)).toBe(true);

    const refused = await fetch(`${restricted.url}/index`, { method: "POST" });
    expect(refused.status).toBe(409);
    expect(await refused.json()).toEqual({ error: "No index path configured" });
  });
});
