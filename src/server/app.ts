// ===========================================================================
//  src/server/app.ts   (HTTP façade over one TextFile)
// ===========================================================================

import express, { type Request, type Response } from "express";
import helmet from "helmet";
import compression from "compression";
import pinoHttp from "pino-http";
import { z } from "zod";

import type { AppConfig } from "./config";
import { TextFrameError, type TextFrameErrorCode } from "./core/errors";
import type { ByteRange, TextFile } from "./core/text-file";
import { httpLogger, logError } from "./utils/logger";

export const REST_ROOT = "/v1";

const rangeQuery = z.object({
  begin: z.coerce.number().int().default(0),
  end: z.coerce.number().int().optional(),
  cached: z.enum(["true", "false"]).default("false").transform(value => value === "true"),
});

/** Per-request failures; anything else is a 500. */
const STATUS_BY_CODE: Partial<Record<TextFrameErrorCode, number>> = {
  OFFSET_OUT_OF_BOUNDS: 400,
  INVERTED_RANGE: 400,
  LINE_OUT_OF_BOUNDS: 400,
  MISALIGNED_BYTE_OFFSET: 400,
  INVALID_ENCODING: 400,
  FRAME_NOT_LOADED: 404,
  LINE_INDEX_DISABLED: 409,
};

type ExcerptKind = "text" | "lines" | "bytes";

interface ExcerptAccess {
  /** Where the request lands in the file, used to enforce the size cap before loading. */
  range(begin: number, end: number): ByteRange;
  load(begin: number, end: number): string;
  cached(begin: number, end: number): string;
  /** End used when the query leaves it out. */
  defaultEnd(): number;
}

function accessFor(textFile: TextFile, kind: ExcerptKind): ExcerptAccess {
  switch (kind) {
    case "text":
      return {
        range: (begin, end) => textFile.resolveByteRange(begin, end),
        load: (begin, end) => textFile.getOrLoad(begin, end),
        cached: (begin, end) => textFile.get(begin, end),
        defaultEnd: () => 0,
      };
    case "lines":
      return {
        range: (begin, end) => textFile.resolveLineByteRange(begin, end),
        load: (begin, end) => textFile.getOrLoadLines(begin, end),
        cached: (begin, end) => textFile.getLines(begin, end),
        defaultEnd: () => 0,
      };
    case "bytes":
      return {
        range: (begin, end) => ({ startByte: begin, endByte: end }),
        load: (begin, end) => textFile.getOrLoadBytes(begin, end),
        cached: (begin, end) => textFile.getBytes(begin, end),
        defaultEnd: () => textFile.byteLength,
      };
  }
}

function sendError(res: Response, error: unknown, context: Record<string, unknown>): void {
  if (error instanceof TextFrameError) {
    const status = STATUS_BY_CODE[error.code];
    if (status !== undefined) {
      httpLogger.warn({ ...context, code: error.code }, error.message);
      res.status(status).json({ error: error.message, code: error.code });
      return;
    }
  }
  logError(httpLogger, error, context);
  res.status(500).json({ error: "Failed to read excerpt" });
}

export function createApp(
  textFile: TextFile,
  config: Pick<AppConfig, "maxExcerptBytes" | "indexPath">,
): express.Express {
  const app = express();

  app.use(pinoHttp({
    logger: httpLogger,
    autoLogging: {
      // Health checks are polled; keep them out of the request log
      ignore: (req) => req.url === `${REST_ROOT}/status`,
    },
    customLogLevel: (_req, res, err) => {
      if (res.statusCode >= 400 && res.statusCode < 500) return 'warn';
      if (res.statusCode >= 500 || err) return 'error';
      return 'debug';
    },
    serializers: {
      req: (req) => ({
        method: req.method,
        url: req.url,
      }),
      res: (res) => ({
        statusCode: res.statusCode,
      }),
    },
  }));

  app
    .use(helmet())
    .use(compression());

  const router = express.Router();

  // Health / metrics
  router.get("/status", (_req, res) => {
    const status = {
      path: textFile.path,
      chars: textFile.length,
      bytes: textFile.byteLength,
      lines: textFile.hasLineIndex ? textFile.lineCount : null,
      frames: textFile.frameCount,
      loadedBytes: textFile.loadedBytes,
      checksum: textFile.checksumDigest,
      uptimeSec: Math.floor(process.uptime()),
    };

    httpLogger.debug({ status }, 'Status request');
    res.json(status);
  });

  // Random-access excerpts
  const excerptRoute = (kind: ExcerptKind) => {
    const access = accessFor(textFile, kind);

    return (req: Request, res: Response) => {
      const query = rangeQuery.safeParse(req.query);
      if (!query.success) {
        httpLogger.warn({ kind, query: req.query }, 'Invalid range requested');
        res.status(400).json({ error: "Invalid range", code: "INVALID_QUERY" });
        return;
      }

      const { begin, cached } = query.data;
      const end = query.data.end ?? access.defaultEnd();

      try {
        if (cached) {
          res.type("text/plain").send(access.cached(begin, end));
          return;
        }

        const { startByte, endByte } = access.range(begin, end);
        if (endByte - startByte > config.maxExcerptBytes) {
          httpLogger.warn({ kind, begin, end, startByte, endByte }, 'Excerpt too large');
          res.status(413).json({
            error: "Excerpt too large",
            bytes: endByte - startByte,
            limit: config.maxExcerptBytes,
          });
          return;
        }

        res.type("text/plain").send(access.load(begin, end));
      } catch (error) {
        sendError(res, error, { kind, begin, end });
      }
    };
  };

  router.get("/text", excerptRoute("text"));
  router.get("/lines", excerptRoute("lines"));
  router.get("/bytes", excerptRoute("bytes"));

  // Persist the position index next to the text
  router.post("/index", (_req, res) => {
    if (!config.indexPath) {
      res.status(409).json({ error: "No index path configured" });
      return;
    }

    try {
      const indexPath = textFile.saveIndex(config.indexPath);
      res.status(201).json({ indexPath });
    } catch (error) {
      logError(httpLogger, error, { context: 'index-save' });
      res.status(500).json({ error: "Failed to write index" });
    }
  });

  app.use(REST_ROOT, router);

  return app;
}
