import { z } from "zod";
import { DEFAULT_STRIDE } from "./core/checkpoint-index";
import type { TextFileMode } from "./core/text-file";

const flag = z
  .enum(["true", "false", "1", "0"])
  .transform(value => value === "true" || value === "1");

// ────────────────  Runtime config (ENV‑driven)  ───────────────────────────
const envSchema = z.object({
  TEXT_PATH: z.string().min(1),
  INDEX_PATH: z.string().min(1).optional(),
  LINE_INDEX: flag.default("true"),
  CHECKPOINT_STRIDE: z.coerce.number().int().positive().default(DEFAULT_STRIDE),
  HTTP_PORT: z.coerce.number().int().min(0).max(65_535).default(5500),
  /** Largest excerpt served in one response (16 MiB). */
  MAX_EXCERPT_BYTES: z.coerce.number().int().positive().default(16 * 1024 * 1024),
});

export interface AppConfig {
  textPath: string;
  indexPath?: string;
  mode: TextFileMode;
  stride: number;
  httpPort: number;
  maxExcerptBytes: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid configuration (${problems.join("; ")})`);
  }

  const vars = parsed.data;
  return {
    textPath: vars.TEXT_PATH,
    indexPath: vars.INDEX_PATH,
    mode: vars.LINE_INDEX ? "with-line-index" : "no-line-index",
    stride: vars.CHECKPOINT_STRIDE,
    httpPort: vars.HTTP_PORT,
    maxExcerptBytes: vars.MAX_EXCERPT_BYTES,
  };
}
