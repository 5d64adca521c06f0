/**
 * Server configuration, read once from the environment.
 */

import path from "node:path";
import * as z from "zod/v4";
import { Err, LOG_LEVELS, Ok, type LogLevel, type Result } from "@phpscope/core";

export interface ReflectorConfig {
  /** Absolute base of every request path and of reported file paths */
  projectRoot: string;
  /** Name of the dependency directory */
  vendorDir: string;
  /** Lifetime of cached vendor results */
  cacheTtlMs: number;
  /** `path` of class_usages when the caller gives none */
  defaultScanPath: string;
  logLevel: LogLevel;
}

const DAY_MS = 24 * 60 * 60 * 1000;

const EnvSchema = z.object({
  PHPSCOPE_PROJECT_ROOT: z.string().min(1).optional(),
  PHPSCOPE_VENDOR_DIR: z
    .string()
    .min(1)
    .regex(/^[^/\\]+$/, "must be a directory name, not a path")
    .default("vendor"),
  PHPSCOPE_CACHE_TTL_MS: z.coerce.number().int().nonnegative().default(DAY_MS),
  PHPSCOPE_DEFAULT_SCAN_PATH: z.string().min(1).default("app"),
  PHPSCOPE_LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
});

export function loadConfig(
  env: Record<string, string | undefined>,
  cwd: string = process.cwd()
): Result<ReflectorConfig, Error> {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    return Err(new Error(`Invalid configuration: ${problems.join("; ")}`));
  }

  const values = parsed.data;
  return Ok({
    projectRoot: path.resolve(cwd, values.PHPSCOPE_PROJECT_ROOT ?? "."),
    vendorDir: values.PHPSCOPE_VENDOR_DIR,
    cacheTtlMs: values.PHPSCOPE_CACHE_TTL_MS,
    defaultScanPath: values.PHPSCOPE_DEFAULT_SCAN_PATH,
    logLevel: values.PHPSCOPE_LOG_LEVEL,
  });
}
