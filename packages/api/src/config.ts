import os from "node:os";
import {
  CONVERT_TIMEOUT_MS,
  DEFAULT_HOST,
  DEFAULT_PORT,
  MAX_UPLOAD_MB,
} from "@slidetext/utils";
import { z } from "zod";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(DEFAULT_PORT),
  HOST: z.string().min(1).default(DEFAULT_HOST),
  MAX_UPLOAD_MB: z.coerce.number().positive().default(MAX_UPLOAD_MB),
  SOFFICE_PATH: z.string().min(1).default("soffice"),
  CONVERT_TIMEOUT_MS: z.coerce.number().int().positive().default(CONVERT_TIMEOUT_MS),
  CONVERTER_ENABLED: booleanFlag.default("true"),
  TMP_DIR: z.string().min(1).optional(),
});

export interface AppConfig {
  port: number;
  host: string;
  maxUploadBytes: number;
  converter: {
    enabled: boolean;
    binary: string;
    timeoutMs: number;
  };
  tmpDir: string;
}

/** Reads configuration from environment variables; throws listing every invalid one. */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new Error(`Invalid configuration: ${issues.join("; ")}`);
  }

  const vars = result.data;
  return {
    port: vars.PORT,
    host: vars.HOST,
    maxUploadBytes: Math.floor(vars.MAX_UPLOAD_MB * 1024 * 1024),
    converter: {
      enabled: vars.CONVERTER_ENABLED,
      binary: vars.SOFFICE_PATH,
      timeoutMs: vars.CONVERT_TIMEOUT_MS,
    },
    tmpDir: vars.TMP_DIR ?? os.tmpdir(),
  };
}
