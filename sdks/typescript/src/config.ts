import { z } from "zod";
import { ConfigError } from "./errors";
import { createConsoleLogger, type LogLevel } from "./logger";
import type { ClientOptions } from "./types";

const EnvSchema = z.object({
  API_URL: z.string().url(),
  USERNAME: z.string().min(1),
  PASSWORD: z.string().min(1),
  FUGA_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
});

export interface FugaConfig {
  apiUrl: string;
  username: string;
  password: string;
  timeoutMs?: number;
  logLevel: LogLevel;
}

/**
 * Reads client settings from environment variables. Blank values count as unset.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): FugaConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ""),
  );
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`));
  }

  return {
    apiUrl: parsed.data.API_URL,
    username: parsed.data.USERNAME,
    password: parsed.data.PASSWORD,
    timeoutMs: parsed.data.FUGA_TIMEOUT_MS,
    logLevel: parsed.data.LOG_LEVEL,
  };
}

export function toClientOptions(config: FugaConfig, overrides: Partial<ClientOptions> = {}): ClientOptions {
  return {
    apiUrl: config.apiUrl,
    username: config.username,
    password: config.password,
    timeoutMs: config.timeoutMs,
    logger: createConsoleLogger(config.logLevel),
    ...overrides,
  };
}
