import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const booleanFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((value) => value === "true" || value === "1" || value === "yes");

const SettingsSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  CACHE_ENABLED: booleanFlag.default("true"),
  CACHE_TTL: z.coerce.number().int().positive().default(3600),
  CACHE_MAX_ENTRIES: z.coerce.number().int().positive().default(500),
  CACHE_BACKEND: z.enum(["memory", "postgres"]).default("memory"),
  CACHE_SWEEP_INTERVAL_MS: z.coerce.number().int().nonnegative().default(0),
  TOOL_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  SERPAPI_KEY: z.string().min(1).optional()
});

export interface Settings {
  port: number;
  cache: {
    enabled: boolean;
    ttlSeconds: number;
    maxEntries: number;
    backend: "memory" | "postgres";
    sweepIntervalMs: number;
  };
  toolTimeoutMs: number;
  serpApiKey: string | undefined;
}

export class SettingsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SettingsError";
  }
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const withoutBlanks = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ""));
  const result = SettingsSchema.safeParse(withoutBlanks);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new SettingsError(`Invalid configuration: ${issues}`);
  }
  const parsed = result.data;

  return {
    port: parsed.PORT,
    cache: {
      enabled: parsed.CACHE_ENABLED,
      ttlSeconds: parsed.CACHE_TTL,
      maxEntries: parsed.CACHE_MAX_ENTRIES,
      backend: parsed.CACHE_BACKEND,
      sweepIntervalMs: parsed.CACHE_SWEEP_INTERVAL_MS
    },
    toolTimeoutMs: parsed.TOOL_TIMEOUT_MS,
    serpApiKey: parsed.SERPAPI_KEY
  };
}
