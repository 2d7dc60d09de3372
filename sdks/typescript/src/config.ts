import { z } from "zod";
import { DEFAULT_BASE_URLS } from "./endpoints";
import { ConfigurationError } from "./errors";

const envSchema = z.object({
  GIE_API_KEY: z.string({ required_error: "GIE_API_KEY is required" }).min(1, "GIE_API_KEY is required"),
  GIE_AGSI_URL: z.string().url().default(DEFAULT_BASE_URLS.AGSI),
  GIE_ALSI_URL: z.string().url().default(DEFAULT_BASE_URLS.ALSI),
  GIE_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  GIE_LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("silent"),
});

export type GieEnv = z.infer<typeof envSchema>;

export interface GieConfig {
  apiKey: string;
  baseUrls: { AGSI: string; ALSI: string };
  timeoutMs: number;
  logLevel: GieEnv["GIE_LOG_LEVEL"];
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): GieConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const fieldErrors: Record<string, string[]> = {};
    for (const [field, messages] of Object.entries(parsed.error.flatten().fieldErrors)) {
      if (messages) {
        fieldErrors[field] = messages;
      }
    }
    throw new ConfigurationError(
      `Invalid environment configuration: ${Object.keys(fieldErrors).join(", ")}`,
      fieldErrors,
    );
  }

  const env = parsed.data;
  return {
    apiKey: env.GIE_API_KEY,
    baseUrls: { AGSI: env.GIE_AGSI_URL, ALSI: env.GIE_ALSI_URL },
    timeoutMs: env.GIE_TIMEOUT_MS,
    logLevel: env.GIE_LOG_LEVEL,
  };
}
