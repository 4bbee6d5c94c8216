import { z } from "zod";
import { ConfigError } from "@/src/lib/errors";

export const DEFAULT_STEAM_BASE_URL = "https://api.steampowered.com";

const intFromEnv = (fallback: number, min: number, max: number) =>
  z.coerce.number().int().min(min).max(max).default(fallback);

const envSchema = z.object({
  STEAM_API_KEY: z.string().trim().min(1, "STEAM_API_KEY is required"),
  STEAM_API_BASE_URL: z.string().url().default(DEFAULT_STEAM_BASE_URL),
  STEAM_MAX_RETRIES: intFromEnv(2, 0, 5),
  QUALIFY_ACHIEVEMENT_CONCURRENCY: intFromEnv(8, 1, 32),
  QUALIFY_TIMEOUT_MS: intFromEnv(30_000, 1_000, 300_000),
  QUALIFY_CACHE_TTL_MS: intFromEnv(10 * 60 * 1000, 0, 24 * 60 * 60 * 1000)
});

export type QualifierConfig = {
  steamApiKey: string;
  steamBaseUrl: string;
  maxRetries: number;
  achievementConcurrency: number;
  timeoutMs: number;
  cacheTtlMs: number;
};

const blankToUndefined = (env: Record<string, string | undefined>) =>
  Object.fromEntries(
    Object.entries(env).map(([key, value]) => [key, value?.trim() ? value : undefined])
  );

export const loadQualifierConfig = (
  env: Record<string, string | undefined> = process.env
): QualifierConfig => {
  const parsed = envSchema.safeParse(blankToUndefined(env));
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const values = parsed.data;
  return {
    steamApiKey: values.STEAM_API_KEY,
    steamBaseUrl: values.STEAM_API_BASE_URL,
    maxRetries: values.STEAM_MAX_RETRIES,
    achievementConcurrency: values.QUALIFY_ACHIEVEMENT_CONCURRENCY,
    timeoutMs: values.QUALIFY_TIMEOUT_MS,
    cacheTtlMs: values.QUALIFY_CACHE_TTL_MS
  };
};
