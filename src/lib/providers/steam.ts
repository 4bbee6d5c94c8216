import { sharedCache, type MemoryCache } from "@/src/lib/cache/memory";
import { DEFAULT_STEAM_BASE_URL } from "@/src/lib/config/env";
import { ConfigError, PlatformApiError, isAbortError } from "@/src/lib/errors";
import type { AccountIdentifier, OwnedItem, PlatformApiClient } from "@/src/lib/types";

const DEFAULT_MAX_RETRIES = 2;
const DEFAULT_CACHE_TTL_MS = 10 * 60 * 1000;
const BASE_DELAY_MS = 250;

type SteamClientOptions = {
  apiKey?: string;
  baseUrl?: string;
  maxRetries?: number;
  cacheTtlMs?: number;
  cache?: MemoryCache;
};

type SteamRequestOptions = {
  path: string;
  query: Record<string, string | number | boolean | undefined>;
  signal?: AbortSignal;
};

type SteamResponse =
  | { ok: true; payload: unknown }
  | { ok: false; status: number; body: string };

const sleep = (ms: number, signal?: AbortSignal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

const buildQuery = (query: SteamRequestOptions["query"]) => {
  const params = new URLSearchParams();
  Object.entries(query).forEach(([key, value]) => {
    if (value === undefined) return;
    params.append(key, String(value));
  });
  const qs = params.toString();
  return qs ? `?${qs}` : "";
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const coerceMinutes = (value: unknown) => {
  if (typeof value === "number" && Number.isFinite(value) && value > 0) return Math.floor(value);
  return 0;
};

const coerceString = (value: unknown): string | null => {
  if (typeof value === "string" && value.trim().length > 0) return value;
  return null;
};

const isRetryableStatus = (status: number) => status === 429 || status === 408 || status >= 500;

const parseRetryAfter = (header: string | null) => {
  if (!header) return null;
  const seconds = Number(header);
  if (Number.isFinite(seconds) && seconds >= 0) return seconds * 1000;
  const date = Date.parse(header);
  if (Number.isNaN(date)) return null;
  return Math.max(0, date - Date.now());
};

export const toOwnedItems = (games: unknown[]): OwnedItem[] => {
  const seen = new Set<number>();
  const items: OwnedItem[] = [];

  games.forEach((game) => {
    if (!isRecord(game)) return;
    const appid = game.appid;
    if (typeof appid !== "number" || !Number.isInteger(appid) || seen.has(appid)) return;
    seen.add(appid);
    items.push({
      id: appid,
      name: coerceString(game.name),
      usageMinutes: coerceMinutes(game.playtime_forever)
    });
  });

  return items;
};

export const countUnlockedAchievements = (payload: unknown): number | null => {
  if (!isRecord(payload) || !isRecord(payload.playerstats)) return null;
  const stats = payload.playerstats;
  if (stats.success === false || !Array.isArray(stats.achievements)) return null;
  return stats.achievements.filter((entry) => isRecord(entry) && entry.achieved === 1).length;
};

export class SteamClient implements PlatformApiClient {
  private apiKey: string;
  private baseUrl: string;
  private maxRetries: number;
  private cacheTtlMs: number;
  private cache: MemoryCache;

  constructor(options: SteamClientOptions = {}) {
    this.apiKey = options.apiKey ?? process.env.STEAM_API_KEY ?? "";
    this.baseUrl = options.baseUrl ?? process.env.STEAM_API_BASE_URL ?? DEFAULT_STEAM_BASE_URL;
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.cacheTtlMs = options.cacheTtlMs ?? DEFAULT_CACHE_TTL_MS;
    this.cache = options.cache ?? sharedCache;

    if (!this.apiKey) {
      throw new ConfigError(["STEAM_API_KEY: Steam Web API key is required"]);
    }
  }

  private async request({ path, query, signal }: SteamRequestOptions): Promise<SteamResponse> {
    const url = `${this.baseUrl}${path}${buildQuery({ ...query, key: this.apiKey, format: "json" })}`;

    for (let attempt = 0; attempt <= this.maxRetries; attempt += 1) {
      let response: Response;
      try {
        response = await fetch(url, { headers: { Accept: "application/json" }, signal });
      } catch (error) {
        if (isAbortError(error) || signal?.aborted) throw error;
        throw new PlatformApiError(
          "NetworkError",
          `Steam API unreachable: ${error instanceof Error ? error.message : String(error)}`
        );
      }

      if (response.ok) {
        try {
          return { ok: true, payload: await response.json() };
        } catch {
          throw new PlatformApiError(
            "NetworkError",
            `Steam API returned malformed JSON for ${path}`,
            response.status
          );
        }
      }

      if (!isRetryableStatus(response.status) || attempt === this.maxRetries) {
        return { ok: false, status: response.status, body: await response.text() };
      }

      const retryAfter = parseRetryAfter(response.headers.get("retry-after"));
      const retryDelay = retryAfter ?? BASE_DELAY_MS * 2 ** attempt;
      const jitter = Math.round(Math.random() * 100);
      await sleep(retryDelay + jitter, signal);
    }

    throw new PlatformApiError("NetworkError", "Steam API request failed after retries.");
  }

  async getOwnedGames(accountId: AccountIdentifier, signal?: AbortSignal): Promise<OwnedItem[] | null> {
    const result = await this.request({
      path: "/IPlayerService/GetOwnedGames/v0001/",
      query: {
        steamid: accountId,
        include_appinfo: true,
        include_played_free_games: true
      },
      signal
    });

    if (!result.ok) {
      if (isRetryableStatus(result.status)) {
        throw new PlatformApiError(
          "NetworkError",
          `Steam API error (${result.status}) fetching owned games.`,
          result.status
        );
      }
      throw new PlatformApiError(
        result.status === 401 ? "Unauthorized" : "ProfilePrivate",
        `Steam API error (${result.status}): ${result.body}`,
        result.status
      );
    }

    const body = isRecord(result.payload) ? result.payload.response : undefined;
    if (!isRecord(body) || !Array.isArray(body.games)) {
      return null;
    }

    return toOwnedItems(body.games);
  }

  async getAchievementCount(
    accountId: AccountIdentifier,
    itemId: number,
    signal?: AbortSignal
  ): Promise<number> {
    const cacheKey = `achievements:${accountId}:${itemId}`;

    return this.cache.remember(cacheKey, this.cacheTtlMs, async () => {
      const result = await this.request({
        path: "/ISteamUserStats/GetPlayerAchievements/v1/",
        query: { steamid: accountId, appid: itemId },
        signal
      });

      if (!result.ok) {
        throw new PlatformApiError(
          isRetryableStatus(result.status) ? "NetworkError" : "NotAvailable",
          `Steam API error (${result.status}) fetching achievements for app ${itemId}.`,
          result.status
        );
      }

      const unlocked = countUnlockedAchievements(result.payload);
      if (unlocked === null) {
        throw new PlatformApiError("NotAvailable", `App ${itemId} exposes no achievements.`);
      }
      return unlocked;
    });
  }
}
