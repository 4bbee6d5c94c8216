import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import { createMemoryCache } from "@/src/lib/cache/memory";
import { ConfigError, PlatformApiError } from "@/src/lib/errors";
import { SteamClient, countUnlockedAchievements, toOwnedItems } from "../steam";

const BASE_URL = "https://steam.test";
const ACCOUNT = "76561197960287930";

const jsonResponse = (body: unknown, status = 200, headers: Record<string, string> = {}) =>
  new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json", ...headers }
  });

type FetchFn = (input: RequestInfo | URL, init?: RequestInit) => Promise<Response>;

const requestUrl = (input: RequestInfo | URL) =>
  new URL(typeof input === "string" ? input : input instanceof URL ? input.href : input.url);

describe("steam client", () => {
  let fetchMock: Mock<FetchFn>;

  const createClient = (maxRetries = 0) =>
    new SteamClient({
      apiKey: "test-key",
      baseUrl: BASE_URL,
      maxRetries,
      cache: createMemoryCache()
    });

  beforeEach(() => {
    fetchMock = vi.fn<FetchFn>();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.unstubAllEnvs();
  });

  it("requires an api key", () => {
    vi.stubEnv("STEAM_API_KEY", "");
    expect(() => new SteamClient()).toThrow(ConfigError);
  });

  it("requests owned games with app info and free games included", async () => {
    fetchMock.mockResolvedValue(
      jsonResponse({
        response: {
          game_count: 2,
          games: [
            { appid: 570, name: "Dota 2", playtime_forever: 1234 },
            { appid: 440, name: "Team Fortress 2", playtime_forever: 0 }
          ]
        }
      })
    );

    const games = await createClient().getOwnedGames(ACCOUNT);

    expect(games).toEqual([
      { id: 570, name: "Dota 2", usageMinutes: 1234 },
      { id: 440, name: "Team Fortress 2", usageMinutes: 0 }
    ]);
    const url = requestUrl(fetchMock.mock.calls[0][0]);
    expect(url.pathname).toBe("/IPlayerService/GetOwnedGames/v0001/");
    expect(url.searchParams.get("steamid")).toBe(ACCOUNT);
    expect(url.searchParams.get("include_appinfo")).toBe("true");
    expect(url.searchParams.get("include_played_free_games")).toBe("true");
    expect(url.searchParams.get("key")).toBe("test-key");
    expect(url.searchParams.get("format")).toBe("json");
  });

  it("returns null when the profile hides its game list", async () => {
    fetchMock.mockResolvedValue(jsonResponse({ response: {} }));

    expect(await createClient().getOwnedGames(ACCOUNT)).toBeNull();
  });

  it("maps a forbidden owned-games response to ProfilePrivate", async () => {
    fetchMock.mockResolvedValue(new Response("Forbidden", { status: 403 }));

    await expect(createClient().getOwnedGames(ACCOUNT)).rejects.toMatchObject({
      kind: "ProfilePrivate",
      status: 403
    });
  });

  it("maps an unauthorized owned-games response to Unauthorized", async () => {
    fetchMock.mockResolvedValue(new Response("Unauthorized", { status: 401 }));

    await expect(createClient().getOwnedGames(ACCOUNT)).rejects.toMatchObject({
      kind: "Unauthorized"
    });
  });

  it("retries server errors before giving up with a NetworkError", async () => {
    fetchMock.mockImplementation(async () =>
      new Response("unavailable", { status: 503, headers: { "Retry-After": "0" } })
    );

    const error = await createClient(1)
      .getOwnedGames(ACCOUNT)
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(PlatformApiError);
    expect(error).toMatchObject({ kind: "NetworkError", status: 503 });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("recovers when a retry succeeds", async () => {
    fetchMock
      .mockResolvedValueOnce(new Response("slow down", { status: 429, headers: { "Retry-After": "0" } }))
      .mockResolvedValueOnce(jsonResponse({ response: { games: [{ appid: 10, playtime_forever: 61 }] } }));

    const games = await createClient(2).getOwnedGames(ACCOUNT);

    expect(games).toEqual([{ id: 10, name: null, usageMinutes: 61 }]);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("reports transport failures as NetworkError", async () => {
    fetchMock.mockRejectedValue(new TypeError("fetch failed"));

    await expect(createClient().getOwnedGames(ACCOUNT)).rejects.toMatchObject({
      kind: "NetworkError",
      message: "Steam API unreachable: fetch failed"
    });
  });

  it("counts only unlocked achievements", async () => {
    fetchMock.mockResolvedValue(
      jsonResponse({
        playerstats: {
          steamID: ACCOUNT,
          gameName: "Portal 2",
          success: true,
          achievements: [
            { apiname: "A", achieved: 1, unlocktime: 1 },
            { apiname: "B", achieved: 0, unlocktime: 0 },
            { apiname: "C", achieved: 1, unlocktime: 2 }
          ]
        }
      })
    );

    const count = await createClient().getAchievementCount(ACCOUNT, 620);

    expect(count).toBe(2);
    const url = requestUrl(fetchMock.mock.calls[0][0]);
    expect(url.pathname).toBe("/ISteamUserStats/GetPlayerAchievements/v1/");
    expect(url.searchParams.get("appid")).toBe("620");
  });

  it("marks games without stats as NotAvailable", async () => {
    fetchMock.mockResolvedValue(
      jsonResponse({ playerstats: { error: "Requested app has no stats", success: false } }, 400)
    );

    await expect(createClient().getAchievementCount(ACCOUNT, 440)).rejects.toMatchObject({
      kind: "NotAvailable",
      status: 400
    });
  });

  it("caches achievement counts per account and game", async () => {
    fetchMock.mockImplementation(async () =>
      jsonResponse({ playerstats: { success: true, achievements: [{ apiname: "A", achieved: 1 }] } })
    );
    const client = createClient();

    await client.getAchievementCount(ACCOUNT, 620);
    await client.getAchievementCount(ACCOUNT, 620);
    await client.getAchievementCount(ACCOUNT, 400);

    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("passes the abort signal to fetch", async () => {
    const controller = new AbortController();
    fetchMock.mockResolvedValue(jsonResponse({ response: { games: [] } }));

    await createClient().getOwnedGames(ACCOUNT, controller.signal);

    expect(fetchMock.mock.calls[0][1]?.signal).toBe(controller.signal);
  });

  it("stops waiting out Retry-After once the signal aborts", async () => {
    const controller = new AbortController();
    const reason = new Error("stop");
    fetchMock.mockResolvedValue(new Response("busy", { status: 503, headers: { "Retry-After": "60" } }));
    setTimeout(() => controller.abort(reason), 20);
    const startedAt = Date.now();

    await expect(createClient(2).getOwnedGames(ACCOUNT, controller.signal)).rejects.toBe(reason);

    expect(Date.now() - startedAt).toBeLessThan(1000);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});

describe("steam payload normalization", () => {
  it("drops malformed entries and repeated app ids", () => {
    expect(
      toOwnedItems([
        { appid: 1, name: "One", playtime_forever: 10.7 },
        { appid: 1, name: "Duplicate", playtime_forever: 99 },
        { appid: "2", name: "String id" },
        null,
        { appid: 3, name: "   ", playtime_forever: -5 }
      ])
    ).toEqual([
      { id: 1, name: "One", usageMinutes: 10 },
      { id: 3, name: null, usageMinutes: 0 }
    ]);
  });

  it("returns null when the achievement list is missing", () => {
    expect(countUnlockedAchievements({ playerstats: { success: true } })).toBeNull();
    expect(countUnlockedAchievements({ playerstats: { success: true, achievements: [] } })).toBe(0);
    expect(countUnlockedAchievements("nope")).toBeNull();
  });
});
