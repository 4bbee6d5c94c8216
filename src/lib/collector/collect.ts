import { mapWithConcurrency } from "@/src/lib/concurrency/pool";
import { CollectionError, PlatformApiError } from "@/src/lib/errors";
import { createLogger } from "@/src/lib/log/logger";
import type {
  AccountIdentifier,
  AchievementCount,
  AchievementOutcome,
  CollectOptions,
  GamingDataset,
  OwnedItem,
  PlatformApiClient
} from "@/src/lib/types";

export const DEFAULT_ACHIEVEMENT_CONCURRENCY = 8;
export const DEFAULT_COLLECT_TIMEOUT_MS = 30_000;

const logger = createLogger("Collector");

const describeFailure = (error: unknown) => {
  if (error instanceof PlatformApiError) return `${error.kind}: ${error.message}`;
  if (error instanceof Error) return `${error.name}: ${error.message}`;
  return String(error);
};

/** Settles with `work`, or rejects with the signal's reason as soon as it aborts. */
const untilAborted = <T>(work: Promise<T>, signal: AbortSignal) =>
  new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }
    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });

const toCollectionError = (error: unknown) => {
  if (error instanceof PlatformApiError && error.kind !== "NetworkError") {
    return new CollectionError("PrivateOrEmptyProfile", { cause: error });
  }
  return new CollectionError("UpstreamTransient", { cause: error });
};

const fetchOwnedItems = async (
  accountId: AccountIdentifier,
  client: PlatformApiClient,
  signal: AbortSignal,
  callerSignal?: AbortSignal
): Promise<OwnedItem[]> => {
  let owned: OwnedItem[] | null;
  try {
    if (signal.aborted) throw signal.reason;
    owned = await untilAborted(client.getOwnedGames(accountId, signal), signal);
  } catch (error) {
    if (callerSignal?.aborted) throw callerSignal.reason;
    throw toCollectionError(error);
  }

  if (!owned || owned.length === 0) {
    throw new CollectionError("PrivateOrEmptyProfile");
  }
  return owned;
};

const fetchAchievementOutcome = async (
  accountId: AccountIdentifier,
  item: OwnedItem,
  client: PlatformApiClient,
  signal: AbortSignal
): Promise<AchievementOutcome> => {
  if (signal.aborted) {
    return { status: "failed", reason: `Skipped: ${describeFailure(signal.reason)}` };
  }
  try {
    const count = await untilAborted(client.getAchievementCount(accountId, item.id, signal), signal);
    if (!Number.isInteger(count) || count < 0) {
      return { status: "failed", reason: `Invalid achievement count ${count}` };
    }
    return { status: "fulfilled", count };
  } catch (error) {
    return { status: "failed", reason: describeFailure(error) };
  }
};

export const collectDataset = async (
  accountId: AccountIdentifier,
  client: PlatformApiClient,
  options: CollectOptions = {}
): Promise<GamingDataset> => {
  const concurrency = options.achievementConcurrency ?? DEFAULT_ACHIEVEMENT_CONCURRENCY;
  const timeoutMs = options.timeoutMs ?? DEFAULT_COLLECT_TIMEOUT_MS;
  const callerSignal = options.signal;
  const startedAt = Date.now();

  const controller = new AbortController();
  const timer = setTimeout(() => {
    const reason = new Error(`Collection exceeded ${timeoutMs}ms.`);
    reason.name = "TimeoutError";
    controller.abort(reason);
  }, timeoutMs);
  const relayAbort = () => controller.abort(callerSignal?.reason);
  if (callerSignal?.aborted) {
    relayAbort();
  } else {
    callerSignal?.addEventListener("abort", relayAbort, { once: true });
  }

  try {
    logger.info("Collecting account data", { accountId, timeoutMs, concurrency });
    const items = await fetchOwnedItems(accountId, client, controller.signal, callerSignal);
    const candidates = items.filter((item) => item.usageMinutes > 0);

    const outcomes = await mapWithConcurrency(candidates, concurrency, (item) =>
      fetchAchievementOutcome(accountId, item, client, controller.signal)
    );

    if (callerSignal?.aborted) {
      throw callerSignal.reason;
    }

    const achievementCounts: AchievementCount[] = [];
    const unavailableAchievementItemIds: number[] = [];
    outcomes.forEach((outcome, index) => {
      const item = candidates[index];
      if (outcome.status === "fulfilled") {
        achievementCounts.push(Object.freeze({ itemId: item.id, completedCount: outcome.count }));
        return;
      }
      unavailableAchievementItemIds.push(item.id);
      logger.warn("Achievement data unavailable", {
        accountId,
        itemId: item.id,
        name: item.name,
        reason: outcome.reason
      });
    });

    logger.info("Collection complete", {
      accountId,
      items: items.length,
      achievementLookups: candidates.length,
      unavailable: unavailableAchievementItemIds.length,
      durationMs: Date.now() - startedAt
    });

    return Object.freeze({
      accountId,
      items: Object.freeze(items.map((item) => Object.freeze({ ...item }))),
      achievementCounts: Object.freeze(achievementCounts),
      unavailableAchievementItemIds: Object.freeze(unavailableAchievementItemIds)
    });
  } finally {
    clearTimeout(timer);
    callerSignal?.removeEventListener("abort", relayAbort);
  }
};
