import type { AccountIdentifier, AchievementCount, OwnedItem } from "./steam";

export type GamingDataset = {
  readonly accountId: AccountIdentifier;
  readonly items: readonly OwnedItem[];
  readonly achievementCounts: readonly AchievementCount[];
  readonly unavailableAchievementItemIds: readonly number[];
};

export type AchievementOutcome =
  | { status: "fulfilled"; count: number }
  | { status: "failed"; reason: string };

export type CollectOptions = {
  achievementConcurrency?: number;
  timeoutMs?: number;
  signal?: AbortSignal;
};
