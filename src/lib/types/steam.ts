export type AccountIdentifier = string;

export type OwnedItem = {
  readonly id: number;
  readonly name: string | null;
  readonly usageMinutes: number;
};

export type AchievementCount = {
  readonly itemId: number;
  readonly completedCount: number;
};

export type PlatformErrorKind = "Unauthorized" | "ProfilePrivate" | "NetworkError" | "NotAvailable";

export interface PlatformApiClient {
  /** Resolves to `null` when the account exists but exposes no game list. */
  getOwnedGames(accountId: AccountIdentifier, signal?: AbortSignal): Promise<OwnedItem[] | null>;
  getAchievementCount(
    accountId: AccountIdentifier,
    itemId: number,
    signal?: AbortSignal
  ): Promise<number>;
}
