import { collectDataset } from "@/src/lib/collector/collect";
import type { QualifierConfig } from "@/src/lib/config/env";
import { evaluateQualification } from "@/src/lib/evaluator/evaluate";
import { buildVerdictExplanation } from "@/src/lib/explain/builder";
import { SteamClient } from "@/src/lib/providers/steam";
import type {
  AccountIdentifier,
  CollectOptions,
  PlatformApiClient,
  QualificationVerdict,
  QualifyRequest,
  QualifyResponse
} from "@/src/lib/types";

export type QualifyOptions = CollectOptions & {
  client?: PlatformApiClient;
};

export const createSteamClient = (config: QualifierConfig) =>
  new SteamClient({
    apiKey: config.steamApiKey,
    baseUrl: config.steamBaseUrl,
    maxRetries: config.maxRetries,
    cacheTtlMs: config.cacheTtlMs
  });

export const checkQualification = async (
  accountId: AccountIdentifier,
  options: QualifyOptions = {}
): Promise<QualificationVerdict> => {
  const client = options.client ?? new SteamClient();
  const dataset = await collectDataset(accountId, client, options);
  return evaluateQualification(dataset);
};

export const qualifyAccount = async (
  request: QualifyRequest,
  options: QualifyOptions = {}
): Promise<QualifyResponse> => {
  const client = options.client ?? new SteamClient();
  const dataset = await collectDataset(request.steamId, client, options);
  const verdict = evaluateQualification(dataset);

  return {
    steamId: request.steamId,
    checkedAt: new Date().toISOString(),
    verdict,
    explanation: buildVerdictExplanation(verdict),
    unavailableAchievementGames: dataset.unavailableAchievementItemIds.length
  };
};
