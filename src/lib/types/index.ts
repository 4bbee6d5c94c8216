export type {
  AccountIdentifier,
  AchievementCount,
  OwnedItem,
  PlatformApiClient,
  PlatformErrorKind
} from "./steam";
export type { AchievementOutcome, CollectOptions, GamingDataset } from "./dataset";
export type {
  CriterionCode,
  CriterionResult,
  MostPlayedGame,
  QualificationVerdict,
  ThresholdDirection
} from "./verdict";
export type { CriterionLine, VerdictExplanation } from "./explain";
export type { QualifyErrorResponse, QualifyRequest, QualifyResponse } from "./qualify";
