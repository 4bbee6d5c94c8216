import type { CollectionErrorKind } from "@/src/lib/errors";
import type { VerdictExplanation } from "./explain";
import type { QualificationVerdict } from "./verdict";

export type QualifyRequest = {
  steamId: string;
};

export type QualifyResponse = {
  steamId: string;
  checkedAt: string;
  verdict: QualificationVerdict;
  explanation: VerdictExplanation;
  unavailableAchievementGames: number;
};

export type QualifyErrorResponse = {
  error: {
    kind: CollectionErrorKind | "InvalidRequest" | "Configuration" | "Internal";
    message: string;
    hint?: string;
    retryable: boolean;
  };
};
