import type { CriterionCode } from "./verdict";

export type CriterionLine = {
  code: CriterionCode;
  passed: boolean;
  text: string;
};

export type VerdictExplanation = {
  headline: string;
  lines: CriterionLine[];
};
