export type CriterionCode = "HOURS" | "ACHIEVEMENTS" | "DIVERSITY" | "CONCENTRATION";

export type ThresholdDirection = "atLeast" | "atMost";

export type CriterionResult = {
  code: CriterionCode;
  label: string;
  value: number;
  threshold: number;
  direction: ThresholdDirection;
  passed: boolean;
  shortfall: number;
};

export type MostPlayedGame = {
  id: number;
  name: string | null;
};

export type QualificationVerdict = Readonly<{
  totalHours: number;
  totalAchievements: number;
  gamesOver1Hr: number;
  mostPlayedPercentage: number;
  hoursOk: boolean;
  achievementsOk: boolean;
  diversityOk: boolean;
  concentrationOk: boolean;
  valid: boolean;
  mostPlayedGame: MostPlayedGame | null;
  criteria: readonly CriterionResult[];
  criteriaMet: number;
}>;
