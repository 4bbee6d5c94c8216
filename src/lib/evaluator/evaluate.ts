import type {
  CriterionResult,
  GamingDataset,
  MostPlayedGame,
  OwnedItem,
  QualificationVerdict,
  ThresholdDirection
} from "@/src/lib/types";

export const QUALIFICATION_THRESHOLDS = {
  minTotalHours: 100,
  minTotalAchievements: 10,
  minGamesOverOneHour: 3,
  maxMostPlayedPercentage: 50,
  oneHourMinutes: 60
} as const;

const buildCriterion = (
  code: CriterionResult["code"],
  label: string,
  value: number,
  threshold: number,
  direction: ThresholdDirection,
  passed: boolean
): CriterionResult =>
  Object.freeze({
    code,
    label,
    value,
    threshold,
    direction,
    passed,
    shortfall: passed ? 0 : direction === "atLeast" ? threshold - value : value - threshold
  });

const findMostPlayed = (dataset: GamingDataset): { minutes: number; game: MostPlayedGame | null } => {
  const best = dataset.items.reduce<OwnedItem | null>(
    (current, item) => (!current || item.usageMinutes > current.usageMinutes ? item : current),
    null
  );
  if (!best || best.usageMinutes === 0) return { minutes: 0, game: null };
  return { minutes: best.usageMinutes, game: { id: best.id, name: best.name } };
};

export const evaluateQualification = (dataset: GamingDataset): QualificationVerdict => {
  const thresholds = QUALIFICATION_THRESHOLDS;

  const totalMinutes = dataset.items.reduce((sum, item) => sum + item.usageMinutes, 0);
  const totalHours = totalMinutes / 60;

  const gamesOver1Hr = dataset.items.filter(
    (item) => item.usageMinutes > thresholds.oneHourMinutes
  ).length;

  const mostPlayed = findMostPlayed(dataset);
  const mostPlayedPercentage = totalMinutes > 0 ? (mostPlayed.minutes / totalMinutes) * 100 : 0;

  const totalAchievements = dataset.achievementCounts.reduce(
    (sum, entry) => sum + entry.completedCount,
    0
  );

  const hoursOk = totalHours >= thresholds.minTotalHours;
  const achievementsOk = totalAchievements >= thresholds.minTotalAchievements;
  const diversityOk = gamesOver1Hr >= thresholds.minGamesOverOneHour;
  const concentrationOk = mostPlayedPercentage <= thresholds.maxMostPlayedPercentage;

  const criteria = Object.freeze([
    buildCriterion("HOURS", "Total playtime", totalHours, thresholds.minTotalHours, "atLeast", hoursOk),
    buildCriterion(
      "ACHIEVEMENTS",
      "Achievements unlocked",
      totalAchievements,
      thresholds.minTotalAchievements,
      "atLeast",
      achievementsOk
    ),
    buildCriterion(
      "DIVERSITY",
      "Games played over 1 hour",
      gamesOver1Hr,
      thresholds.minGamesOverOneHour,
      "atLeast",
      diversityOk
    ),
    buildCriterion(
      "CONCENTRATION",
      "Share of playtime in most played game",
      mostPlayedPercentage,
      thresholds.maxMostPlayedPercentage,
      "atMost",
      concentrationOk
    )
  ]);

  return Object.freeze({
    totalHours,
    totalAchievements,
    gamesOver1Hr,
    mostPlayedPercentage,
    hoursOk,
    achievementsOk,
    diversityOk,
    concentrationOk,
    valid: hoursOk && achievementsOk && diversityOk && concentrationOk,
    mostPlayedGame: mostPlayed.game,
    criteria,
    criteriaMet: criteria.filter((criterion) => criterion.passed).length
  });
};
