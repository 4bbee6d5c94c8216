import type {
  CriterionLine,
  CriterionResult,
  QualificationVerdict,
  VerdictExplanation
} from "@/src/lib/types";

const numberFormatter = new Intl.NumberFormat("en-US", { maximumFractionDigits: 2 });

const formatNumber = (value: number) => numberFormatter.format(value);

const plural = (count: number, singular: string, pluralForm = `${singular}s`) =>
  `${count} ${count === 1 ? singular : pluralForm}`;

const describeCriterion = (criterion: CriterionResult, verdict: QualificationVerdict): string => {
  switch (criterion.code) {
    case "HOURS": {
      const base = `Total playtime ${formatNumber(criterion.value)} h (requirement: ${criterion.threshold}+ hours).`;
      return criterion.passed ? base : `${base} Need ${criterion.shortfall.toFixed(2)} more hours.`;
    }
    case "ACHIEVEMENTS": {
      const base = `${plural(criterion.value, "achievement")} unlocked (requirement: ${criterion.threshold}+).`;
      return criterion.passed
        ? base
        : `${base} Need ${plural(criterion.shortfall, "more achievement", "more achievements")}.`;
    }
    case "DIVERSITY": {
      const base = `${plural(criterion.value, "game")} played over 1 hour (requirement: ${criterion.threshold}+).`;
      return criterion.passed
        ? base
        : `${base} Need ${plural(criterion.shortfall, "more game", "more games")}.`;
    }
    case "CONCENTRATION": {
      const game = verdict.mostPlayedGame ? ` (${verdict.mostPlayedGame.name ?? "Unknown"})` : "";
      const base = `Most played game${game} holds ${formatNumber(criterion.value)}% of playtime (requirement: ${criterion.threshold}% or less).`;
      return criterion.passed ? base : `${base} Over by ${criterion.shortfall.toFixed(2)}%.`;
    }
  }
};

export const buildVerdictExplanation = (verdict: QualificationVerdict): VerdictExplanation => {
  const lines: CriterionLine[] = verdict.criteria.map((criterion) => ({
    code: criterion.code,
    passed: criterion.passed,
    text: describeCriterion(criterion, verdict)
  }));

  const total = verdict.criteria.length;
  const headline = verdict.valid
    ? `Qualified: all ${total} criteria met.`
    : `Not qualified: ${verdict.criteriaMet} of ${total} criteria met.`;

  return { headline, lines };
};
