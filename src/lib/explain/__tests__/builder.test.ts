import { describe, expect, it } from "vitest";
import { evaluateQualification } from "@/src/lib/evaluator/evaluate";
import type { GamingDataset } from "@/src/lib/types";
import { buildVerdictExplanation } from "../builder";

const makeDataset = (
  games: Array<[name: string, minutes: number]>,
  totalAchievements: number
): GamingDataset => ({
  accountId: "76561197960287930",
  items: games.map(([name, usageMinutes], index) => ({ id: index + 1, name, usageMinutes })),
  achievementCounts: [{ itemId: 1, completedCount: totalAchievements }],
  unavailableAchievementItemIds: []
});

const explain = (dataset: GamingDataset) => buildVerdictExplanation(evaluateQualification(dataset));

describe("verdict explanation", () => {
  it("describes a fully qualified account", () => {
    const explanation = explain(
      makeDataset(
        [
          ["Alpha", 3000],
          ["Bravo", 2000],
          ["Charlie", 1100],
          ["Delta", 50]
        ],
        15
      )
    );

    expect(explanation.headline).toBe("Qualified: all 4 criteria met.");
    expect(explanation.lines.map((line) => line.text)).toEqual([
      "Total playtime 102.5 h (requirement: 100+ hours).",
      "15 achievements unlocked (requirement: 10+).",
      "3 games played over 1 hour (requirement: 3+).",
      "Most played game (Alpha) holds 48.78% of playtime (requirement: 50% or less)."
    ]);
    expect(explanation.lines.every((line) => line.passed)).toBe(true);
  });

  it("states how far off each missed criterion is", () => {
    const explanation = explain(
      makeDataset(
        [
          ["Alpha", 1200],
          ["Bravo", 1200],
          ["Charlie", 1200]
        ],
        4
      )
    );

    expect(explanation.headline).toBe("Not qualified: 2 of 4 criteria met.");
    expect(explanation.lines[0]).toEqual({
      code: "HOURS",
      passed: false,
      text: "Total playtime 60 h (requirement: 100+ hours). Need 40.00 more hours."
    });
    expect(explanation.lines[1].text).toBe(
      "4 achievements unlocked (requirement: 10+). Need 6 more achievements."
    );
  });

  it("reports concentration overshoot and missing game diversity", () => {
    const explanation = explain(
      makeDataset(
        [
          ["Alpha", 6000],
          ["Bravo", 30]
        ],
        1
      )
    );

    expect(explanation.lines[1].text).toBe(
      "1 achievement unlocked (requirement: 10+). Need 9 more achievements."
    );
    expect(explanation.lines[2].text).toBe(
      "1 game played over 1 hour (requirement: 3+). Need 2 more games."
    );
    expect(explanation.lines[3].text).toBe(
      `Most played game (Alpha) holds 99.5% of playtime (requirement: 50% or less). Over by 49.50%.`
    );
  });

  it("falls back to Unknown for an unnamed top game", () => {
    const verdict = evaluateQualification({
      accountId: "76561197960287930",
      items: [{ id: 7, name: null, usageMinutes: 600 }],
      achievementCounts: [],
      unavailableAchievementItemIds: [7]
    });

    expect(buildVerdictExplanation(verdict).lines[3].text).toBe(
      "Most played game (Unknown) holds 100% of playtime (requirement: 50% or less). Over by 50.00%."
    );
  });
});
