import { calculateLoadRange, groupContributorsByDate, groupSymptomsByDate } from "../load-range";
import { DEFAULT_LOAD_THRESHOLDS } from "../load-types";
import type { ActivityContributor, LoadConfiguration, LoadContributor, SymptomObservation } from "../load-types";

const config: LoadConfiguration = {
  thresholds: DEFAULT_LOAD_THRESHOLDS,
  symptomMultiplier: 1,
  decayRate: 0.7,
};

function hardSession(at: string): ActivityContributor {
  return {
    kind: "activity",
    effectiveDate: new Date(at),
    exertion: { physical: 5, cognitive: 5, emotional: 5 },
    durationMinutes: 120,
  };
}

describe("groupContributorsByDate", () => {
  it("buckets activities by day and sleep by wake day", () => {
    const contributors: LoadContributor[] = [
      hardSession("2025-06-10T09:00:00"),
      hardSession("2025-06-10T18:00:00"),
      {
        kind: "sleep",
        bedTime: new Date("2025-06-10T23:00:00"),
        wakeTime: new Date("2025-06-11T07:00:00"),
        quality: 3,
      },
    ];
    const byDate = groupContributorsByDate(contributors);
    expect([...byDate.keys()]).toEqual(["2025-06-10", "2025-06-11"]);
    expect(byDate.get("2025-06-10")?.length).toBe(2);
    expect(byDate.get("2025-06-11")?.[0].kind).toBe("sleep");
  });

  it("buckets symptoms by occurrence day", () => {
    const symptoms: SymptomObservation[] = [
      { severity: 4, polarity: "negative", occurredAt: new Date("2025-06-12T08:00:00") },
      { severity: 2, polarity: "positive", occurredAt: new Date("2025-06-12T20:00:00") },
    ];
    expect(groupSymptomsByDate(symptoms).get("2025-06-12")?.length).toBe(2);
  });
});

describe("calculateLoadRange", () => {
  const contributorsByDate = groupContributorsByDate([hardSession("2025-06-10T09:00:00")]);
  const noSymptoms = new Map<string, SymptomObservation[]>();

  it("returns one score per day in ascending order", () => {
    const scores = calculateLoadRange("2025-06-10", "2025-06-14", contributorsByDate, noSymptoms, config);
    expect(scores.map(s => s.date)).toEqual([
      "2025-06-10",
      "2025-06-11",
      "2025-06-12",
      "2025-06-13",
      "2025-06-14",
    ]);
  });

  it("decays strictly on idle days after a heavy day", () => {
    const scores = calculateLoadRange("2025-06-10", "2025-06-14", contributorsByDate, noSymptoms, config);
    expect(scores[0].decayedLoad).toBe(60);
    expect(scores[1].decayedLoad).toBeCloseTo(42, 5);
    expect(scores[2].decayedLoad).toBeCloseTo(29.4, 5);
    expect(scores[3].decayedLoad).toBeCloseTo(20.58, 5);
    for (let i = 1; i < scores.length; i++) {
      expect(scores[i].decayedLoad).toBeLessThan(scores[i - 1].decayedLoad);
      expect(scores[i].rawLoad).toBe(0);
    }
    expect(scores.map(s => s.riskLevel)).toEqual(["high", "caution", "caution", "safe", "safe"]);
  });

  it("seeds the first day from the initial load", () => {
    const scores = calculateLoadRange("2025-06-01", "2025-06-01", new Map<string, LoadContributor[]>(), noSymptoms, config, { initialLoad: 50 });
    expect(scores[0].decayedLoad).toBeCloseTo(35, 5);
  });

  it("carries a reflected felt load into the next day", () => {
    const reflectionsByDate = new Map([["2025-06-10", 1.5]]);
    const scores = calculateLoadRange("2025-06-10", "2025-06-11", contributorsByDate, noSymptoms, config, {
      reflectionsByDate,
    });
    expect(scores[0].feltLoad).toBe(90);
    expect(scores[1].feltLoad).toBeUndefined();
    expect(scores[1].decayedLoad).toBeCloseTo(63, 5);
  });

  it("scores a multi-year range one entry per day", () => {
    const scores = calculateLoadRange("2020-01-01", "2024-12-31", new Map<string, LoadContributor[]>(), noSymptoms, config);
    expect(scores.length).toBe(1827);
    expect(scores[0].date).toBe("2020-01-01");
    expect(scores[59].date).toBe("2020-02-29");
    expect(scores[1826].date).toBe("2024-12-31");
    expect(scores.every(s => s.decayedLoad === 0)).toBe(true);
  });

  it("returns nothing for a reversed range", () => {
    expect(calculateLoadRange("2025-06-14", "2025-06-10", contributorsByDate, noSymptoms, config)).toEqual([]);
  });
});
