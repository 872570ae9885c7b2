import { analyseContributions } from "../load-breakdown";
import type { LoadContributor, SleepContributor, SymptomObservation } from "../load-types";

const poorNight: SleepContributor = {
  kind: "sleep",
  bedTime: new Date("2025-06-09T23:00:00"),
  wakeTime: new Date("2025-06-10T07:00:00"),
  quality: 1,
};

function negative(severity: number): SymptomObservation {
  return { severity, polarity: "negative", occurredAt: new Date("2025-06-10T14:00:00") };
}

describe("analyseContributions", () => {
  const contributors: LoadContributor[] = [
    {
      kind: "activity",
      effectiveDate: new Date("2025-06-10T10:00:00"),
      exertion: { physical: 4, cognitive: 2, emotional: 2 },
      durationMinutes: 60,
    },
    {
      kind: "meal",
      effectiveDate: new Date("2025-06-10T12:00:00"),
      exertion: { physical: 3, cognitive: 2, emotional: 2 },
    },
    poorNight,
  ];

  it("splits load across categories", () => {
    const b = analyseContributions(contributors, [negative(5)]);
    expect(b.activityLoad).toBeCloseTo(16, 5);
    expect(b.mealLoad).toBeCloseTo(3.5, 5);
    expect(b.sleepLoad).toBe(10);
    expect(b.symptomLoad).toBe(20);
    expect(b.totalLoad).toBeCloseTo(49.5, 5);
    expect(b.symptomPercentage).toBeCloseTo(40.404, 2);
    expect(b.dominantCategory).toBe("symptom");
  });

  it("percentages sum to 100", () => {
    const b = analyseContributions(contributors, [negative(5), negative(4)]);
    const sum = b.activityPercentage + b.mealPercentage + b.sleepPercentage + b.symptomPercentage;
    expect(sum).toBeCloseTo(100, 1);
  });

  it("is all zeros without load", () => {
    const b = analyseContributions([], [negative(2)]);
    expect(b.totalLoad).toBe(0);
    expect(b.activityPercentage).toBe(0);
    expect(b.mealPercentage).toBe(0);
    expect(b.sleepPercentage).toBe(0);
    expect(b.symptomPercentage).toBe(0);
    expect(b.dominantCategory).toBeNull();
  });

  it("applies the symptom multiplier", () => {
    const b = analyseContributions([], [negative(5)], { symptomMultiplier: 1.5 });
    expect(b.symptomLoad).toBe(30);
    expect(b.symptomPercentage).toBe(100);
  });

  it("breaks ties toward the earlier category", () => {
    const b = analyseContributions([poorNight], [negative(4)]);
    expect(b.sleepLoad).toBe(10);
    expect(b.symptomLoad).toBe(10);
    expect(b.dominantCategory).toBe("sleep");
  });
});

describe("analyseContributions with large symptom multipliers", () => {
  const session: LoadContributor = {
    kind: "activity",
    effectiveDate: new Date("2025-06-10T10:00:00"),
    exertion: { physical: 5, cognitive: 5, emotional: 5 },
    durationMinutes: 120,
  };

  it("weighs each symptom in full", () => {
    const b = analyseContributions([session], [negative(5)], { symptomMultiplier: 10 });
    expect(b.symptomLoad).toBe(200);
    expect(b.totalLoad).toBe(260);
    expect(b.symptomPercentage).toBeCloseTo(76.923, 2);
  });

  it("keeps percentages finite for a NaN multiplier", () => {
    const b = analyseContributions([session], [negative(5)], { symptomMultiplier: NaN });
    expect(b.symptomLoad).toBe(Number.MAX_VALUE);
    expect(b.symptomPercentage).toBe(100);
    expect(b.activityPercentage).toBeCloseTo(0, 5);
    expect(b.dominantCategory).toBe("symptom");
  });
});
