import {
  applyFeltLoad,
  calculateDailyLoad,
  calculateDailyLoadFromEvents,
  carriedLoad,
  dayRecoveryModifier,
  rawDayLoad,
} from "../load-calculator";
import { DEFAULT_LOAD_THRESHOLDS } from "../load-types";
import type {
  ActivityContributor,
  LoadConfiguration,
  SleepContributor,
  SymptomObservation,
} from "../load-types";

const config: LoadConfiguration = {
  thresholds: DEFAULT_LOAD_THRESHOLDS,
  symptomMultiplier: 1,
  decayRate: 0.7,
};

const DAY = "2025-06-10";

function activity(level: number, durationMinutes: number | null): ActivityContributor {
  return {
    kind: "activity",
    effectiveDate: new Date("2025-06-10T10:00:00"),
    exertion: { physical: level, cognitive: level, emotional: level },
    durationMinutes,
  };
}

function nightSleep(quality: number, hours = 8): SleepContributor {
  const wake = new Date("2025-06-10T07:00:00");
  return {
    kind: "sleep",
    bedTime: new Date(wake.getTime() - hours * 3600000),
    wakeTime: wake,
    quality,
  };
}

describe("calculateDailyLoad", () => {
  it("decays yesterday by poor sleep and adds today's raw load", () => {
    // sleep q1 adds 10, the activity adds 1 × (50/60) × 6 = 5
    const score = calculateDailyLoad(DAY, [nightSleep(1), activity(1, 50)], [], 30, config);
    expect(score.rawLoad).toBeCloseTo(15, 5);
    expect(score.decayedLoad).toBeCloseTo(25.5, 5);
    expect(score.riskLevel).toBe("caution");
    expect(score.date).toBe(DAY);
  });

  it("caps twenty intense activities at 100", () => {
    const activities = Array.from({ length: 20 }, () => activity(5, 120));
    const score = calculateDailyLoad(DAY, activities, [], 0, config);
    expect(score.rawLoad).toBe(100);
    expect(score.decayedLoad).toBe(100);
    expect(score.riskLevel).toBe("critical");
  });

  it("never drops below the raw load when carrying load forward", () => {
    const score = calculateDailyLoad(DAY, [activity(3, 60)], [], 40, config);
    expect(score.rawLoad).toBe(18);
    expect(score.decayedLoad).toBeCloseTo(46, 5);
    expect(score.decayedLoad).toBeGreaterThanOrEqual(score.rawLoad);
  });

  it("includes symptom load in the raw load", () => {
    const symptoms: SymptomObservation[] = [
      { severity: 5, polarity: "negative", occurredAt: new Date("2025-06-10T09:00:00") },
      { severity: 4, polarity: "negative", occurredAt: new Date("2025-06-10T18:00:00") },
    ];
    const score = calculateDailyLoad(DAY, [], symptoms, 0, config);
    expect(score.rawLoad).toBe(30);
    expect(score.riskLevel).toBe("caution");
  });

  it("clamps decay rate and previous load", () => {
    const wild = calculateDailyLoad(DAY, [], [], 500, { ...config, decayRate: 3 });
    expect(wild.decayedLoad).toBe(100);
    const none = calculateDailyLoad(DAY, [], [], -20, config);
    expect(none.decayedLoad).toBe(0);
    expect(none.riskLevel).toBe("safe");
  });

  it("drops previous load entirely with a zero decay rate", () => {
    const score = calculateDailyLoad(DAY, [activity(3, 60)], [], 80, { ...config, decayRate: 0 });
    expect(score.decayedLoad).toBe(18);
  });
});

describe("dayRecoveryModifier", () => {
  it("is neutral without a main sleep", () => {
    expect(dayRecoveryModifier([activity(3, 60)])).toBe(1);
    expect(dayRecoveryModifier([nightSleep(5, 1)])).toBe(1);
  });

  it("uses the longest main sleep of the day", () => {
    expect(dayRecoveryModifier([nightSleep(1, 4), nightSleep(4, 8)])).toBe(1.2);
  });
});

describe("rawDayLoad", () => {
  it("sums events and symptoms without clamping", () => {
    const activities = Array.from({ length: 3 }, () => activity(5, 120));
    expect(rawDayLoad(activities, [], 1)).toBe(180);
  });
});

describe("calculateDailyLoadFromEvents", () => {
  it("matches the flat contributor form", () => {
    const events = {
      activities: [activity(3, 60)],
      meals: [],
      sleep: [nightSleep(2)],
      symptoms: [],
    };
    const fromEvents = calculateDailyLoadFromEvents(DAY, events, 20, config);
    const flat = calculateDailyLoad(DAY, [activity(3, 60), nightSleep(2)], [], 20, config);
    expect(fromEvents).toEqual(flat);
    expect(fromEvents.rawLoad).toBe(23);
    expect(fromEvents.decayedLoad).toBeCloseTo(32.8, 5);
  });
});

describe("felt load", () => {
  const base = calculateDailyLoad(DAY, [activity(5, 120)], [], 0, config);

  it("leaves the score alone without a reflection", () => {
    expect(applyFeltLoad(base, null)).toBe(base);
    expect(carriedLoad(base)).toBe(60);
  });

  it("scales decayed load and carries the felt value", () => {
    const felt = applyFeltLoad(base, 1.5);
    expect(felt.feltLoad).toBe(90);
    expect(felt.decayedLoad).toBe(60);
    expect(carriedLoad(felt)).toBe(90);
  });

  it("clamps the multiplier and the result", () => {
    expect(applyFeltLoad(base, 10).feltLoad).toBe(100);
    expect(applyFeltLoad(base, 0.1).feltLoad).toBe(30);
  });
});

describe("non-finite configuration and carry", () => {
  const badSymptom: SymptomObservation = { severity: 5, polarity: "negative", occurredAt: new Date("2025-06-10T09:00:00") };

  it("saturates when every input is NaN", () => {
    const score = calculateDailyLoad(DAY, [activity(NaN, NaN)], [badSymptom], NaN, {
      thresholds: DEFAULT_LOAD_THRESHOLDS,
      symptomMultiplier: NaN,
      decayRate: NaN,
    });
    expect(score).toEqual({ date: DAY, rawLoad: 100, decayedLoad: 100, riskLevel: "critical" });
  });

  it("reads a NaN previous load as a full carry", () => {
    const score = calculateDailyLoad(DAY, [], [], NaN, config);
    expect(score.rawLoad).toBe(0);
    expect(score.decayedLoad).toBeCloseTo(70, 5);
  });

  it("reads a NaN decay rate as no decay", () => {
    const score = calculateDailyLoad(DAY, [], [], 40, { ...config, decayRate: NaN });
    expect(score.decayedLoad).toBe(40);
  });

  it("caps a heavy symptom day only at the daily total", () => {
    const score = calculateDailyLoad(DAY, [], [badSymptom], 0, { ...config, symptomMultiplier: 10 });
    expect(score.rawLoad).toBe(100);
    expect(score.riskLevel).toBe("critical");
  });
});
