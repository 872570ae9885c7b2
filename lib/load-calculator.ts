import { clamp } from "./load-math";
import {
  isMainRecoveryPeriod,
  loadContribution,
  sleepDurationHours,
  sleepRecoveryModifier,
  symptomLoad,
} from "./load-contributors";
import { classifyRisk } from "./risk-classifier";
import type {
  ActivityContributor,
  LoadConfiguration,
  LoadContributor,
  LoadScore,
  MealContributor,
  SleepContributor,
  SymptomObservation,
} from "./load-types";

export const MAX_LOAD = 100;

export interface DayEvents {
  activities: readonly ActivityContributor[];
  meals: readonly MealContributor[];
  sleep: readonly SleepContributor[];
  symptoms: readonly SymptomObservation[];
}

function mainRecoverySleep(contributors: readonly LoadContributor[]): SleepContributor | null {
  let best: SleepContributor | null = null;
  for (const c of contributors) {
    if (c.kind !== "sleep" || !isMainRecoveryPeriod(c)) continue;
    if (best == null || sleepDurationHours(c) > sleepDurationHours(best)) best = c;
  }
  return best;
}

export function dayRecoveryModifier(contributors: readonly LoadContributor[]): number {
  const sleep = mainRecoverySleep(contributors);
  return sleep ? sleepRecoveryModifier(sleep) : 1.0;
}

export function rawDayLoad(
  contributors: readonly LoadContributor[],
  symptoms: readonly SymptomObservation[],
  symptomMultiplier: number,
): number {
  const eventLoad = contributors.reduce((s, c) => s + loadContribution(c), 0);
  const symptomTotal = symptoms.reduce((s, o) => s + symptomLoad(o, symptomMultiplier), 0);
  return eventLoad + symptomTotal;
}

export function calculateDailyLoad(
  date: string,
  contributors: readonly LoadContributor[],
  symptoms: readonly SymptomObservation[],
  previousLoad: number,
  configuration: LoadConfiguration,
): LoadScore {
  const decayRate = clamp(configuration.decayRate, 0, 1);
  const carried = clamp(previousLoad, 0, MAX_LOAD);
  const decayedPrevious = carried * decayRate * dayRecoveryModifier(contributors);

  const rawLoad = clamp(rawDayLoad(contributors, symptoms, configuration.symptomMultiplier), 0, MAX_LOAD);
  const decayedLoad = clamp(rawLoad + decayedPrevious, 0, MAX_LOAD);

  return {
    date,
    rawLoad,
    decayedLoad,
    riskLevel: classifyRisk(decayedLoad, configuration.thresholds),
  };
}

export function calculateDailyLoadFromEvents(
  date: string,
  events: DayEvents,
  previousLoad: number,
  configuration: LoadConfiguration,
): LoadScore {
  const contributors: LoadContributor[] = [...events.activities, ...events.meals, ...events.sleep];
  return calculateDailyLoad(date, contributors, events.symptoms, previousLoad, configuration);
}

export const FELT_MULTIPLIER_MIN = 0.5;
export const FELT_MULTIPLIER_MAX = 2.0;

export function applyFeltLoad(score: LoadScore, multiplier: number | null | undefined): LoadScore {
  if (multiplier == null) return score;
  const m = clamp(multiplier, FELT_MULTIPLIER_MIN, FELT_MULTIPLIER_MAX);
  return { ...score, feltLoad: clamp(score.decayedLoad * m, 0, MAX_LOAD) };
}

export function carriedLoad(score: LoadScore): number {
  return score.feltLoad ?? score.decayedLoad;
}
