import { clamp, mean } from "./load-math";
import type {
  ActivityContributor,
  ExertionLevels,
  LoadContributor,
  MealContributor,
  SleepContributor,
  SymptomObservation,
} from "./load-types";

export const LOAD_MULTIPLIER = 6.0;
export const ACTIVITY_WEIGHT = 1.0;
export const MEAL_WEIGHT = 0.5;
export const MEAL_DURATION_WEIGHT = 0.5;
export const MAX_DURATION_WEIGHT = 2.0;
export const HIGH_EXERTION_CUTOFF = 4.0;
export const MAIN_SLEEP_MIN_HOURS = 3.0;
export const POOR_SLEEP_MAX_LOAD = 10.0;
export const SYMPTOM_NEUTRAL_SEVERITY = 3.0;
export const SYMPTOM_LOAD_PER_STEP = 10.0;

const MS_PER_HOUR = 3600000;

const MAIN_SLEEP_RECOVERY: Record<number, number> = { 1: 0.5, 2: 0.7, 3: 1.0, 4: 1.2, 5: 1.4 };
const MAIN_SLEEP_LOAD: Record<number, number> = { 1: POOR_SLEEP_MAX_LOAD, 2: 5.0, 3: 0, 4: 0, 5: 0 };

function scaleValue(v: number): number {
  return clamp(v, 1, 5);
}

function averageExertion(e: ExertionLevels): number {
  return mean([scaleValue(e.physical), scaleValue(e.cognitive), scaleValue(e.emotional)]);
}

export function durationWeight(durationMinutes: number | null): number {
  if (durationMinutes == null) return 1.0;
  return clamp(durationMinutes / 60, 0, MAX_DURATION_WEIGHT);
}

export function activityLoad(a: ActivityContributor): number {
  return averageExertion(a.exertion) * durationWeight(a.durationMinutes) * ACTIVITY_WEIGHT * LOAD_MULTIPLIER;
}

export function isHighExertionActivity(a: ActivityContributor): boolean {
  return averageExertion(a.exertion) * durationWeight(a.durationMinutes) >= HIGH_EXERTION_CUTOFF;
}

export function hasExertionData(m: MealContributor): boolean {
  return m.exertion.physical != null || m.exertion.cognitive != null || m.exertion.emotional != null;
}

function mealExertion(m: MealContributor): ExertionLevels {
  return {
    physical: m.exertion.physical ?? 1,
    cognitive: m.exertion.cognitive ?? 1,
    emotional: m.exertion.emotional ?? 1,
  };
}

export function mealLoad(m: MealContributor): number {
  if (!hasExertionData(m)) return 0;
  return averageExertion(mealExertion(m)) * MEAL_DURATION_WEIGHT * MEAL_WEIGHT * LOAD_MULTIPLIER;
}

export function isHighExertionMeal(m: MealContributor): boolean {
  if (!hasExertionData(m)) return false;
  return averageExertion(mealExertion(m)) >= HIGH_EXERTION_CUTOFF;
}

export function sleepDurationHours(s: SleepContributor): number {
  const hours = (s.wakeTime.getTime() - s.bedTime.getTime()) / MS_PER_HOUR;
  return clamp(hours, 0, Number.MAX_VALUE);
}

export function sleepQuality(s: SleepContributor): number {
  return Math.round(clamp(s.quality, 1, 5));
}

export function isMainRecoveryPeriod(s: SleepContributor): boolean {
  return sleepDurationHours(s) >= MAIN_SLEEP_MIN_HOURS;
}

export function sleepRecoveryModifier(s: SleepContributor): number {
  const quality = sleepQuality(s);
  if (!isMainRecoveryPeriod(s)) return quality >= 4 ? 1.1 : 1.0;
  return MAIN_SLEEP_RECOVERY[quality] ?? 1.0;
}

export function sleepLoad(s: SleepContributor): number {
  if (!isMainRecoveryPeriod(s)) return 0;
  return MAIN_SLEEP_LOAD[sleepQuality(s)] ?? 0;
}

export function sleepTypeDescription(s: SleepContributor): string {
  const hours = sleepDurationHours(s);
  if (hours < 0.5) return "Rest";
  if (hours < MAIN_SLEEP_MIN_HOURS) return "Nap";
  if (hours <= 5) return "Short sleep";
  if (hours <= 9) return "Full sleep";
  return "Extended sleep";
}

export function sleepQualityDescription(s: SleepContributor): string {
  switch (sleepQuality(s)) {
    case 1: return "Very poor";
    case 2: return "Poor";
    case 3: return "Fair";
    case 4: return "Good";
    default: return "Excellent";
  }
}

export function normalizedSeverity(s: SymptomObservation): number {
  const severity = scaleValue(s.severity);
  return s.polarity === "positive" ? 6 - severity : severity;
}

export function symptomLoad(s: SymptomObservation, symptomMultiplier: number): number {
  const base = Math.max(0, (normalizedSeverity(s) - SYMPTOM_NEUTRAL_SEVERITY) * SYMPTOM_LOAD_PER_STEP);
  if (base === 0) return 0;
  return clamp(base * clamp(symptomMultiplier, 0, Infinity), 0, Number.MAX_VALUE);
}

export function loadContribution(c: LoadContributor): number {
  switch (c.kind) {
    case "activity": return activityLoad(c);
    case "meal": return mealLoad(c);
    case "sleep": return sleepLoad(c);
    default: {
      const unhandled: never = c;
      return unhandled;
    }
  }
}

export function recoveryModifierOf(c: LoadContributor): number | null {
  switch (c.kind) {
    case "activity":
    case "meal":
      return null;
    case "sleep":
      return sleepRecoveryModifier(c);
    default: {
      const unhandled: never = c;
      return unhandled;
    }
  }
}

export function effectiveDateOf(c: LoadContributor): Date {
  switch (c.kind) {
    case "activity":
    case "meal":
      return c.effectiveDate;
    case "sleep":
      return c.wakeTime;
    default: {
      const unhandled: never = c;
      return unhandled;
    }
  }
}
