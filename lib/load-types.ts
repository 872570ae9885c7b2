export type RiskLevel = "safe" | "caution" | "high" | "critical";

export const RISK_LEVELS: readonly RiskLevel[] = ["safe", "caution", "high", "critical"];

export interface ExertionLevels {
  physical: number;
  cognitive: number;
  emotional: number;
}

export interface OptionalExertionLevels {
  physical: number | null;
  cognitive: number | null;
  emotional: number | null;
}

export interface ActivityContributor {
  kind: "activity";
  id?: string;
  name?: string | null;
  effectiveDate: Date;
  exertion: ExertionLevels;
  durationMinutes: number | null;
}

export interface MealContributor {
  kind: "meal";
  id?: string;
  mealType?: string | null;
  effectiveDate: Date;
  exertion: OptionalExertionLevels;
}

export interface SleepContributor {
  kind: "sleep";
  id?: string;
  bedTime: Date;
  wakeTime: Date;
  quality: number;
}

export type LoadContributor = ActivityContributor | MealContributor | SleepContributor;

export type SymptomPolarity = "positive" | "negative";

export interface SymptomObservation {
  id?: string;
  name?: string | null;
  severity: number;
  polarity: SymptomPolarity;
  occurredAt: Date;
}

export interface LoadThresholds {
  safe: number;
  caution: number;
  high: number;
  critical: number;
}

export interface LoadConfiguration {
  thresholds: LoadThresholds;
  symptomMultiplier: number;
  decayRate: number;
}

export const DEFAULT_LOAD_THRESHOLDS: LoadThresholds = {
  safe: 25,
  caution: 50,
  high: 75,
  critical: 100,
};

export interface LoadScore {
  date: string;
  rawLoad: number;
  decayedLoad: number;
  riskLevel: RiskLevel;
  feltLoad?: number;
}

export type LoadCategory = "activity" | "meal" | "sleep" | "symptom";

export interface LoadBreakdown {
  activityLoad: number;
  mealLoad: number;
  sleepLoad: number;
  symptomLoad: number;
  totalLoad: number;
  activityPercentage: number;
  mealPercentage: number;
  sleepPercentage: number;
  symptomPercentage: number;
  dominantCategory: LoadCategory | null;
}

export type ContributorsByDate = ReadonlyMap<string, readonly LoadContributor[]>;
export type SymptomsByDate = ReadonlyMap<string, readonly SymptomObservation[]>;
