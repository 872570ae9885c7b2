import { loadContribution, symptomLoad } from "./load-contributors";
import type {
  LoadBreakdown,
  LoadCategory,
  LoadContributor,
  SymptomObservation,
} from "./load-types";

export interface BreakdownOptions {
  symptomMultiplier?: number;
}

function percentage(part: number, total: number): number {
  return total > 0 ? (part / total) * 100 : 0;
}

export function analyseContributions(
  contributors: readonly LoadContributor[],
  symptoms: readonly SymptomObservation[],
  options: BreakdownOptions = {},
): LoadBreakdown {
  const { symptomMultiplier = 1 } = options;

  const sums: Record<LoadCategory, number> = { activity: 0, meal: 0, sleep: 0, symptom: 0 };
  for (const c of contributors) sums[c.kind] += loadContribution(c);
  for (const s of symptoms) sums.symptom += symptomLoad(s, symptomMultiplier);

  const totalLoad = sums.activity + sums.meal + sums.sleep + sums.symptom;

  let dominantCategory: LoadCategory | null = null;
  if (totalLoad > 0) {
    const categories: LoadCategory[] = ["activity", "meal", "sleep", "symptom"];
    dominantCategory = categories.reduce((best, c) => (sums[c] > sums[best] ? c : best));
  }

  return {
    activityLoad: sums.activity,
    mealLoad: sums.meal,
    sleepLoad: sums.sleep,
    symptomLoad: sums.symptom,
    totalLoad,
    activityPercentage: percentage(sums.activity, totalLoad),
    mealPercentage: percentage(sums.meal, totalLoad),
    sleepPercentage: percentage(sums.sleep, totalLoad),
    symptomPercentage: percentage(sums.symptom, totalLoad),
    dominantCategory,
  };
}
