import { dayKey, enumerateDays } from "./day-key";
import { applyFeltLoad, calculateDailyLoad, carriedLoad } from "./load-calculator";
import { effectiveDateOf } from "./load-contributors";
import type {
  ContributorsByDate,
  LoadConfiguration,
  LoadContributor,
  LoadScore,
  SymptomObservation,
  SymptomsByDate,
} from "./load-types";

export interface LoadRangeOptions {
  initialLoad?: number;
  reflectionsByDate?: ReadonlyMap<string, number>;
}

export function groupContributorsByDate(
  contributors: readonly LoadContributor[],
  timeZone?: string | null,
): Map<string, LoadContributor[]> {
  const byDate = new Map<string, LoadContributor[]>();
  for (const c of contributors) {
    const key = dayKey(effectiveDateOf(c), timeZone);
    const bucket = byDate.get(key);
    if (bucket) bucket.push(c);
    else byDate.set(key, [c]);
  }
  return byDate;
}

export function groupSymptomsByDate(
  symptoms: readonly SymptomObservation[],
  timeZone?: string | null,
): Map<string, SymptomObservation[]> {
  const byDate = new Map<string, SymptomObservation[]>();
  for (const s of symptoms) {
    const key = dayKey(s.occurredAt, timeZone);
    const bucket = byDate.get(key);
    if (bucket) bucket.push(s);
    else byDate.set(key, [s]);
  }
  return byDate;
}

interface FoldState {
  scores: LoadScore[];
  previousLoad: number;
}

export function calculateLoadRange(
  from: string,
  to: string,
  contributorsByDate: ContributorsByDate,
  symptomsByDate: SymptomsByDate,
  configuration: LoadConfiguration,
  options: LoadRangeOptions = {},
): LoadScore[] {
  const { initialLoad = 0, reflectionsByDate } = options;

  const folded = enumerateDays(from, to).reduce<FoldState>(
    (state, day) => {
      const base = calculateDailyLoad(
        day,
        contributorsByDate.get(day) ?? [],
        symptomsByDate.get(day) ?? [],
        state.previousLoad,
        configuration,
      );
      const score = applyFeltLoad(base, reflectionsByDate?.get(day));
      state.scores.push(score);
      return { scores: state.scores, previousLoad: carriedLoad(score) };
    },
    { scores: [], previousLoad: initialLoad },
  );

  return folded.scores;
}
