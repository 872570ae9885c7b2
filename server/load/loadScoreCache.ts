import { createHash } from "node:crypto";
import { enumerateDays } from "../../lib/day-key";
import { applyFeltLoad, calculateDailyLoad, carriedLoad } from "../../lib/load-calculator";
import type { LoadRangeOptions } from "../../lib/load-range";
import type {
  ContributorsByDate,
  LoadConfiguration,
  LoadContributor,
  LoadScore,
  SymptomObservation,
  SymptomsByDate,
} from "../../lib/load-types";

export const DEFAULT_MAX_CACHE_SIZE = 500;

interface CachedEntry {
  score: LoadScore;
  fingerprint: string;
  lastAccess: number;
}

export interface CacheStatistics {
  entries: number;
  hits: number;
  misses: number;
  hitRate: number;
}

export interface DayInputs {
  contributors: readonly LoadContributor[];
  symptoms: readonly SymptomObservation[];
  previousLoad: number;
  configuration: LoadConfiguration;
  reflectionMultiplier: number | null;
}

export function fingerprintDay(inputs: DayInputs): string {
  return createHash("sha256").update(JSON.stringify(inputs)).digest("hex");
}

export class LoadScoreCache {
  private readonly entries = new Map<string, CachedEntry>();
  private tick = 0;
  private hits = 0;
  private misses = 0;

  constructor(private readonly maxSize: number = DEFAULT_MAX_CACHE_SIZE) {}

  get(day: string, inputs: DayInputs): LoadScore | null {
    const entry = this.entries.get(day);
    if (!entry || entry.fingerprint !== fingerprintDay(inputs)) {
      this.misses++;
      return null;
    }
    this.hits++;
    entry.lastAccess = ++this.tick;
    return entry.score;
  }

  set(score: LoadScore, inputs: DayInputs): void {
    this.entries.set(score.date, {
      score,
      fingerprint: fingerprintDay(inputs),
      lastAccess: ++this.tick,
    });
    this.evictIfNeeded();
  }

  calculateRange(
    from: string,
    to: string,
    contributorsByDate: ContributorsByDate,
    symptomsByDate: SymptomsByDate,
    configuration: LoadConfiguration,
    options: LoadRangeOptions = {},
  ): LoadScore[] {
    const { initialLoad = 0, reflectionsByDate } = options;
    const scores: LoadScore[] = [];
    let previousLoad = initialLoad;

    for (const day of enumerateDays(from, to)) {
      const inputs: DayInputs = {
        contributors: contributorsByDate.get(day) ?? [],
        symptoms: symptomsByDate.get(day) ?? [],
        previousLoad,
        configuration,
        reflectionMultiplier: reflectionsByDate?.get(day) ?? null,
      };

      let score = this.get(day, inputs);
      if (!score) {
        const base = calculateDailyLoad(day, inputs.contributors, inputs.symptoms, previousLoad, configuration);
        score = applyFeltLoad(base, inputs.reflectionMultiplier);
        this.set(score, inputs);
      }

      scores.push(score);
      previousLoad = carriedLoad(score);
    }

    return scores;
  }

  has(day: string): boolean {
    return this.entries.has(day);
  }

  invalidate(day: string): void {
    this.entries.delete(day);
  }

  invalidateFrom(day: string): void {
    for (const key of [...this.entries.keys()]) {
      if (key >= day) this.entries.delete(key);
    }
  }

  invalidateAll(): void {
    this.entries.clear();
  }

  pruneOlderThan(cutoffDay: string): void {
    for (const key of [...this.entries.keys()]) {
      if (key < cutoffDay) this.entries.delete(key);
    }
  }

  statistics(): CacheStatistics {
    const total = this.hits + this.misses;
    return {
      entries: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      hitRate: total > 0 ? this.hits / total : 0,
    };
  }

  resetStatistics(): void {
    this.hits = 0;
    this.misses = 0;
  }

  // Trims to 90% of capacity.
  private evictIfNeeded(): void {
    if (this.entries.size <= this.maxSize) return;
    const byAge = [...this.entries.entries()].sort((a, b) => a[1].lastAccess - b[1].lastAccess);
    const target = Math.floor(this.maxSize * 0.9);
    const excess = this.entries.size - target;
    for (let i = 0; i < excess; i++) {
      this.entries.delete(byAge[i][0]);
    }
  }
}
