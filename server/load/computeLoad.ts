import { dayKey, isDayKey } from "../../lib/day-key";
import { analyseContributions } from "../../lib/load-breakdown";
import { calculateLoadRange } from "../../lib/load-range";
import type { LoadBreakdown, LoadConfiguration, LoadScore } from "../../lib/load-types";
import { loadEventsForRange, type LoadEvents, type LoadEventSource } from "./loadEvents";
import type { LoadScoreCache } from "./loadScoreCache";

export interface ComputeLoadOptions {
  timeZone?: string | null;
  cache?: LoadScoreCache | null;
}

export interface DayLoadResult {
  score: LoadScore;
  breakdown: LoadBreakdown;
}

interface FoldedRange {
  scores: LoadScore[];
  events: LoadEvents;
}

// The carry starts on the first day with events, whatever window is asked for.
async function chainStart(source: LoadEventSource, from: string, timeZone?: string | null): Promise<string> {
  const earliest = await source.getEarliestEventTime();
  if (!earliest || Number.isNaN(earliest.getTime())) return from;
  const first = dayKey(earliest, timeZone);
  return first < from ? first : from;
}

async function foldRange(
  source: LoadEventSource,
  from: string,
  to: string,
  configuration: LoadConfiguration,
  options: ComputeLoadOptions,
): Promise<FoldedRange> {
  const start = await chainStart(source, from, options.timeZone);
  const events = await loadEventsForRange(source, start, to, options.timeZone);

  const rangeOptions = { reflectionsByDate: events.reflectionsByDate };
  const scores = options.cache
    ? options.cache.calculateRange(start, to, events.contributorsByDate, events.symptomsByDate, configuration, rangeOptions)
    : calculateLoadRange(start, to, events.contributorsByDate, events.symptomsByDate, configuration, rangeOptions);

  return { scores: scores.filter(s => s.date >= from), events };
}

export async function computeLoadRange(
  source: LoadEventSource,
  from: string,
  to: string,
  configuration: LoadConfiguration,
  options: ComputeLoadOptions = {},
): Promise<LoadScore[]> {
  if (!isDayKey(from) || !isDayKey(to) || from > to) return [];
  const { scores } = await foldRange(source, from, to, configuration, options);
  return scores;
}

export async function computeDayLoad(
  source: LoadEventSource,
  day: string,
  configuration: LoadConfiguration,
  options: ComputeLoadOptions = {},
): Promise<DayLoadResult | null> {
  if (!isDayKey(day)) return null;
  const { scores, events } = await foldRange(source, day, day, configuration, options);
  const score = scores[scores.length - 1];
  if (!score) return null;

  const breakdown = analyseContributions(
    events.contributorsByDate.get(day) ?? [],
    events.symptomsByDate.get(day) ?? [],
    { symptomMultiplier: configuration.symptomMultiplier },
  );
  return { score, breakdown };
}
