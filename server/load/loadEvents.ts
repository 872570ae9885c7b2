import type { Pool } from "pg";
import { addDays } from "../../lib/day-key";
import { groupContributorsByDate, groupSymptomsByDate } from "../../lib/load-range";
import type {
  ActivityContributor,
  LoadContributor,
  MealContributor,
  SleepContributor,
  SymptomObservation,
  SymptomPolarity,
} from "../../lib/load-types";
import type { ActivityInput, MealInput, SleepInput, SymptomInput, SymptomTypeInput } from "../validation";

export const POSITIVE_WELLBEING_CATEGORY = "Positive wellbeing";

export type ActivityEventRow = {
  id: number;
  name: string | null;
  occurred_at: Date;
  physical_exertion: number;
  cognitive_exertion: number;
  emotional_load: number;
  duration_minutes: number | null;
};

export type MealEventRow = {
  id: number;
  meal_type: string | null;
  occurred_at: Date;
  physical_exertion: number | null;
  cognitive_exertion: number | null;
  emotional_load: number | null;
};

export type SleepEventRow = {
  id: number;
  bed_time: Date;
  wake_time: Date;
  quality: number;
};

export type SymptomEntryRow = {
  id: number;
  name: string;
  category: string;
  severity: number;
  occurred_at: Date;
};

export type SymptomTypeRow = {
  id: number;
  name: string;
  category: string;
};

export type DayReflectionRow = {
  day: string;
  load_multiplier: number | null;
};

export interface LoadEvents {
  contributorsByDate: Map<string, LoadContributor[]>;
  symptomsByDate: Map<string, SymptomObservation[]>;
  reflectionsByDate: Map<string, number>;
}

export interface LoadEventSource {
  getContributors(startDay: string, endDay: string): Promise<LoadContributor[]>;
  getSymptoms(startDay: string, endDay: string): Promise<SymptomObservation[]>;
  getReflections(startDay: string, endDay: string): Promise<Map<string, number>>;
  getEarliestEventTime(): Promise<Date | null>;
}

export function polarityForCategory(category: string | null | undefined): SymptomPolarity {
  return category === POSITIVE_WELLBEING_CATEGORY ? "positive" : "negative";
}

export function activityRowToContributor(row: ActivityEventRow): ActivityContributor {
  return {
    kind: "activity",
    id: String(row.id),
    name: row.name,
    effectiveDate: row.occurred_at,
    exertion: {
      physical: Number(row.physical_exertion),
      cognitive: Number(row.cognitive_exertion),
      emotional: Number(row.emotional_load),
    },
    durationMinutes: row.duration_minutes != null ? Number(row.duration_minutes) : null,
  };
}

function nullableNumber(v: number | null): number | null {
  return v != null ? Number(v) : null;
}

export function mealRowToContributor(row: MealEventRow): MealContributor {
  return {
    kind: "meal",
    id: String(row.id),
    mealType: row.meal_type,
    effectiveDate: row.occurred_at,
    exertion: {
      physical: nullableNumber(row.physical_exertion),
      cognitive: nullableNumber(row.cognitive_exertion),
      emotional: nullableNumber(row.emotional_load),
    },
  };
}

export function sleepRowToContributor(row: SleepEventRow): SleepContributor {
  return {
    kind: "sleep",
    id: String(row.id),
    bedTime: row.bed_time,
    wakeTime: row.wake_time,
    quality: Number(row.quality),
  };
}

export function symptomRowToObservation(row: SymptomEntryRow): SymptomObservation {
  return {
    id: String(row.id),
    name: row.name,
    severity: Number(row.severity),
    polarity: polarityForCategory(row.category),
    occurredAt: row.occurred_at,
  };
}

export function reflectionRowsToMap(rows: DayReflectionRow[]): Map<string, number> {
  const map = new Map<string, number>();
  for (const r of rows) {
    if (r.load_multiplier != null) map.set(r.day, Number(r.load_multiplier));
  }
  return map;
}

export async function loadEventsForRange(
  source: LoadEventSource,
  startDay: string,
  endDay: string,
  timeZone?: string | null,
): Promise<LoadEvents> {
  const [contributors, symptoms, reflectionsByDate] = await Promise.all([
    source.getContributors(startDay, endDay),
    source.getSymptoms(startDay, endDay),
    source.getReflections(startDay, endDay),
  ]);
  return {
    contributorsByDate: groupContributorsByDate(contributors, timeZone),
    symptomsByDate: groupSymptomsByDate(symptoms, timeZone),
    reflectionsByDate,
  };
}

// Rows are pulled with a day of padding on both sides; callers bucket by local day.
function paddedWindow(startDay: string, endDay: string): [string, string] {
  return [addDays(startDay, -1) + "T00:00:00Z", addDays(endDay, 2) + "T00:00:00Z"];
}

export function createPgLoadEventSource(pool: Pool, userId: string): LoadEventSource {
  return {
    async getContributors(startDay, endDay) {
      const [from, to] = paddedWindow(startDay, endDay);
      const [activities, meals, sleep] = await Promise.all([
        pool.query<ActivityEventRow>(
          `SELECT id, name, occurred_at, physical_exertion, cognitive_exertion, emotional_load, duration_minutes
           FROM activity_events
           WHERE user_id = $1 AND occurred_at >= $2 AND occurred_at < $3
           ORDER BY occurred_at ASC`,
          [userId, from, to],
        ),
        pool.query<MealEventRow>(
          `SELECT id, meal_type, occurred_at, physical_exertion, cognitive_exertion, emotional_load
           FROM meal_events
           WHERE user_id = $1 AND occurred_at >= $2 AND occurred_at < $3
           ORDER BY occurred_at ASC`,
          [userId, from, to],
        ),
        pool.query<SleepEventRow>(
          `SELECT id, bed_time, wake_time, quality
           FROM sleep_events
           WHERE user_id = $1 AND wake_time >= $2 AND wake_time < $3
           ORDER BY wake_time ASC`,
          [userId, from, to],
        ),
      ]);
      return [
        ...activities.rows.map(activityRowToContributor),
        ...meals.rows.map(mealRowToContributor),
        ...sleep.rows.map(sleepRowToContributor),
      ];
    },

    async getSymptoms(startDay, endDay) {
      const [from, to] = paddedWindow(startDay, endDay);
      const { rows } = await pool.query<SymptomEntryRow>(
        `SELECT se.id, st.name, st.category, se.severity, se.occurred_at
         FROM symptom_entries se
         JOIN symptom_types st ON st.id = se.symptom_type_id
         WHERE se.user_id = $1 AND se.occurred_at >= $2 AND se.occurred_at < $3
         ORDER BY se.occurred_at ASC`,
        [userId, from, to],
      );
      return rows.map(symptomRowToObservation);
    },

    async getReflections(startDay, endDay) {
      const { rows } = await pool.query<DayReflectionRow>(
        `SELECT day, load_multiplier FROM day_reflections
         WHERE user_id = $1 AND day >= $2 AND day <= $3`,
        [userId, startDay, endDay],
      );
      return reflectionRowsToMap(rows);
    },

    async getEarliestEventTime() {
      const { rows } = await pool.query<{ earliest: Date | null }>(
        `SELECT MIN(t) AS earliest FROM (
           SELECT MIN(occurred_at) AS t FROM activity_events WHERE user_id = $1
           UNION ALL SELECT MIN(occurred_at) FROM meal_events WHERE user_id = $1
           UNION ALL SELECT MIN(wake_time) FROM sleep_events WHERE user_id = $1
           UNION ALL SELECT MIN(occurred_at) FROM symptom_entries WHERE user_id = $1
         ) firsts`,
        [userId],
      );
      return rows[0]?.earliest ?? null;
    },
  };
}

export async function insertActivityEvent(pool: Pool, userId: string, input: ActivityInput): Promise<number> {
  const { rows } = await pool.query<{ id: number }>(
    `INSERT INTO activity_events (user_id, name, occurred_at, physical_exertion, cognitive_exertion, emotional_load, duration_minutes)
     VALUES ($1, $2, $3, $4, $5, $6, $7) RETURNING id`,
    [
      userId,
      input.name,
      input.occurredAt.toISOString(),
      input.physicalExertion,
      input.cognitiveExertion,
      input.emotionalLoad,
      input.durationMinutes,
    ],
  );
  return rows[0].id;
}

export async function insertMealEvent(pool: Pool, userId: string, input: MealInput): Promise<number> {
  const { rows } = await pool.query<{ id: number }>(
    `INSERT INTO meal_events (user_id, meal_type, occurred_at, physical_exertion, cognitive_exertion, emotional_load)
     VALUES ($1, $2, $3, $4, $5, $6) RETURNING id`,
    [
      userId,
      input.mealType,
      input.occurredAt.toISOString(),
      input.physicalExertion,
      input.cognitiveExertion,
      input.emotionalLoad,
    ],
  );
  return rows[0].id;
}

export async function insertSleepEvent(pool: Pool, userId: string, input: SleepInput): Promise<number> {
  const { rows } = await pool.query<{ id: number }>(
    `INSERT INTO sleep_events (user_id, bed_time, wake_time, quality)
     VALUES ($1, $2, $3, $4) RETURNING id`,
    [userId, input.bedTime.toISOString(), input.wakeTime.toISOString(), input.quality],
  );
  return rows[0].id;
}

export async function listSymptomTypes(pool: Pool, userId: string): Promise<SymptomTypeRow[]> {
  const { rows } = await pool.query<SymptomTypeRow>(
    `SELECT id, name, category FROM symptom_types WHERE user_id = $1 ORDER BY name ASC`,
    [userId],
  );
  return rows;
}

export async function upsertSymptomType(pool: Pool, userId: string, input: SymptomTypeInput): Promise<SymptomTypeRow> {
  const { rows } = await pool.query<SymptomTypeRow>(
    `INSERT INTO symptom_types (user_id, name, category) VALUES ($1, $2, $3)
     ON CONFLICT (user_id, name) DO UPDATE SET category = EXCLUDED.category
     RETURNING id, name, category`,
    [userId, input.name, input.category],
  );
  return rows[0];
}

export async function insertSymptomEntry(pool: Pool, userId: string, input: SymptomInput): Promise<number> {
  const { rows } = await pool.query<{ id: number }>(
    `INSERT INTO symptom_entries (user_id, symptom_type_id, severity, occurred_at)
     VALUES ($1, $2, $3, $4) RETURNING id`,
    [userId, input.symptomTypeId, input.severity, input.occurredAt.toISOString()],
  );
  return rows[0].id;
}

export async function upsertDayReflection(
  pool: Pool,
  userId: string,
  day: string,
  multiplier: number | null,
): Promise<void> {
  await pool.query(
    `INSERT INTO day_reflections (user_id, day, load_multiplier, updated_at) VALUES ($1, $2, $3, NOW())
     ON CONFLICT (user_id, day) DO UPDATE SET load_multiplier = EXCLUDED.load_multiplier, updated_at = NOW()`,
    [userId, day, multiplier],
  );
}
