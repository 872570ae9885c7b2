import {
  CAPACITY_LEVELS,
  CONDITION_PRESETS,
  RECOVERY_WINDOWS,
  SENSITIVITY_PROFILES,
  type CapacityLevel,
  type ConditionPreset,
  type RecoveryWindow,
  type SensitivityProfile,
} from "../lib/load-capacity";
import { FELT_MULTIPLIER_MAX, FELT_MULTIPLIER_MIN } from "../lib/load-calculator";

const ISO_REGEX = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d{1,6})?(?:Z|[+-]\d{2}:?\d{2})$/;
const DATE_REGEX = /^\d{4}-\d{2}-\d{2}$/;

export interface ValidationResult {
  ok: boolean;
  errors: string[];
}

export type Validated<T> =
  | { ok: true; value: T; errors: [] }
  | { ok: false; errors: string[] };

export interface ActivityInput {
  name: string | null;
  occurredAt: Date;
  physicalExertion: number;
  cognitiveExertion: number;
  emotionalLoad: number;
  durationMinutes: number | null;
}

export interface MealInput {
  mealType: string | null;
  occurredAt: Date;
  physicalExertion: number | null;
  cognitiveExertion: number | null;
  emotionalLoad: number | null;
}

export interface SleepInput {
  bedTime: Date;
  wakeTime: Date;
  quality: number;
}

export interface SymptomInput {
  symptomTypeId: number;
  severity: number;
  occurredAt: Date;
}

export interface SymptomTypeInput {
  name: string;
  category: string;
}

export interface SettingsInput {
  preset?: ConditionPreset;
  capacity?: CapacityLevel;
  sensitivity?: SensitivityProfile;
  recoveryWindow?: RecoveryWindow;
}

export function parseStrictISO(ts: unknown): Date | null {
  if (typeof ts !== 'string') return null;
  if (!ISO_REGEX.test(ts)) return null;
  const d = new Date(ts);
  if (isNaN(d.getTime())) return null;
  return d;
}

export function isValidDateString(date: unknown): date is string {
  if (typeof date !== 'string') return false;
  if (!DATE_REGEX.test(date)) return false;
  const d = new Date(date + 'T00:00:00Z');
  return !isNaN(d.getTime()) && d.toISOString().slice(0, 10) === date;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function validateScale(val: unknown): val is number {
  return typeof val === 'number' && Number.isInteger(val) && val >= 1 && val <= 5;
}

export function validateDurationMinutes(val: unknown): val is number {
  return typeof val === 'number' && Number.isFinite(val) && val >= 0 && val <= 1440;
}

function optionalText(val: unknown): string | null {
  return typeof val === 'string' && val.trim().length > 0 ? val.trim() : null;
}

function checkScale(errors: string[], field: string, val: unknown): void {
  if (!validateScale(val)) {
    errors.push(`${field}: must be an integer in [1-5], got ${JSON.stringify(val)}`);
  }
}

function checkOptionalScale(errors: string[], field: string, val: unknown): void {
  if (val != null) checkScale(errors, field, val);
}

function checkTimestamp(errors: string[], field: string, val: unknown): Date | null {
  const d = parseStrictISO(val);
  if (!d) errors.push(`${field}: invalid ISO timestamp ${JSON.stringify(val)}`);
  return d;
}

function fail(errors: string[]): { ok: false; errors: string[] } {
  return { ok: false, errors };
}

export function validateActivityInput(body: unknown): Validated<ActivityInput> {
  if (!isRecord(body)) return fail(['body: expected an object']);
  const errors: string[] = [];
  const occurredAt = checkTimestamp(errors, 'occurred_at', body.occurred_at);
  checkScale(errors, 'physical_exertion', body.physical_exertion);
  checkScale(errors, 'cognitive_exertion', body.cognitive_exertion);
  checkScale(errors, 'emotional_load', body.emotional_load);
  if (body.duration_minutes != null && !validateDurationMinutes(body.duration_minutes)) {
    errors.push(`duration_minutes: out of range [0-1440], got ${JSON.stringify(body.duration_minutes)}`);
  }
  const { physical_exertion, cognitive_exertion, emotional_load, duration_minutes } = body;
  if (
    errors.length > 0 ||
    !occurredAt ||
    !validateScale(physical_exertion) ||
    !validateScale(cognitive_exertion) ||
    !validateScale(emotional_load)
  ) {
    return fail(errors);
  }
  return {
    ok: true,
    errors: [],
    value: {
      name: optionalText(body.name),
      occurredAt,
      physicalExertion: physical_exertion,
      cognitiveExertion: cognitive_exertion,
      emotionalLoad: emotional_load,
      durationMinutes: validateDurationMinutes(duration_minutes) ? duration_minutes : null,
    },
  };
}

export function validateMealInput(body: unknown): Validated<MealInput> {
  if (!isRecord(body)) return fail(['body: expected an object']);
  const errors: string[] = [];
  const occurredAt = checkTimestamp(errors, 'occurred_at', body.occurred_at);
  checkOptionalScale(errors, 'physical_exertion', body.physical_exertion);
  checkOptionalScale(errors, 'cognitive_exertion', body.cognitive_exertion);
  checkOptionalScale(errors, 'emotional_load', body.emotional_load);
  if (errors.length > 0 || !occurredAt) return fail(errors);
  const { physical_exertion, cognitive_exertion, emotional_load } = body;
  return {
    ok: true,
    errors: [],
    value: {
      mealType: optionalText(body.meal_type),
      occurredAt,
      physicalExertion: validateScale(physical_exertion) ? physical_exertion : null,
      cognitiveExertion: validateScale(cognitive_exertion) ? cognitive_exertion : null,
      emotionalLoad: validateScale(emotional_load) ? emotional_load : null,
    },
  };
}

export function validateSleepInput(body: unknown): Validated<SleepInput> {
  if (!isRecord(body)) return fail(['body: expected an object']);
  const errors: string[] = [];
  const bedTime = checkTimestamp(errors, 'bed_time', body.bed_time);
  const wakeTime = checkTimestamp(errors, 'wake_time', body.wake_time);
  checkScale(errors, 'quality', body.quality);
  if (bedTime && wakeTime && wakeTime.getTime() < bedTime.getTime()) {
    errors.push('wake_time: must not precede bed_time');
  }
  const { quality } = body;
  if (errors.length > 0 || !bedTime || !wakeTime || !validateScale(quality)) return fail(errors);
  return { ok: true, errors: [], value: { bedTime, wakeTime, quality } };
}

export function validateSymptomInput(body: unknown): Validated<SymptomInput> {
  if (!isRecord(body)) return fail(['body: expected an object']);
  const errors: string[] = [];
  const occurredAt = checkTimestamp(errors, 'occurred_at', body.occurred_at);
  const { symptom_type_id, severity } = body;
  if (typeof symptom_type_id !== 'number' || !Number.isInteger(symptom_type_id) || symptom_type_id <= 0) {
    errors.push(`symptom_type_id: must be a positive integer, got ${JSON.stringify(symptom_type_id)}`);
  }
  checkScale(errors, 'severity', severity);
  if (
    errors.length > 0 ||
    !occurredAt ||
    typeof symptom_type_id !== 'number' ||
    !validateScale(severity)
  ) {
    return fail(errors);
  }
  return { ok: true, errors: [], value: { symptomTypeId: symptom_type_id, severity, occurredAt } };
}

export function validateSymptomTypeInput(body: unknown): Validated<SymptomTypeInput> {
  if (!isRecord(body)) return fail(['body: expected an object']);
  const errors: string[] = [];
  const name = optionalText(body.name);
  const category = optionalText(body.category);
  if (!name) errors.push(`name: required, got ${JSON.stringify(body.name)}`);
  if (!category) errors.push(`category: required, got ${JSON.stringify(body.category)}`);
  if (errors.length > 0 || !name || !category) return fail(errors);
  return { ok: true, errors: [], value: { name, category } };
}

export function validateReflectionInput(body: unknown): Validated<{ multiplier: number | null }> {
  if (!isRecord(body)) return fail(['body: expected an object']);
  const { multiplier } = body;
  if (multiplier === null) return { ok: true, errors: [], value: { multiplier: null } };
  if (
    typeof multiplier !== 'number' ||
    !Number.isFinite(multiplier) ||
    multiplier < FELT_MULTIPLIER_MIN ||
    multiplier > FELT_MULTIPLIER_MAX
  ) {
    return fail([
      `multiplier: out of range [${FELT_MULTIPLIER_MIN}-${FELT_MULTIPLIER_MAX}], got ${JSON.stringify(multiplier)}`,
    ]);
  }
  return { ok: true, errors: [], value: { multiplier } };
}

function checkEnum<T extends string>(
  errors: string[],
  field: string,
  val: unknown,
  allowed: readonly T[],
): T | undefined {
  if (val == null) return undefined;
  const match = allowed.find(a => a === val);
  if (!match) errors.push(`${field}: must be one of ${allowed.join(', ')}, got ${JSON.stringify(val)}`);
  return match;
}

export function validateSettingsInput(body: unknown): Validated<SettingsInput> {
  if (!isRecord(body)) return fail(['body: expected an object']);
  const errors: string[] = [];
  const value: SettingsInput = {
    preset: checkEnum(errors, 'preset', body.preset, CONDITION_PRESETS),
    capacity: checkEnum(errors, 'capacity', body.capacity, CAPACITY_LEVELS),
    sensitivity: checkEnum(errors, 'sensitivity', body.sensitivity, SENSITIVITY_PROFILES),
    recoveryWindow: checkEnum(errors, 'recoveryWindow', body.recoveryWindow, RECOVERY_WINDOWS),
  };
  if (errors.length > 0) return fail(errors);
  return { ok: true, errors: [], value };
}

export function validateDayRange(start: unknown, end: unknown, maxDays: number): ValidationResult {
  const errors: string[] = [];
  if (!isValidDateString(start)) errors.push(`start: invalid date string ${JSON.stringify(start)}`);
  if (!isValidDateString(end)) errors.push(`end: invalid date string ${JSON.stringify(end)}`);
  if (isValidDateString(start) && isValidDateString(end)) {
    const span = Math.round(
      (new Date(end + 'T00:00:00Z').getTime() - new Date(start + 'T00:00:00Z').getTime()) / 86400000,
    );
    if (span < 0) errors.push('end: must not precede start');
    else if (span + 1 > maxDays) errors.push(`range: at most ${maxDays} days, got ${span + 1}`);
  }
  return { ok: errors.length === 0, errors };
}
