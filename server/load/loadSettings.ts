import type { Pool } from "pg";
import {
  buildLoadConfiguration,
  parseLoadCapacitySettings,
  type CalibrationState,
  type LoadCapacitySettings,
} from "../../lib/load-capacity";
import type { LoadConfiguration } from "../../lib/load-types";

const SETTINGS_KEY = "load_capacity";
const CALIBRATION_KEY = "load_calibration";

async function readSetting(pool: Pool, userId: string, key: string): Promise<unknown> {
  const { rows } = await pool.query<{ value: string }>(
    `SELECT value FROM app_settings WHERE key = $1 AND user_id = $2`,
    [key, userId],
  );
  if (rows.length === 0) return null;
  try {
    return JSON.parse(rows[0].value);
  } catch (err) {
    console.error(`[load] unreadable ${key} setting for ${userId}, using defaults`, err);
    return null;
  }
}

async function writeSetting(pool: Pool, userId: string, key: string, value: unknown): Promise<void> {
  await pool.query(
    `INSERT INTO app_settings (user_id, key, value, updated_at) VALUES ($1, $2, $3, NOW())
     ON CONFLICT (user_id, key) DO UPDATE SET value = EXCLUDED.value, updated_at = NOW()`,
    [userId, key, JSON.stringify(value)],
  );
}

export async function getLoadCapacitySettings(pool: Pool, userId: string): Promise<LoadCapacitySettings> {
  return parseLoadCapacitySettings(await readSetting(pool, userId, SETTINGS_KEY));
}

export async function setLoadCapacitySettings(
  pool: Pool,
  userId: string,
  settings: LoadCapacitySettings,
): Promise<void> {
  await writeSetting(pool, userId, SETTINGS_KEY, settings);
}

export async function getLoadConfiguration(pool: Pool, userId: string): Promise<LoadConfiguration> {
  return buildLoadConfiguration(await getLoadCapacitySettings(pool, userId));
}

export function parseCalibrationState(value: unknown): CalibrationState {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return { active: false, samples: [] };
  }
  const active = "active" in value && value.active === true;
  const raw = "samples" in value && Array.isArray(value.samples) ? value.samples : [];
  const samples = raw.filter((s): s is number => typeof s === "number" && Number.isFinite(s));
  return { active, samples };
}

export async function getCalibrationState(pool: Pool, userId: string): Promise<CalibrationState> {
  return parseCalibrationState(await readSetting(pool, userId, CALIBRATION_KEY));
}

export async function setCalibrationState(pool: Pool, userId: string, state: CalibrationState): Promise<void> {
  await writeSetting(pool, userId, CALIBRATION_KEY, state);
}
