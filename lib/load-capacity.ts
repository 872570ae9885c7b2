import { clamp, mean } from "./load-math";
import type { LoadConfiguration, LoadThresholds } from "./load-types";

export type CapacityLevel = "low" | "medium" | "high";
export type SensitivityProfile = "sensitive" | "standard" | "resilient";
export type RecoveryWindow = "12h" | "24h" | "48h" | "72h";
export type ConditionPreset =
  | "standard"
  | "mecfs"
  | "fibromyalgia"
  | "pcos"
  | "ptsd"
  | "longcovid"
  | "autoimmune"
  | "custom";

export const CAPACITY_LEVELS: readonly CapacityLevel[] = ["low", "medium", "high"];
export const SENSITIVITY_PROFILES: readonly SensitivityProfile[] = ["sensitive", "standard", "resilient"];
export const RECOVERY_WINDOWS: readonly RecoveryWindow[] = ["12h", "24h", "48h", "72h"];
export const CONDITION_PRESETS: readonly ConditionPreset[] = [
  "standard",
  "mecfs",
  "fibromyalgia",
  "pcos",
  "ptsd",
  "longcovid",
  "autoimmune",
  "custom",
];

export const CAPACITY_THRESHOLDS: Record<CapacityLevel, LoadThresholds> = {
  low: { safe: 20, caution: 40, high: 60, critical: 80 },
  medium: { safe: 25, caution: 50, high: 75, critical: 100 },
  high: { safe: 30, caution: 60, high: 80, critical: 100 },
};

export const SYMPTOM_MULTIPLIERS: Record<SensitivityProfile, number> = {
  sensitive: 1.5,
  standard: 1.0,
  resilient: 0.7,
};

export const DECAY_RATES: Record<RecoveryWindow, number> = {
  "12h": 0.85,
  "24h": 0.7,
  "48h": 0.55,
  "72h": 0.4,
};

export interface PresetDefinition {
  displayName: string;
  description: string;
  capacity: CapacityLevel;
  sensitivity: SensitivityProfile;
  recoveryWindow: RecoveryWindow;
}

export const PRESET_DEFINITIONS: Record<ConditionPreset, PresetDefinition> = {
  standard: {
    displayName: "Standard",
    description: "Default settings for general symptom tracking",
    capacity: "medium",
    sensitivity: "standard",
    recoveryWindow: "24h",
  },
  mecfs: {
    displayName: "ME/CFS",
    description: "Post-exertional malaise aware, extended recovery",
    capacity: "low",
    sensitivity: "sensitive",
    recoveryWindow: "72h",
  },
  fibromyalgia: {
    displayName: "Fibromyalgia",
    description: "Pain sensitivity focus, moderate recovery",
    capacity: "low",
    sensitivity: "sensitive",
    recoveryWindow: "48h",
  },
  pcos: {
    displayName: "PCOS",
    description: "Hormone cycle aware, standard recovery",
    capacity: "medium",
    sensitivity: "standard",
    recoveryWindow: "24h",
  },
  ptsd: {
    displayName: "PTSD",
    description: "Stress-sensitive, quick-moderate recovery",
    capacity: "medium",
    sensitivity: "sensitive",
    recoveryWindow: "48h",
  },
  longcovid: {
    displayName: "Long COVID",
    description: "Fatigue focus, extended recovery periods",
    capacity: "low",
    sensitivity: "sensitive",
    recoveryWindow: "72h",
  },
  autoimmune: {
    displayName: "Autoimmune conditions",
    description: "Flare-aware, variable recovery",
    capacity: "low",
    sensitivity: "standard",
    recoveryWindow: "48h",
  },
  custom: {
    displayName: "Custom settings",
    description: "Manually configure all settings",
    capacity: "medium",
    sensitivity: "standard",
    recoveryWindow: "24h",
  },
};

export interface PersonalBaseline {
  establishedDate: string;
  averageGoodDayLoad: number;
  sampleCount: number;
}

export interface LoadCapacitySettings {
  preset: ConditionPreset;
  capacity: CapacityLevel;
  sensitivity: SensitivityProfile;
  recoveryWindow: RecoveryWindow;
  baseline: PersonalBaseline | null;
}

export type LoadSettingsPatch = Partial<Pick<LoadCapacitySettings, "capacity" | "sensitivity" | "recoveryWindow">>;

export const CALIBRATION_SAMPLE_COUNT = 3;
export const STANDARD_GOOD_DAY_LOAD = 30;

export const DEFAULT_LOAD_CAPACITY_SETTINGS: LoadCapacitySettings = {
  preset: "standard",
  capacity: "medium",
  sensitivity: "standard",
  recoveryWindow: "24h",
  baseline: null,
};

export function applyPreset(settings: LoadCapacitySettings, preset: ConditionPreset): LoadCapacitySettings {
  if (preset === "custom") return { ...settings, preset };
  const def = PRESET_DEFINITIONS[preset];
  return {
    ...settings,
    preset,
    capacity: def.capacity,
    sensitivity: def.sensitivity,
    recoveryWindow: def.recoveryWindow,
  };
}

export function matchesPreset(settings: LoadCapacitySettings, preset: ConditionPreset): boolean {
  const def = PRESET_DEFINITIONS[preset];
  return (
    settings.capacity === def.capacity &&
    settings.sensitivity === def.sensitivity &&
    settings.recoveryWindow === def.recoveryWindow
  );
}

export function updateLoadSettings(settings: LoadCapacitySettings, patch: LoadSettingsPatch): LoadCapacitySettings {
  const next: LoadCapacitySettings = {
    ...settings,
    capacity: patch.capacity ?? settings.capacity,
    sensitivity: patch.sensitivity ?? settings.sensitivity,
    recoveryWindow: patch.recoveryWindow ?? settings.recoveryWindow,
  };
  if (next.preset !== "custom" && !matchesPreset(next, next.preset)) {
    return { ...next, preset: "custom" };
  }
  return next;
}

export function isCalibrated(baseline: PersonalBaseline | null): baseline is PersonalBaseline {
  return baseline != null && baseline.sampleCount >= CALIBRATION_SAMPLE_COUNT;
}

export function baselineAdjustment(baseline: PersonalBaseline | null): number {
  if (!isCalibrated(baseline)) return 1.0;
  return clamp(baseline.averageGoodDayLoad / STANDARD_GOOD_DAY_LOAD, 0.8, 1.2);
}

export function currentThresholds(settings: LoadCapacitySettings): LoadThresholds {
  const base = CAPACITY_THRESHOLDS[settings.capacity];
  const adjustment = baselineAdjustment(settings.baseline);
  return {
    safe: base.safe * adjustment,
    caution: base.caution * adjustment,
    high: base.high * adjustment,
    critical: base.critical * adjustment,
  };
}

export function buildLoadConfiguration(settings: LoadCapacitySettings): LoadConfiguration {
  return {
    thresholds: currentThresholds(settings),
    symptomMultiplier: SYMPTOM_MULTIPLIERS[settings.sensitivity],
    decayRate: DECAY_RATES[settings.recoveryWindow],
  };
}

export const STANDARD_LOAD_CONFIGURATION: LoadConfiguration = buildLoadConfiguration(DEFAULT_LOAD_CAPACITY_SETTINGS);

export interface CalibrationState {
  active: boolean;
  samples: number[];
}

export interface CalibrationStep {
  state: CalibrationState;
  baseline: PersonalBaseline | null;
}

export function startCalibration(): CalibrationState {
  return { active: true, samples: [] };
}

export function cancelCalibration(): CalibrationState {
  return { active: false, samples: [] };
}

export function recordGoodDay(state: CalibrationState, load: number, day: string): CalibrationStep {
  if (!state.active) return { state, baseline: null };
  const samples = [...state.samples, clamp(load, 0, 100)];
  if (samples.length < CALIBRATION_SAMPLE_COUNT) {
    return { state: { active: true, samples }, baseline: null };
  }
  return {
    state: cancelCalibration(),
    baseline: {
      establishedDate: day,
      averageGoodDayLoad: mean(samples),
      sampleCount: samples.length,
    },
  };
}

function pick<T extends string>(value: unknown, allowed: readonly T[], fallback: T): T {
  const match = allowed.find(a => a === value);
  return match ?? fallback;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseBaseline(value: unknown): PersonalBaseline | null {
  if (!isRecord(value)) return null;
  const { establishedDate, averageGoodDayLoad, sampleCount } = value;
  if (typeof establishedDate !== "string") return null;
  if (typeof averageGoodDayLoad !== "number" || !Number.isFinite(averageGoodDayLoad)) return null;
  if (typeof sampleCount !== "number" || !Number.isInteger(sampleCount) || sampleCount < 0) return null;
  return { establishedDate, averageGoodDayLoad, sampleCount };
}

export function parseLoadCapacitySettings(value: unknown): LoadCapacitySettings {
  const d = DEFAULT_LOAD_CAPACITY_SETTINGS;
  if (!isRecord(value)) return { ...d };
  return {
    preset: pick(value.preset, CONDITION_PRESETS, d.preset),
    capacity: pick(value.capacity, CAPACITY_LEVELS, d.capacity),
    sensitivity: pick(value.sensitivity, SENSITIVITY_PROFILES, d.sensitivity),
    recoveryWindow: pick(value.recoveryWindow, RECOVERY_WINDOWS, d.recoveryWindow),
    baseline: parseBaseline(value.baseline),
  };
}
