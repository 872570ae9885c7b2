import type { Express, NextFunction, Request, Response } from "express";
import { createServer, type Server } from "node:http";
import { initDb, pool } from "./db";
import {
  validateActivityInput,
  validateDayRange,
  validateMealInput,
  validateReflectionInput,
  validateSettingsInput,
  validateSleepInput,
  validateSymptomInput,
  validateSymptomTypeInput,
  isValidDateString,
  type Validated,
} from "./validation";
import {
  createPgLoadEventSource,
  insertActivityEvent,
  insertMealEvent,
  insertSleepEvent,
  insertSymptomEntry,
  listSymptomTypes,
  upsertDayReflection,
  upsertSymptomType,
} from "./load/loadEvents";
import {
  getCalibrationState,
  getLoadCapacitySettings,
  getLoadConfiguration,
  setCalibrationState,
  setLoadCapacitySettings,
} from "./load/loadSettings";
import { computeDayLoad, computeLoadRange } from "./load/computeLoad";
import { LoadScoreCache } from "./load/loadScoreCache";
import { RateLimiter, rateLimit } from "./rateLimit";
import {
  applyPreset,
  buildLoadConfiguration,
  cancelCalibration,
  recordGoodDay,
  startCalibration,
  updateLoadSettings,
} from "../lib/load-capacity";
import { dayKey } from "../lib/day-key";
import { riskLevelLabel } from "../lib/risk-classifier";

const DEFAULT_USER_ID = 'local_default';
const MAX_RANGE_DAYS = 366;
const TIMEZONE = process.env.LOAD_TIMEZONE || null;

const caches = new Map<string, LoadScoreCache>();

function cacheFor(userId: string): LoadScoreCache {
  let cache = caches.get(userId);
  if (!cache) {
    cache = new LoadScoreCache();
    caches.set(userId, cache);
  }
  return cache;
}

function requireAuth(req: Request, res: Response, next: NextFunction) {
  const API_KEY = process.env.API_KEY;
  if (!API_KEY) {
    return res.status(500).json({ error: "Server missing API_KEY" });
  }
  const authHeader = req.headers.authorization || "";
  const token = authHeader.startsWith("Bearer ") ? authHeader.slice(7) : "";
  if (token !== API_KEY) {
    return res.status(401).json({ error: "Unauthorized" });
  }
  res.locals.userId = DEFAULT_USER_ID;
  next();
}

const settingsLimiter = new RateLimiter(60000, 30);
const eventLimiter = new RateLimiter(60000, 120);

function getUserId(res: Response): string {
  const userId: unknown = res.locals.userId;
  return typeof userId === "string" ? userId : DEFAULT_USER_ID;
}

function firstQuery(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function rejectInvalid<T>(res: Response, validation: Validated<T>): validation is { ok: false; errors: string[] } {
  if (validation.ok) return false;
  res.status(400).json({ error: "Validation failed", details: validation.errors });
  return true;
}

export async function registerRoutes(app: Express): Promise<Server> {
  await initDb();

  app.use((req, res, next) => {
    if (!req.path.startsWith("/api")) {
      return next();
    }
    requireAuth(req, res, next);
  });

  const loadOptions = (userId: string) => ({
    cache: cacheFor(userId),
    timeZone: TIMEZONE,
  });

  app.get("/api/load/range", async (req: Request, res: Response) => {
    try {
      const userId = getUserId(res);
      const start = firstQuery(req.query.start);
      const end = firstQuery(req.query.end);
      const validation = validateDayRange(start, end, MAX_RANGE_DAYS);
      if (!validation.ok || !start || !end) {
        return res.status(400).json({ error: "Validation failed", details: validation.errors });
      }
      const scores = await computeLoadRange(
        createPgLoadEventSource(pool, userId),
        start,
        end,
        await getLoadConfiguration(pool, userId),
        loadOptions(userId),
      );
      res.json({ scores });
    } catch (err: unknown) {
      console.error("[load] range error:", err);
      res.status(500).json({ error: "Internal server error" });
    }
  });

  app.get("/api/load/day", async (req: Request, res: Response) => {
    try {
      const userId = getUserId(res);
      const date = firstQuery(req.query.date) || dayKey(new Date(), TIMEZONE);
      if (!isValidDateString(date)) {
        return res.status(400).json({ error: "Validation failed", details: [`date: invalid date string "${date}"`] });
      }
      const result = await computeDayLoad(
        createPgLoadEventSource(pool, userId),
        date,
        await getLoadConfiguration(pool, userId),
        loadOptions(userId),
      );
      if (!result) return res.status(404).json({ error: "No load for date" });
      res.json({ ...result, riskLabel: riskLevelLabel(result.score.riskLevel) });
    } catch (err: unknown) {
      console.error("[load] day error:", err);
      res.status(500).json({ error: "Internal server error" });
    }
  });

  app.get("/api/load/settings", async (_req: Request, res: Response) => {
    try {
      const settings = await getLoadCapacitySettings(pool, getUserId(res));
      res.json({ settings, configuration: buildLoadConfiguration(settings) });
    } catch (err: unknown) {
      console.error("[load] settings read error:", err);
      res.status(500).json({ error: "Internal server error" });
    }
  });

  app.put("/api/load/settings", rateLimit(settingsLimiter, getUserId), async (req: Request, res: Response) => {
    try {
      const userId = getUserId(res);
      const validation = validateSettingsInput(req.body);
      if (rejectInvalid(res, validation)) return;
      const { preset, ...patch } = validation.value;

      const current = await getLoadCapacitySettings(pool, userId);
      const withPreset = preset ? applyPreset(current, preset) : current;
      const settings = updateLoadSettings(withPreset, patch);
      await setLoadCapacitySettings(pool, userId, settings);
      cacheFor(userId).invalidateAll();

      console.log(`[load] settings updated for ${userId}: preset=${settings.preset} capacity=${settings.capacity} sensitivity=${settings.sensitivity} window=${settings.recoveryWindow}`);
      res.json({ settings, configuration: buildLoadConfiguration(settings) });
    } catch (err: unknown) {
      console.error("[load] settings write error:", err);
      res.status(500).json({ error: "Internal server error" });
    }
  });

  app.post("/api/load/calibration/start", async (_req: Request, res: Response) => {
    try {
      const state = startCalibration();
      await setCalibrationState(pool, getUserId(res), state);
      res.json({ calibration: state });
    } catch (err: unknown) {
      console.error("[load] calibration start error:", err);
      res.status(500).json({ error: "Internal server error" });
    }
  });

  app.delete("/api/load/calibration", async (_req: Request, res: Response) => {
    try {
      const state = cancelCalibration();
      await setCalibrationState(pool, getUserId(res), state);
      res.json({ calibration: state });
    } catch (err: unknown) {
      console.error("[load] calibration cancel error:", err);
      res.status(500).json({ error: "Internal server error" });
    }
  });

  app.post("/api/load/calibration/good-day", async (req: Request, res: Response) => {
    try {
      const userId = getUserId(res);
      const date: unknown = req.body?.date;
      if (!isValidDateString(date)) {
        return res.status(400).json({ error: "Validation failed", details: [`date: invalid date string ${JSON.stringify(date)}`] });
      }
      const calibration = await getCalibrationState(pool, userId);
      if (!calibration.active) {
        return res.status(409).json({ error: "Calibration not started" });
      }
      const settings = await getLoadCapacitySettings(pool, userId);
      const day = await computeDayLoad(
        createPgLoadEventSource(pool, userId),
        date,
        buildLoadConfiguration(settings),
        loadOptions(userId),
      );
      if (!day) return res.status(404).json({ error: "No load for date" });

      const step = recordGoodDay(calibration, day.score.decayedLoad, date);
      await setCalibrationState(pool, userId, step.state);
      if (step.baseline) {
        const next = { ...settings, baseline: step.baseline };
        await setLoadCapacitySettings(pool, userId, next);
        cacheFor(userId).invalidateAll();
        console.log(`[load] baseline calibrated for ${userId}: avg=${step.baseline.averageGoodDayLoad.toFixed(1)}`);
      }
      res.json({ calibration: step.state, baseline: step.baseline });
    } catch (err: unknown) {
      console.error("[load] calibration error:", err);
      res.status(500).json({ error: "Internal server error" });
    }
  });

  app.post("/api/load/events/:kind", rateLimit(eventLimiter, getUserId), async (req: Request, res: Response) => {
    try {
      const userId = getUserId(res);
      let id: number;
      let affectedAt: Date;

      switch (req.params.kind) {
        case "activity": {
          const v = validateActivityInput(req.body);
          if (rejectInvalid(res, v)) return;
          id = await insertActivityEvent(pool, userId, v.value);
          affectedAt = v.value.occurredAt;
          break;
        }
        case "meal": {
          const v = validateMealInput(req.body);
          if (rejectInvalid(res, v)) return;
          id = await insertMealEvent(pool, userId, v.value);
          affectedAt = v.value.occurredAt;
          break;
        }
        case "sleep": {
          const v = validateSleepInput(req.body);
          if (rejectInvalid(res, v)) return;
          id = await insertSleepEvent(pool, userId, v.value);
          affectedAt = v.value.wakeTime;
          break;
        }
        case "symptom": {
          const v = validateSymptomInput(req.body);
          if (rejectInvalid(res, v)) return;
          id = await insertSymptomEntry(pool, userId, v.value);
          affectedAt = v.value.occurredAt;
          break;
        }
        default:
          return res.status(404).json({ error: `Unknown event kind "${req.params.kind}"` });
      }

      cacheFor(userId).invalidateFrom(dayKey(affectedAt, TIMEZONE));
      res.json({ ok: true, id });
    } catch (err: unknown) {
      console.error("[load] event insert error:", err);
      res.status(500).json({ error: "Internal server error" });
    }
  });

  app.get("/api/load/symptom-types", async (_req: Request, res: Response) => {
    try {
      res.json({ symptomTypes: await listSymptomTypes(pool, getUserId(res)) });
    } catch (err: unknown) {
      console.error("[load] symptom types read error:", err);
      res.status(500).json({ error: "Internal server error" });
    }
  });

  app.post("/api/load/symptom-types", async (req: Request, res: Response) => {
    try {
      const userId = getUserId(res);
      const validation = validateSymptomTypeInput(req.body);
      if (rejectInvalid(res, validation)) return;
      const symptomType = await upsertSymptomType(pool, userId, validation.value);
      // category decides the polarity of every stored entry
      cacheFor(userId).invalidateAll();
      res.json({ symptomType });
    } catch (err: unknown) {
      console.error("[load] symptom type write error:", err);
      res.status(500).json({ error: "Internal server error" });
    }
  });

  app.put("/api/load/reflections/:date", async (req: Request, res: Response) => {
    try {
      const userId = getUserId(res);
      const { date } = req.params;
      if (!isValidDateString(date)) {
        return res.status(400).json({ error: "Validation failed", details: [`date: invalid date string "${date}"`] });
      }
      const validation = validateReflectionInput(req.body);
      if (rejectInvalid(res, validation)) return;
      await upsertDayReflection(pool, userId, date, validation.value.multiplier);
      cacheFor(userId).invalidateFrom(date);
      res.json({ ok: true });
    } catch (err: unknown) {
      console.error("[load] reflection error:", err);
      res.status(500).json({ error: "Internal server error" });
    }
  });

  app.get("/api/load/cache/stats", (_req: Request, res: Response) => {
    res.json(cacheFor(getUserId(res)).statistics());
  });

  const httpServer = createServer(app);
  return httpServer;
}
