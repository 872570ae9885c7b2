import pg from "pg";

const pool = new pg.Pool({
  connectionString: process.env.DATABASE_URL,
});

export async function runMigration(name: string, sql: string): Promise<void> {
  const { rows } = await pool.query(
    `SELECT id FROM schema_migrations WHERE name = $1`,
    [name]
  );
  if (rows.length > 0) return;
  console.log(`[migration] applying: ${name}`);
  await pool.query(sql);
  await pool.query(
    `INSERT INTO schema_migrations (name) VALUES ($1)`,
    [name]
  );
  console.log(`[migration] applied: ${name}`);
}

export async function initDb(): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id SERIAL PRIMARY KEY,
      name TEXT UNIQUE NOT NULL,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );

    CREATE TABLE IF NOT EXISTS app_settings (
      user_id TEXT NOT NULL DEFAULT 'local_default',
      key TEXT NOT NULL,
      value TEXT NOT NULL,
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      PRIMARY KEY (user_id, key)
    );
  `);

  await runMigration('001_load_events', `
    CREATE TABLE IF NOT EXISTS activity_events (
      id SERIAL PRIMARY KEY,
      user_id TEXT NOT NULL DEFAULT 'local_default',
      name TEXT,
      occurred_at TIMESTAMPTZ NOT NULL,
      physical_exertion SMALLINT NOT NULL,
      cognitive_exertion SMALLINT NOT NULL,
      emotional_load SMALLINT NOT NULL,
      duration_minutes REAL,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
    CREATE INDEX IF NOT EXISTS idx_activity_events_user_time ON activity_events(user_id, occurred_at);

    CREATE TABLE IF NOT EXISTS meal_events (
      id SERIAL PRIMARY KEY,
      user_id TEXT NOT NULL DEFAULT 'local_default',
      meal_type TEXT,
      occurred_at TIMESTAMPTZ NOT NULL,
      physical_exertion SMALLINT,
      cognitive_exertion SMALLINT,
      emotional_load SMALLINT,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
    CREATE INDEX IF NOT EXISTS idx_meal_events_user_time ON meal_events(user_id, occurred_at);

    CREATE TABLE IF NOT EXISTS sleep_events (
      id SERIAL PRIMARY KEY,
      user_id TEXT NOT NULL DEFAULT 'local_default',
      bed_time TIMESTAMPTZ NOT NULL,
      wake_time TIMESTAMPTZ NOT NULL,
      quality SMALLINT NOT NULL,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      CHECK (wake_time >= bed_time)
    );
    CREATE INDEX IF NOT EXISTS idx_sleep_events_user_wake ON sleep_events(user_id, wake_time);
  `);

  await runMigration('002_symptoms', `
    CREATE TABLE IF NOT EXISTS symptom_types (
      id SERIAL PRIMARY KEY,
      user_id TEXT NOT NULL DEFAULT 'local_default',
      name TEXT NOT NULL,
      category TEXT NOT NULL,
      UNIQUE (user_id, name)
    );

    CREATE TABLE IF NOT EXISTS symptom_entries (
      id SERIAL PRIMARY KEY,
      user_id TEXT NOT NULL DEFAULT 'local_default',
      symptom_type_id INTEGER NOT NULL REFERENCES symptom_types(id),
      severity SMALLINT NOT NULL,
      occurred_at TIMESTAMPTZ NOT NULL,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
    CREATE INDEX IF NOT EXISTS idx_symptom_entries_user_time ON symptom_entries(user_id, occurred_at);
  `);

  await runMigration('003_day_reflections', `
    CREATE TABLE IF NOT EXISTS day_reflections (
      user_id TEXT NOT NULL DEFAULT 'local_default',
      day TEXT NOT NULL,
      load_multiplier REAL,
      notes TEXT,
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      PRIMARY KEY (user_id, day)
    );
  `);
}

export { pool };
