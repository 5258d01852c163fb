import type Database from "better-sqlite3";
import { nowIso } from "../utils/time";

type Migration = {
  id: string;
  name: string;
  up: (db: Database.Database) => void;
};

const migrations: Migration[] = [
  {
    id: "0001",
    name: "baseline",
    up: (db) => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS analyses (
          id TEXT PRIMARY KEY,
          target_service TEXT NOT NULL,
          generated_at TEXT NOT NULL,
          risk_score INTEGER NOT NULL,
          risk_level TEXT NOT NULL,
          finding_count INTEGER NOT NULL,
          warning_count INTEGER NOT NULL,
          result_json TEXT NOT NULL,
          created_at TEXT NOT NULL
        );
        CREATE INDEX IF NOT EXISTS idx_analyses_target
          ON analyses (target_service, created_at);
      `);
    }
  }
];

export function migrate(db: Database.Database): string[] {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id TEXT PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TEXT NOT NULL
    )
  `);

  const appliedRows = db.prepare("SELECT id FROM schema_migrations").all() as Array<{ id: string }>;
  const applied = new Set(appliedRows.map((row) => row.id));
  const insert = db.prepare(
    "INSERT INTO schema_migrations (id, name, applied_at) VALUES (?, ?, ?)"
  );

  const newlyApplied: string[] = [];
  for (const migration of migrations) {
    if (applied.has(migration.id)) {
      continue;
    }
    db.transaction(() => {
      migration.up(db);
      insert.run(migration.id, migration.name, nowIso());
    })();
    newlyApplied.push(`${migration.id}-${migration.name}`);
  }
  return newlyApplied;
}
