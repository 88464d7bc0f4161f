import type Database from "better-sqlite3";
import { STATUSES, PRIORITIES } from "../tasks/types.js";

function sqlList(values: readonly string[]): string {
  return values.map((v) => `'${v}'`).join(", ");
}

export function initSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS tasks (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      title TEXT NOT NULL CHECK (length(title) BETWEEN 1 AND 200),
      description TEXT CHECK (description IS NULL OR length(description) <= 1000),
      status TEXT NOT NULL DEFAULT 'pending' CHECK (status IN (${sqlList(STATUSES)})),
      priority TEXT NOT NULL DEFAULT 'medium' CHECK (priority IN (${sqlList(PRIORITIES)})),
      due_date TEXT,
      assigned_to TEXT CHECK (assigned_to IS NULL OR length(assigned_to) <= 100),
      created_at TEXT NOT NULL,
      updated_at TEXT
    );

    CREATE INDEX IF NOT EXISTS idx_tasks_status ON tasks(status);
    CREATE INDEX IF NOT EXISTS idx_tasks_priority ON tasks(priority);
  `);
}
