import Database from "better-sqlite3";
import path from "path";
import fs from "fs";

export const MEMORY_DB = ":memory:";

export function openDb(dbPath: string): Database.Database {
  if (dbPath === MEMORY_DB) {
    return new Database(MEMORY_DB);
  }

  const resolvedPath = path.resolve(dbPath);
  const dir = path.dirname(resolvedPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
  }
  const db = new Database(resolvedPath);
  db.pragma("journal_mode = WAL");

  // Restrict DB file permissions to owner-only
  try {
    fs.chmodSync(resolvedPath, 0o600);
  } catch (err) {
    process.stderr.write(
      `Warning: Could not restrict permissions on ${resolvedPath}: ${err instanceof Error ? err.message : String(err)}\n`,
    );
  }

  return db;
}
