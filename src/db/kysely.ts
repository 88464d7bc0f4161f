import { Kysely, SqliteDialect } from "kysely";
import type { Generated } from "kysely";
import type BetterSqlite3 from "better-sqlite3";
import type { Status, Priority } from "../tasks/types.js";

export interface TaskTable {
  id: Generated<number>;
  title: string;
  description: string | null;
  status: Status;
  priority: Priority;
  due_date: string | null;
  assigned_to: string | null;
  created_at: string;
  updated_at: string | null;
}

export interface DB {
  tasks: TaskTable;
}

export function createKysely(db: BetterSqlite3.Database): Kysely<DB> {
  return new Kysely<DB>({
    dialect: new SqliteDialect({ database: db }),
  });
}
