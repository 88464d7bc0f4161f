import type { Kysely, Updateable } from "kysely";
import type { DB, TaskTable } from "../db/kysely.js";
import {
  DEFAULT_PRIORITY,
  DEFAULT_STATUS,
  type Task,
  type CreateTaskInput,
  type UpdateTaskInput,
  type ListFilters,
} from "./types.js";

type CountFilters = Pick<ListFilters, "status" | "priority">;

export async function createTask(
  db: Kysely<DB>,
  input: CreateTaskInput,
  now?: string,
): Promise<Task> {
  const timestamp = now ?? new Date().toISOString();

  return db
    .insertInto("tasks")
    .values({
      title: input.title,
      description: input.description ?? null,
      status: DEFAULT_STATUS,
      priority: input.priority ?? DEFAULT_PRIORITY,
      due_date: input.due_date ?? null,
      assigned_to: input.assigned_to ?? null,
      created_at: timestamp,
      updated_at: null,
    })
    .returningAll()
    .executeTakeFirstOrThrow();
}

function filtered(db: Kysely<DB>, filters?: CountFilters) {
  let query = db.selectFrom("tasks");
  if (filters?.status) {
    query = query.where("status", "=", filters.status);
  }
  if (filters?.priority) {
    query = query.where("priority", "=", filters.priority);
  }
  return query;
}

export async function listTasks(db: Kysely<DB>, filters?: ListFilters): Promise<Task[]> {
  // Ordering by id keeps skip/limit windows stable across calls.
  let query = filtered(db, filters).selectAll().orderBy("id", "asc");

  if (filters?.limit !== undefined || filters?.offset !== undefined) {
    query = query.limit(filters.limit ?? -1);
  }
  if (filters?.offset !== undefined) {
    query = query.offset(filters.offset);
  }

  return query.execute();
}

export async function countTasks(db: Kysely<DB>, filters?: CountFilters): Promise<number> {
  const row = await filtered(db, filters)
    .select((eb) => eb.fn.countAll<number>().as("count"))
    .executeTakeFirstOrThrow();
  return Number(row.count);
}

export async function getTask(db: Kysely<DB>, id: number): Promise<Task | null> {
  const row = await db.selectFrom("tasks").selectAll().where("id", "=", id).executeTakeFirst();
  return row ?? null;
}

export async function updateTask(
  db: Kysely<DB>,
  id: number,
  input: UpdateTaskInput,
  timestamp?: string,
): Promise<Task | null> {
  const now = timestamp ?? new Date().toISOString();
  const updates: Updateable<TaskTable> = { updated_at: now };

  if (input.title !== undefined) {
    updates.title = input.title;
  }
  if (input.description !== undefined) {
    updates.description = input.description;
  }
  if (input.status !== undefined) {
    updates.status = input.status;
  }
  if (input.priority !== undefined) {
    updates.priority = input.priority;
  }
  if (input.due_date !== undefined) {
    updates.due_date = input.due_date;
  }
  if (input.assigned_to !== undefined) {
    updates.assigned_to = input.assigned_to;
  }

  const row = await db
    .updateTable("tasks")
    .set(updates)
    .where("id", "=", id)
    .returningAll()
    .executeTakeFirst();

  return row ?? null;
}

export async function deleteTask(db: Kysely<DB>, id: number): Promise<boolean> {
  const result = await db.deleteFrom("tasks").where("id", "=", id).executeTakeFirst();
  return BigInt(result.numDeletedRows) > 0n;
}
