import type { Kysely } from "kysely";
import type { DB } from "./db/kysely.js";
import type {
  Task,
  TaskPage,
  CreateTaskInput,
  UpdateTaskInput,
  Status,
  Priority,
} from "./tasks/types.js";
import {
  createTask,
  listTasks,
  countTasks,
  getTask,
  updateTask,
  deleteTask,
} from "./tasks/repository.js";

export interface Page {
  skip: number;
  limit: number;
}

export interface ListQuery extends Page {
  status?: Status;
  priority?: Priority;
}

export type Clock = () => Date;

export class TaskService {
  constructor(
    private db: Kysely<DB>,
    private clock: Clock = () => new Date(),
  ) {}

  private now(): string {
    return this.clock().toISOString();
  }

  async add(input: CreateTaskInput): Promise<Task> {
    return createTask(this.db, input, this.now());
  }

  async get(id: number): Promise<Task | null> {
    return getTask(this.db, id);
  }

  async list(query: ListQuery): Promise<TaskPage> {
    const { skip, limit, status, priority } = query;
    const tasks = await listTasks(this.db, { status, priority, limit, offset: skip });
    const total = await countTasks(this.db, { status, priority });
    return { tasks, total, skip, limit };
  }

  async listByStatus(status: Status, page: Page): Promise<Task[]> {
    return listTasks(this.db, { status, limit: page.limit, offset: page.skip });
  }

  async listByPriority(priority: Priority, page: Page): Promise<Task[]> {
    return listTasks(this.db, { priority, limit: page.limit, offset: page.skip });
  }

  async update(id: number, input: UpdateTaskInput): Promise<Task | null> {
    const existing = await getTask(this.db, id);
    if (!existing) {
      return null;
    }
    // A clock that steps backwards must not put updated_at before created_at.
    const now = this.now();
    const timestamp = now < existing.created_at ? existing.created_at : now;
    return updateTask(this.db, id, input, timestamp);
  }

  async delete(id: number): Promise<boolean> {
    return deleteTask(this.db, id);
  }
}
