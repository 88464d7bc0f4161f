import { Hono } from "hono";
import type { Context } from "hono";
import { cors } from "hono/cors";
import { HTTPException } from "hono/http-exception";
import { logger } from "hono/logger";
import type { TaskService } from "../main.js";
import { NotFoundError, ValidationError } from "../errors.js";
import {
  listQuerySchema,
  pageSchema,
  parseCreateInput,
  parseOrThrow,
  parsePriority,
  parseStatus,
  parseTaskId,
  parseUpdateInput,
} from "../validation.js";
import { VERSION } from "../version.js";

export const SERVICE_NAME = "Task Management API";
export const API_PREFIX = "/api/v1";

export interface AppOptions {
  defaultLimit: number;
  maxLimit: number;
  corsOrigins: string[];
  /** Receives one line per request; omit to disable request logging. */
  log?: (line: string) => void;
}

async function readJson(c: Context): Promise<unknown> {
  try {
    return await c.req.json();
  } catch {
    throw new ValidationError([{ field: "body", message: "Invalid JSON body" }]);
  }
}

function createTaskRoutes(service: TaskService, options: AppOptions): Hono {
  const tasks = new Hono();
  const limits = { defaultLimit: options.defaultLimit, maxLimit: options.maxLimit };
  const listQuery = listQuerySchema(limits);
  const page = pageSchema(limits);

  tasks.post("/", async (c) => {
    const input = parseCreateInput(await readJson(c));
    const task = await service.add(input);
    return c.json(task, 201);
  });

  tasks.get("/", async (c) => {
    const query = parseOrThrow(listQuery, c.req.query());
    return c.json(await service.list(query));
  });

  tasks.get("/status/:status", async (c) => {
    const status = parseStatus(c.req.param("status"));
    const paging = parseOrThrow(page, c.req.query());
    return c.json(await service.listByStatus(status, paging));
  });

  tasks.get("/priority/:priority", async (c) => {
    const priority = parsePriority(c.req.param("priority"));
    const paging = parseOrThrow(page, c.req.query());
    return c.json(await service.listByPriority(priority, paging));
  });

  tasks.get("/:id", async (c) => {
    const id = parseTaskId(c.req.param("id"));
    const task = await service.get(id);
    if (!task) {
      throw new NotFoundError(id);
    }
    return c.json(task);
  });

  tasks.put("/:id", async (c) => {
    const id = parseTaskId(c.req.param("id"));
    const input = parseUpdateInput(await readJson(c));
    const task = await service.update(id, input);
    if (!task) {
      throw new NotFoundError(id);
    }
    return c.json(task);
  });

  tasks.delete("/:id", async (c) => {
    const id = parseTaskId(c.req.param("id"));
    const deleted = await service.delete(id);
    if (!deleted) {
      throw new NotFoundError(id);
    }
    return c.body(null, 204);
  });

  return tasks;
}

export function createApp(service: TaskService, options: AppOptions): Hono {
  const app = new Hono();

  if (options.log) {
    app.use("*", logger(options.log));
  }
  app.use(
    "*",
    cors({
      origin: options.corsOrigins.includes("*") ? "*" : options.corsOrigins,
    }),
  );

  app.get("/", (c) =>
    c.json({
      message: `Welcome to ${SERVICE_NAME}`,
      version: VERSION,
      endpoints: {
        tasks: `${API_PREFIX}/tasks`,
        health: "/health",
      },
    }),
  );

  app.get("/health", (c) =>
    c.json({
      status: "healthy",
      service: SERVICE_NAME,
      version: VERSION,
    }),
  );

  app.route(`${API_PREFIX}/tasks`, createTaskRoutes(service, options));

  app.notFound((c) =>
    c.json({ error: "not_found", message: `Route not found: ${c.req.method} ${c.req.path}` }, 404),
  );

  app.onError((err, c) => {
    if (err instanceof ValidationError) {
      return c.json({ error: "validation", message: err.message, issues: err.issues }, 422);
    }
    if (err instanceof NotFoundError) {
      return c.json({ error: "not_found", message: err.message, id: err.id }, 404);
    }
    if (err instanceof HTTPException) {
      return c.json({ error: "http", message: err.message }, err.status);
    }
    console.error(err);
    return c.json({ error: "internal", message: "Internal server error" }, 500);
  });

  return app;
}
