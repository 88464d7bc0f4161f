import { serve } from "@hono/node-server";
import { openDb } from "../db/connection.js";
import { initSchema } from "../db/schema.js";
import { createKysely } from "../db/kysely.js";
import { applyEnv, getConfigPath, loadConfig } from "../config/config.js";
import { TaskService } from "../main.js";
import { API_PREFIX, createApp } from "./routes.js";
import { VERSION } from "../version.js";
import { bold, dim, orange } from "../format/colors.js";

const config = applyEnv(loadConfig(getConfigPath()));
const db = openDb(config.db_path);
initSchema(db);

const ky = createKysely(db);
const service = new TaskService(ky);
const app = createApp(service, {
  defaultLimit: config.default_limit,
  maxLimit: config.max_limit,
  corsOrigins: config.cors_origins,
  log: config.log_requests ? (line) => console.log(line) : undefined,
});

const server = serve({ fetch: app.fetch, hostname: config.host, port: config.port }, (info) => {
  const url = `http://${config.host}:${info.port}`;
  console.log(`${orange("tasks-api")} ${dim(`v${VERSION}`)} listening on ${bold(url)}`);
  console.log(`Database: ${config.db_path}`);
  console.log(`Tasks: ${url}${API_PREFIX}/tasks`);
});

function shutdown(signal: string) {
  console.log(`Received ${signal}, shutting down...`);
  server.close((err) => {
    if (err) {
      console.error("Error while closing server:", err);
    }
    db.close();
    process.exit(err ? 1 : 0);
  });
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
