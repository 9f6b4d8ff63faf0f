import express, { Application, Request, Response, NextFunction } from "express";
import path from "node:path";
import fs from "node:fs";
import swaggerUi from "swagger-ui-express";
import helmet from "helmet";
import { createRoutes } from "./src/routes";
import { loadSettings } from "./src/config/settings";
import pool, { initCacheTable } from "./src/db";
import { createRoutingConfig } from "./src/routing/config";
import { PostgresCacheBackend } from "./src/routing/cacheBackends";
import { ResultCache } from "./src/routing/resultCache";
import { QueryRouter } from "./src/routing/router";
import { createToolRegistry } from "./src/tools/registry";

const settings = loadSettings();
const routingConfig = createRoutingConfig();

const cache = new ResultCache({
  maxEntries: settings.cache.maxEntries,
  defaultTtlSeconds: settings.cache.ttlSeconds,
  backend: settings.cache.backend === "postgres" ? new PostgresCacheBackend(pool) : undefined
});

const queryRouter = new QueryRouter({
  config: routingConfig,
  tools: createToolRegistry({ db: pool, config: routingConfig, webSearch: { apiKey: settings.serpApiKey } }),
  cache,
  cacheEnabled: settings.cache.enabled,
  cacheTtlSeconds: settings.cache.ttlSeconds,
  toolTimeoutMs: settings.toolTimeoutMs
});

const stopSweep = settings.cache.sweepIntervalMs > 0 ? cache.startSweep(settings.cache.sweepIntervalMs) : () => undefined;

const app: Application = express();

app.use(helmet());
app.use(express.json({ limit: "1mb" }));

const swaggerPath = path.resolve(__dirname, "..", "swagger.json");
let swaggerDocument: Record<string, unknown> | null = null;

if (fs.existsSync(swaggerPath)) {
  try {
    swaggerDocument = JSON.parse(fs.readFileSync(swaggerPath, "utf-8"));
  } catch (error) {
    console.error("Failed to parse swagger.json", error);
  }
} else {
  console.warn(`Swagger definition not found at ${swaggerPath}. /docs route disabled.`);
}

if (swaggerDocument) {
  app.use("/docs", swaggerUi.serve, swaggerUi.setup(swaggerDocument));
}

app.get("/health", (_req: Request, res: Response) => {
  res.json({ status: "ok", uptime: process.uptime() });
});

app.use(createRoutes(queryRouter));

// Basic error handler for uncaught errors within the request pipeline.
app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
  console.error("Unhandled error", err);
  res.status(500).json({ message: "Unexpected server error" });
});

async function start(): Promise<void> {
  if (settings.cache.backend === "postgres") {
    await initCacheTable();
  }
  app.listen(settings.port, () => {
    console.log(`Knowledge router listening on port ${settings.port}`);
  });
}

start().catch((error: unknown) => {
  console.error("Failed to start server", error);
  process.exit(1);
});

process.on("unhandledRejection", (reason: unknown) => {
  console.error("Unhandled promise rejection", reason);
});

process.on("SIGTERM", () => {
  console.log("Received SIGTERM, shutting down.");
  stopSweep();
  pool
    .end()
    .catch((error: unknown) => console.error("Failed to close PostgreSQL pool", error))
    .finally(() => process.exit(0));
});
