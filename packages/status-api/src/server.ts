import "dotenv/config";
import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import rateLimit from "@fastify/rate-limit";
import { loadConfig } from "@oficios/core/config";
import { createMongoContext } from "@oficios/core/db/mongo";
import { createLogger } from "@oficios/core/logger";
import { StatusQueryService } from "@oficios/core/status/statusService";
import { registerStatusRoutes, type StatusReader } from "./routes/status";

export interface ApiConfig {
  host: string;
  port: number;
  requestTimeoutMs: number;
  rateLimitMax: number;
  rateLimitWindow: string;
  corsOrigins: string[];
}

export interface BuildServerDependencies {
  config?: ApiConfig;
  status?: StatusReader;
}

function parseIntegerEnv(name: string, defaultValue: number): number {
  const raw = process.env[name];
  if (!raw) {
    return defaultValue;
  }

  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed)) {
    throw new Error(`ENV ${name} must be an integer. Received: ${raw}`);
  }
  return parsed;
}

function parseCsvEnv(name: string, defaultValue: string): string[] {
  const raw = process.env[name] ?? defaultValue;
  return raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function loadApiConfigFromEnv(): ApiConfig {
  return {
    host: process.env.HOST ?? "0.0.0.0",
    port: parseIntegerEnv("PORT", 3000),
    requestTimeoutMs: parseIntegerEnv("REQUEST_TIMEOUT_MS", 30000),
    rateLimitMax: parseIntegerEnv("RATE_LIMIT_MAX", 120),
    rateLimitWindow: process.env.RATE_LIMIT_WINDOW ?? "1 minute",
    corsOrigins: parseCsvEnv("CORS_ORIGINS", "http://localhost:5173,http://127.0.0.1:5173"),
  };
}

export async function buildServer(
  dependencies: BuildServerDependencies = {},
): Promise<FastifyInstance> {
  const config = dependencies.config ?? loadApiConfigFromEnv();
  const app = Fastify({
    logger: true,
    requestTimeout: config.requestTimeoutMs,
  });

  await app.register(rateLimit, {
    max: config.rateLimitMax,
    timeWindow: config.rateLimitWindow,
  });
  await app.register(cors, {
    origin: config.corsOrigins.includes("*") ? true : config.corsOrigins,
    methods: ["GET", "OPTIONS"],
  });

  let status = dependencies.status;
  if (!status) {
    const mongo = await createMongoContext(loadConfig(), createLogger());
    status = new StatusQueryService(mongo.tracking);

    app.addHook("onClose", async () => {
      await mongo.client.close();
    });
  }

  await registerStatusRoutes(app, { status });

  app.get("/health", async () => ({ status: "ok" }));

  return app;
}

export async function startServer(): Promise<void> {
  const config = loadApiConfigFromEnv();
  const app = await buildServer({ config });
  const address = await app.listen({
    port: config.port,
    host: config.host,
  });

  app.log.info({ address }, "status api started");
}

if (require.main === module) {
  startServer().catch((error) => {
    const message = error instanceof Error ? error.stack ?? error.message : String(error);
    console.error(message);
    process.exitCode = 1;
  });
}
