import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import { registerClientLifecycle, type ClientLifecycleOptions } from "./clients/lifecycle.js";
import { registerHealthRoute } from "./api/routes/health.js";
import { registerInfrastructureHealthRoute } from "./api/routes/infrastructure-health.js";
import { registerApiRoutes, type ApiRoutesDependencies } from "./api/routes/index.js";
import { config } from "./config/index.js";
import { registerMetricsRoutes, registerRequestMetricsHooks } from "./observability/metrics.js";
import { parseConfiguredLogLevel } from "./observability/logger.js";

export interface BuildAppOptions {
  apiDependencies?: ApiRoutesDependencies;
  registerInfrastructureHealth?: boolean;
  lifecycle?: ClientLifecycleOptions;
}

export function buildAllowedOrigins(rawOrigin: string | undefined): string[] {
  const configured = rawOrigin
    ?.split(",")
    .map((origin) => origin.trim())
    .filter(Boolean);

  const origins = new Set<string>(
    configured && configured.length > 0 ? configured : ["http://localhost:5173", "http://127.0.0.1:5173"]
  );

  for (const origin of [...origins]) {
    let url: URL;
    try {
      url = new URL(origin);
    } catch {
      // Not a URL: kept as configured.
      continue;
    }
    if (url.hostname === "localhost") {
      url.hostname = "127.0.0.1";
      origins.add(url.toString().replace(/\/$/, ""));
    } else if (url.hostname === "127.0.0.1") {
      url.hostname = "localhost";
      origins.add(url.toString().replace(/\/$/, ""));
    }
  }

  return [...origins];
}

export async function buildApp(options?: BuildAppOptions): Promise<FastifyInstance> {
  const app = Fastify({ logger: { level: parseConfiguredLogLevel(process.env.LOG_LEVEL) } });

  await app.register(cors, {
    origin: buildAllowedOrigins(config.CORS_ORIGINS),
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type", "X-Request-Id"]
  });

  registerRequestMetricsHooks(app);
  registerClientLifecycle(app, options?.lifecycle);
  await registerHealthRoute(app);
  await registerMetricsRoutes(app);
  if (options?.registerInfrastructureHealth !== false) {
    await registerInfrastructureHealthRoute(app);
  }
  await registerApiRoutes(app, options?.apiDependencies);

  return app;
}
