import type { CalcEnvironment } from "@calc-env/core";
import Fastify, { type FastifyBaseLogger, type FastifyInstance } from "fastify";
import type { AppConfig } from "./config";
import { createLogger } from "./observability/logger";
import { createMetrics, registerMetrics } from "./observability/metrics";
import { genRequestId, registerRequestId } from "./observability/request-id";
import { registerEnvRoutes } from "./routes/env";

export interface BuildAppOptions {
  environment: CalcEnvironment;
  config: AppConfig;
  logger?: FastifyBaseLogger;
}

export function buildApp(options: BuildAppOptions): FastifyInstance {
  const metrics = createMetrics();
  const loggerInstance: FastifyBaseLogger = options.logger ?? createLogger({ level: options.config.logLevel });

  const app = Fastify({
    loggerInstance,
    genReqId: genRequestId,
    requestIdLogLabel: "requestId"
  });

  app.decorate("config", options.config);
  app.decorate("metrics", metrics);
  app.decorate("environment", options.environment);

  registerRequestId(app);
  registerMetrics(app, metrics);

  app.get("/health", async () => ({ status: "ok" }));

  registerEnvRoutes(app);

  return app;
}
