import "fastify";
import type { CalcEnvironment } from "@calc-env/core";
import type { AppConfig } from "./config";
import type { ServerMetrics } from "./observability/metrics";

declare module "fastify" {
  interface FastifyInstance {
    config: AppConfig;
    metrics: ServerMetrics;
    environment: CalcEnvironment;
  }
}
