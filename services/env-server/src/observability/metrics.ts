import { Counter, Histogram, Registry } from "prom-client";
import type { FastifyInstance, FastifyRequest } from "fastify";

export type ServerMetrics = {
  registry: Registry;
  httpRequestsTotal: Counter<"method" | "route" | "status">;
  httpRequestDurationSeconds: Histogram<"method" | "route" | "status">;
  envStepsTotal: Counter<"command" | "status">;
};

const requestStarts = new WeakMap<FastifyRequest, bigint>();

function routeLabel(request: FastifyRequest): string {
  const route = request.routeOptions.url;
  if (typeof route === "string" && route.length > 0) return route;
  return "unknown";
}

export function createMetrics(): ServerMetrics {
  const registry = new Registry();

  const httpRequestsTotal = new Counter({
    name: "http_requests_total",
    help: "HTTP requests processed by the env server",
    labelNames: ["method", "route", "status"],
    registers: [registry]
  });

  const httpRequestDurationSeconds = new Histogram({
    name: "http_request_duration_seconds",
    help: "HTTP request latency (seconds)",
    labelNames: ["method", "route", "status"],
    buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30],
    registers: [registry]
  });

  const envStepsTotal = new Counter({
    name: "env_steps_total",
    help: "Environment steps by command and outcome",
    labelNames: ["command", "status"],
    registers: [registry]
  });

  return { registry, httpRequestsTotal, httpRequestDurationSeconds, envStepsTotal };
}

export function registerMetrics(app: FastifyInstance, metrics: ServerMetrics): void {
  app.get("/metrics", async (_request, reply) => {
    reply.header("content-type", metrics.registry.contentType);
    return metrics.registry.metrics();
  });

  app.addHook("onRequest", (request, _reply, done) => {
    requestStarts.set(request, process.hrtime.bigint());
    done();
  });

  app.addHook("onResponse", (request, reply, done) => {
    const start = requestStarts.get(request);
    if (start === undefined) return done();

    const durationSeconds = Number(process.hrtime.bigint() - start) / 1e9;
    const labels = {
      method: request.method,
      route: routeLabel(request),
      status: String(reply.statusCode)
    };

    metrics.httpRequestsTotal.inc(labels);
    metrics.httpRequestDurationSeconds.observe(labels, durationSeconds);
    done();
  });
}
