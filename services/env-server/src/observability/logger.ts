import pino, { type DestinationStream, type Logger } from "pino";
import { getRequestId } from "./request-id";

const LOG_REDACTIONS = [
  "req.headers.authorization",
  "req.headers.cookie",
  "req.headers.x-api-key",
  "req.body.password",
  "req.body.token",
  "password",
  "token",
  "apiKey"
];

export interface CreateLoggerOptions {
  level?: string;
  stream?: DestinationStream;
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  return pino(
    {
      level: options.level ?? process.env.LOG_LEVEL ?? "info",
      base: {
        service: "env-server"
      },
      redact: {
        paths: LOG_REDACTIONS,
        remove: true
      },
      serializers: {
        // Method and path only: headers and query strings stay out of the logs.
        req(req: { method?: string; url?: string; hostname?: string; remoteAddress?: string }) {
          const url = typeof req.url === "string" ? req.url.split("?", 1)[0] : undefined;
          return {
            method: req.method,
            url,
            hostname: req.hostname,
            remoteAddress: req.remoteAddress
          };
        },
        res(res: { statusCode?: number }) {
          return { statusCode: res.statusCode };
        }
      },
      mixin(_mergeObject, _level, logger) {
        const bindings = logger.bindings();
        if ("requestId" in bindings || "reqId" in bindings) return {};
        const requestId = getRequestId();
        return requestId ? { requestId } : {};
      }
    },
    options.stream
  );
}
