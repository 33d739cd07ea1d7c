import { randomUUID } from "node:crypto";
import { AsyncLocalStorage } from "node:async_hooks";
import type { IncomingHttpHeaders, IncomingMessage } from "node:http";
import type { FastifyInstance } from "fastify";

export const REQUEST_ID_HEADER = "x-request-id";

/**
 * Headers an agent harness may tag a reset or step with, in order of preference.
 * Whichever id is adopted is echoed back as `x-request-id`.
 */
export const INCOMING_ID_HEADERS = [REQUEST_ID_HEADER, "x-correlation-id"] as const;

const MAX_REQUEST_ID_LENGTH = 128;
const REQUEST_ID_PATTERN = /^[A-Za-z0-9._:@-]+$/;

const requestIdStorage = new AsyncLocalStorage<string>();

export function getRequestId(): string | undefined {
  return requestIdStorage.getStore();
}

function acceptId(raw: string | string[] | undefined): string | null {
  const value = (Array.isArray(raw) ? raw[0] : raw)?.trim();
  if (!value || value.length > MAX_REQUEST_ID_LENGTH) return null;
  return REQUEST_ID_PATTERN.test(value) ? value : null;
}

export function requestIdFromHeaders(headers: IncomingHttpHeaders): string | null {
  for (const name of INCOMING_ID_HEADERS) {
    const id = acceptId(headers[name]);
    if (id) return id;
  }
  return null;
}

export function genRequestId(req: IncomingMessage): string {
  return requestIdFromHeaders(req.headers) ?? randomUUID();
}

/** Echo the id and bind it for log lines written while the request runs, environment logs included. */
export function registerRequestId(app: FastifyInstance): void {
  app.addHook("onRequest", (request, reply, done) => {
    reply.header(REQUEST_ID_HEADER, request.id);
    requestIdStorage.enterWith(request.id);
    done();
  });
}
