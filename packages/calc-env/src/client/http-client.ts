import { fetch as undiciFetch } from "undici";
import { z } from "zod";
import type { UnknownAction } from "../action-schema.ts";
import type { EnvironmentState, StepRunner } from "../environment.ts";
import type { Observation, ObservationData } from "../observation.ts";
import { buildObservation } from "../observation.ts";
import { resolveEndpoint } from "../http/endpoint.ts";

export interface ClientHttpResponse {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
}

export type ClientFetch = (
  url: string,
  init: { method: "GET" | "POST"; headers: Record<string, string>; body?: string; signal: AbortSignal }
) => Promise<ClientHttpResponse>;

export interface CalcEnvClientOptions {
  /** Base URL of the env server, e.g. `http://localhost:3000`. */
  baseUrl: string;
  timeoutMs?: number;
  fetch?: ClientFetch;
}

export class CalcEnvClientError extends Error {
  readonly status: number | null;

  constructor(message: string, status: number | null, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CalcEnvClientError";
    this.status = status;
  }
}

const CellValueSchema = z.union([z.string(), z.number()]);

const ObservationDataSchema: z.ZodType<ObservationData> = z.union([
  z.string(),
  z.number(),
  z.array(z.array(CellValueSchema)),
  z.record(z.unknown()),
  z.null()
]);

const ObservationWireSchema = z.object({
  result: z.string().default(""),
  success: z.boolean().default(false),
  data: ObservationDataSchema.optional(),
  current_sheet: z.string().nullish(),
  sheet_names: z.array(z.string()).default([]),
  error_message: z.string().nullish(),
  file_path: z.string().nullish(),
  done: z.boolean().optional(),
  reward: z.number().nullish(),
  metadata: z.record(z.unknown()).default({})
});

const StepResponseSchema = z.object({
  observation: ObservationWireSchema,
  reward: z.number().nullish(),
  done: z.boolean().default(false)
});

const StateResponseSchema = z.object({
  episode_id: z.string(),
  step_count: z.number().int().nonnegative()
});

/**
 * Remote {@link StepRunner} talking to the env server over HTTP.
 */
export class CalcEnvClient implements StepRunner {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: ClientFetch;

  constructor(options: CalcEnvClientOptions) {
    this.baseUrl = options.baseUrl;
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.fetchImpl = options.fetch ?? undiciFetch;
  }

  async reset(): Promise<Observation> {
    return this.toObservation(await this.request("POST", "/reset", {}));
  }

  async step(action: UnknownAction): Promise<Observation> {
    const body = { action: { command: action.command, parameters: action.parameters ?? {} } };
    return this.toObservation(await this.request("POST", "/step", body));
  }

  async state(): Promise<EnvironmentState> {
    const parsed = StateResponseSchema.safeParse(await this.request("GET", "/state"));
    if (!parsed.success) {
      throw new CalcEnvClientError("Env server returned a malformed state", null, { cause: parsed.error });
    }
    return parsed.data;
  }

  private toObservation(payload: unknown): Observation {
    const parsed = StepResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new CalcEnvClientError("Env server returned a malformed observation", null, { cause: parsed.error });
    }
    const { observation, reward, done } = parsed.data;
    return buildObservation({
      result: observation.result,
      success: observation.success,
      data: observation.data ?? null,
      currentSheet: observation.current_sheet ?? "",
      sheetNames: observation.sheet_names,
      errorMessage: observation.error_message ?? null,
      filePath: observation.file_path ?? null,
      done: observation.done ?? done,
      reward: reward ?? observation.reward ?? null,
      metadata: observation.metadata
    });
  }

  private async request(method: "GET" | "POST", path: string, body?: unknown): Promise<unknown> {
    const url = resolveEndpoint(this.baseUrl, path);
    let response: ClientHttpResponse;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers: body === undefined ? { accept: "application/json" } : { "content-type": "application/json" },
        ...(body === undefined ? {} : { body: JSON.stringify(body) }),
        signal: AbortSignal.timeout(this.timeoutMs)
      });
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new CalcEnvClientError(`Env server request failed: ${detail}`, null, { cause: error });
    }

    if (!response.ok) {
      throw new CalcEnvClientError(`Env server responded with HTTP ${response.status}`, response.status);
    }
    return response.json();
  }
}
