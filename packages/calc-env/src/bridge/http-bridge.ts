import { fetch as undiciFetch } from "undici";
import { z } from "zod";
import { formatCellBody, formatRangeBody } from "../spreadsheet/a1.ts";
import type { CellAddress, RangeAddress } from "../spreadsheet/a1.ts";
import type { CellProperties, CellReading, CellValue } from "../spreadsheet/types.ts";
import type { ExportOptions, OfficeBridge } from "./api.ts";
import { BridgeCallError, BridgeUnavailableError } from "./errors.ts";
import { resolveEndpoint } from "../http/endpoint.ts";

export type BridgeMethod =
  | "connect"
  | "disconnect"
  | "newDocument"
  | "openDocument"
  | "storeDocument"
  | "exportDocument"
  | "listSheets"
  | "insertSheet"
  | "removeSheet"
  | "renameSheet"
  | "readCell"
  | "writeCellValue"
  | "writeCellText"
  | "writeCellFormula"
  | "readRange"
  | "writeRange"
  | "setCellProperties";

export interface BridgeHttpResponse {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
}

export type BridgeFetch = (
  url: string,
  init: { method: "POST"; headers: Record<string, string>; body: string; signal: AbortSignal }
) => Promise<BridgeHttpResponse>;

export interface HttpOfficeBridgeOptions {
  /** Base URL of the office automation endpoint (e.g. `http://127.0.0.1:2003`). */
  url: string;
  /** Per-call transport timeout. */
  timeoutMs?: number;
  fetch?: BridgeFetch;
}

const DEFAULT_TIMEOUT_MS = 30_000;

// The error branch goes first: `result: z.unknown()` also accepts a missing key.
const BridgeReplySchema = z.union([
  z.object({
    error: z.object({
      type: z.string().nullish(),
      message: z.string()
    })
  }),
  z.object({ result: z.unknown() })
]);

const SheetNamesSchema = z.array(z.string());

const CellReadingSchema = z.object({
  text: z.string(),
  value: z.number(),
  formula: z.string()
});

const DataArraySchema = z.array(z.array(z.union([z.string(), z.number()])));

function cellParams(address: CellAddress): { sheet: string; cell: string } {
  return { sheet: address.sheet, cell: formatCellBody(address) };
}

function rangeParams(range: RangeAddress): { sheet: string; range: string } {
  return { sheet: range.sheet, range: formatRangeBody(range) };
}

/**
 * {@link OfficeBridge} that forwards each primitive to the office automation
 * endpoint as one JSON request: `POST {url}/call` with `{ method, params }`.
 *
 * The endpoint replies `{ result }` on success or `{ error: { type, message } }`
 * when the office raised. Anything else (connection refused, timeout, a reply
 * that is not JSON) means the office process is unavailable.
 */
export class HttpOfficeBridge implements OfficeBridge {
  private readonly endpoint: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: BridgeFetch;

  constructor(options: HttpOfficeBridgeOptions) {
    this.endpoint = resolveEndpoint(options.url, "call");
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? undiciFetch;
  }

  async connect(): Promise<void> {
    await this.call("connect", {});
  }

  async disconnect(): Promise<void> {
    await this.call("disconnect", {});
  }

  async newDocument(): Promise<void> {
    await this.call("newDocument", {});
  }

  async openDocument(filePath: string): Promise<void> {
    await this.call("openDocument", { filePath });
  }

  async storeDocument(filePath: string): Promise<void> {
    await this.call("storeDocument", { filePath });
  }

  async exportDocument(filePath: string, options: ExportOptions): Promise<void> {
    await this.call("exportDocument", { filePath, ...options });
  }

  async listSheets(): Promise<string[]> {
    return this.parseResult("listSheets", SheetNamesSchema, await this.call("listSheets", {}));
  }

  async insertSheet(name: string, position?: number): Promise<void> {
    await this.call("insertSheet", position === undefined ? { name } : { name, position });
  }

  async removeSheet(name: string): Promise<void> {
    await this.call("removeSheet", { name });
  }

  async renameSheet(oldName: string, newName: string): Promise<void> {
    await this.call("renameSheet", { oldName, newName });
  }

  async readCell(address: CellAddress): Promise<CellReading> {
    return this.parseResult("readCell", CellReadingSchema, await this.call("readCell", cellParams(address)));
  }

  async writeCellValue(address: CellAddress, value: number): Promise<void> {
    await this.call("writeCellValue", { ...cellParams(address), value });
  }

  async writeCellText(address: CellAddress, text: string): Promise<void> {
    await this.call("writeCellText", { ...cellParams(address), text });
  }

  async writeCellFormula(address: CellAddress, formula: string): Promise<void> {
    await this.call("writeCellFormula", { ...cellParams(address), formula });
  }

  async readRange(range: RangeAddress): Promise<CellValue[][]> {
    return this.parseResult("readRange", DataArraySchema, await this.call("readRange", rangeParams(range)));
  }

  async writeRange(origin: CellAddress, values: CellValue[][]): Promise<void> {
    await this.call("writeRange", { ...cellParams(origin), values });
  }

  async setCellProperties(address: CellAddress, properties: CellProperties): Promise<void> {
    await this.call("setCellProperties", { ...cellParams(address), properties });
  }

  private async call(method: BridgeMethod, params: Record<string, unknown>): Promise<unknown> {
    let response: BridgeHttpResponse;
    try {
      response = await this.fetchImpl(this.endpoint, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify({ method, params }),
        signal: AbortSignal.timeout(this.timeoutMs)
      });
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new BridgeUnavailableError(method, `Office bridge request failed: ${detail}`, { cause: error });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new BridgeUnavailableError(
        method,
        `Office bridge returned an unreadable reply (HTTP ${response.status})`,
        { cause: error }
      );
    }

    const parsed = BridgeReplySchema.safeParse(body);
    if (!parsed.success) {
      throw new BridgeUnavailableError(method, `Office bridge returned a malformed reply (HTTP ${response.status})`);
    }

    const reply = parsed.data;
    if ("error" in reply) {
      throw new BridgeCallError(method, reply.error.message, reply.error.type ?? null);
    }
    if (!response.ok) {
      throw new BridgeUnavailableError(method, `Office bridge responded with HTTP ${response.status}`);
    }
    return reply.result;
  }

  private parseResult<T>(method: BridgeMethod, schema: z.ZodType<T>, result: unknown): T {
    const parsed = schema.safeParse(result);
    if (!parsed.success) {
      throw new BridgeUnavailableError(method, `Office bridge returned an unexpected ${method} result`);
    }
    return parsed.data;
  }
}
