export type OfficeBridgeMode = "http" | "memory";

export interface AppConfig {
  port: number;
  host: string;
  logLevel: string;
  /**
   * `http` talks to a running office automation endpoint; `memory` runs the
   * in-process stand-in (local development and smoke tests).
   */
  officeBridge: OfficeBridgeMode;
  officeBridgeUrl: string;
  officeBridgeTimeoutMs: number;
  /** Connection attempts made at each reset before giving up. */
  officeConnectAttempts: number;
  officeConnectDelayMs: number;
  /** Document opened at every reset. */
  baseFile?: string;
  /** Path the workbook is saved to when the environment closes. */
  goalFile?: string;
}

function parseIntEnv(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed)) return fallback;
  return parsed;
}

function readStringEnv(value: string | undefined, fallback: string): string {
  if (typeof value !== "string") return fallback;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : fallback;
}

function readOptionalPath(value: string | undefined): string | undefined {
  const path = readStringEnv(value, "");
  return path.length > 0 ? path : undefined;
}

function parseBridgeMode(value: string | undefined): OfficeBridgeMode {
  const mode = readStringEnv(value, "http").toLowerCase();
  if (mode === "http" || mode === "memory") return mode;
  throw new Error(`OFFICE_BRIDGE must be "http" or "memory" (got "${mode}")`);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const port = parseIntEnv(env.PORT, 3000);
  if (port < 0 || port > 65_535) {
    throw new Error(`PORT must be between 0 and 65535 (got ${port})`);
  }

  const officeBridgeUrl = readStringEnv(env.OFFICE_BRIDGE_URL, "http://127.0.0.1:2003");
  // Throws on a malformed URL.
  new URL(officeBridgeUrl);

  return {
    port,
    host: readStringEnv(env.HOST, "0.0.0.0"),
    logLevel: readStringEnv(env.LOG_LEVEL, "info"),
    officeBridge: parseBridgeMode(env.OFFICE_BRIDGE),
    officeBridgeUrl,
    officeBridgeTimeoutMs: Math.max(1, parseIntEnv(env.OFFICE_BRIDGE_TIMEOUT_MS, 30_000)),
    officeConnectAttempts: Math.max(1, parseIntEnv(env.OFFICE_CONNECT_ATTEMPTS, 10)),
    officeConnectDelayMs: Math.max(0, parseIntEnv(env.OFFICE_CONNECT_DELAY_MS, 1500)),
    baseFile: readOptionalPath(env.BASE_FILE),
    goalFile: readOptionalPath(env.GOAL_FILE)
  };
}
