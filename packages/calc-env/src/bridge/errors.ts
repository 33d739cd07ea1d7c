/**
 * Base class for failures raised by an {@link OfficeBridge}.
 */
export class BridgeError extends Error {
  readonly method: string;

  constructor(method: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "BridgeError";
    this.method = method;
  }
}

/**
 * The office process answered and reported a failure (unknown sheet, invalid
 * address, file not found, permission denied, ...). `message` is the office's
 * own text.
 */
export class BridgeCallError extends BridgeError {
  readonly type: string | null;

  constructor(method: string, message: string, type: string | null = null) {
    super(method, message);
    this.name = "BridgeCallError";
    this.type = type;
  }
}

/**
 * The office process could not be reached (crashed, not started, timed out).
 */
export class BridgeUnavailableError extends BridgeError {
  constructor(method: string, message: string, options?: { cause?: unknown }) {
    super(method, message, options);
    this.name = "BridgeUnavailableError";
  }
}

export function isBridgeUnavailable(error: unknown): error is BridgeUnavailableError {
  return error instanceof BridgeUnavailableError;
}
