import { ERROR_CODES } from "./constants.js";

/**
 * The single error kind surfaced by the proxy.
 *
 * Peer errors keep their code and message verbatim; local failures use
 * the codes in ERROR_CODES. Renders as `"<code>: <message>"`.
 */
export class JsonRpcError extends Error {
  readonly code: number;
  /** Raw error object from the peer, when there was one */
  readonly data?: unknown;

  constructor(
    code: number,
    message: string,
    options: { cause?: unknown; data?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "JsonRpcError";
    this.code = code;
    this.data = options.data;
  }

  /**
   * Build from the `error` member of a response
   */
  static from(error: unknown): JsonRpcError {
    if (typeof error !== "object" || error === null) {
      return new JsonRpcError(ERROR_CODES.INTERNAL, String(error), {
        data: error,
      });
    }

    const code = "code" in error ? error.code : undefined;
    const message = "message" in error ? error.message : undefined;
    return new JsonRpcError(
      typeof code === "number" && Number.isInteger(code)
        ? code
        : ERROR_CODES.INTERNAL,
      typeof message === "string" ? message : "",
      { data: error },
    );
  }

  override toString(): string {
    return `${this.code}: ${this.message}`;
  }
}

/**
 * Raised when the request phase outlives the proxy's timeout
 */
export class JsonRpcTimeoutError extends JsonRpcError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(ERROR_CODES.TRANSPORT, `request timed out after ${timeoutMs}ms`);
    this.name = "JsonRpcTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Raised for names that cannot become RPC method names
 */
export class ReservedNameError extends Error {
  constructor(name: string) {
    super(`No such attribute: "${name}" is reserved`);
    this.name = "ReservedNameError";
  }
}

export function missingResultError(): JsonRpcError {
  return new JsonRpcError(ERROR_CODES.MISSING_RESULT, "missing JSON-RPC result");
}

export function missingResponseError(): JsonRpcError {
  return new JsonRpcError(
    ERROR_CODES.TRANSPORT,
    "missing HTTP response from server",
  );
}
