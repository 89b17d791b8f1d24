import { STATUS_CODES } from "http";
import { Agent } from "undici";
import { ERROR_CODES } from "./constants.js";
import { JsonRpcError, JsonRpcTimeoutError } from "./errors.js";
import type {
  ConnectionOwnership,
  Endpoint,
  HttpResponse,
  RpcConnection,
  RpcLogger,
} from "./types.js";

/**
 * Connection factory used when the caller supplies none
 */
export function createDefaultConnection(): RpcConnection {
  return new Agent();
}

/**
 * Resolve the ownership tag for a proxy from its options
 */
export function resolveOwnership(options: {
  connection?: RpcConnection;
  connectionFactory?: () => RpcConnection;
}): ConnectionOwnership {
  if (options.connection) {
    return { kind: "shared", connection: options.connection };
  }
  return {
    kind: "owned",
    create: options.connectionFactory ?? createDefaultConnection,
  };
}

/**
 * Run `fn` with a connection. Shared connections are passed through
 * untouched; owned ones are created for this call and closed afterwards,
 * whatever the outcome.
 *
 * When both the call and the close fail, the call's error is thrown and
 * the close failure is logged.
 */
export async function withConnection<T>(
  ownership: ConnectionOwnership,
  logger: RpcLogger,
  fn: (connection: RpcConnection) => Promise<T>,
): Promise<T> {
  if (ownership.kind === "shared") {
    return fn(ownership.connection);
  }

  const connection = ownership.create();
  let result: T;
  try {
    result = await fn(connection);
  } catch (error) {
    try {
      await connection.close();
    } catch (closeError) {
      const message = closeError instanceof Error ? closeError.message : String(closeError);
      logger.debug(`closing connection failed: ${message}`);
    }
    throw error;
  }

  await connection.close();
  return result;
}

/**
 * Race `fn` against a timer. On expiry the signal handed to `fn` is
 * aborted and the call rejects with JsonRpcTimeoutError.
 */
export async function withTimeout<T>(
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new JsonRpcTimeoutError(timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * POST a JSON body to the endpoint.
 *
 * Only the request phase (until headers arrive) is bounded by the timeout.
 * Connection failures become JsonRpcError -342.
 */
export async function postJson(
  connection: RpcConnection,
  endpoint: Endpoint,
  body: string,
  headers: Record<string, string>,
  timeoutMs: number,
): Promise<HttpResponse> {
  const response = await withTimeout(timeoutMs, async (signal) => {
    try {
      return await connection.request({
        origin: endpoint.origin,
        path: endpoint.path,
        method: "POST",
        headers,
        body,
        signal,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new JsonRpcError(
        ERROR_CODES.TRANSPORT,
        `HTTP request failed: ${message}`,
        { cause: error },
      );
    }
  });

  // Repeated headers arrive as an array and never match a content type
  const contentType = response.headers["content-type"];
  return {
    status: response.statusCode,
    reason: STATUS_CODES[response.statusCode] ?? "",
    contentType: typeof contentType === "string" ? contentType : undefined,
    body: await readBody(response.body),
  };
}

/**
 * Read the body as text; an unreadable body is reported as undefined
 * and classified by the decoder
 */
async function readBody(body: { text(): Promise<string> }): Promise<string | undefined> {
  try {
    return await body.text();
  } catch {
    return undefined;
  }
}
