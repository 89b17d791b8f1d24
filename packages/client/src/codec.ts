import { ERROR_CODES } from "./constants.js";
import {
  JsonRpcError,
  missingResponseError,
  missingResultError,
} from "./errors.js";
import { decodeJson, encodeJson } from "./json.js";
import type {
  BatchCall,
  BatchRequestEntry,
  HttpResponse,
  RequestProtocol,
  RpcLogger,
  SingleRequest,
} from "./types.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Build the envelope for a single call
 */
export function buildRequest(
  protocol: RequestProtocol,
  method: string,
  params: unknown[],
  id: number,
): SingleRequest {
  if (protocol === "2.0") {
    return { jsonrpc: "2.0", method, params, id };
  }
  return { version: "1.1", method, params, id };
}

/**
 * Build the batch body, drawing one id per call in order
 */
export function buildBatch(
  calls: ReadonlyArray<BatchCall>,
  nextId: () => number,
): BatchRequestEntry[] {
  return calls.map(([method, ...params]): BatchRequestEntry => ({
    jsonrpc: "2.0",
    method,
    params,
    id: nextId(),
  }));
}

function parseBody(body: string | undefined): unknown {
  if (body === undefined) return undefined;
  try {
    return decodeJson(body);
  } catch {
    return undefined;
  }
}

/**
 * Decode an HTTP response body.
 *
 * An unparseable or empty body fails with -342 "missing HTTP response";
 * a content type other than exactly `application/json` fails with -342
 * even when the body parsed.
 */
export function decodeResponse(response: HttpResponse, logger: RpcLogger): unknown {
  const decoded = parseBody(response.body);
  if (decoded === undefined || decoded === null) {
    throw missingResponseError();
  }

  if (response.contentType !== "application/json") {
    throw new JsonRpcError(
      ERROR_CODES.TRANSPORT,
      `non-JSON HTTP response with '${response.status} ${response.reason}' from server`,
    );
  }

  if (isRecord(decoded) && decoded.error === null && "result" in decoded) {
    logger.debug(`<-${String(decoded.id)}- ${encodeJson(decoded.result)}`);
  } else {
    logger.debug(`<-- ${response.status} ${response.reason}`);
  }

  return decoded;
}

/**
 * Pull the result out of a decoded single-call response
 */
export function extractResult(response: unknown): unknown {
  if (!isRecord(response)) {
    throw missingResultError();
  }

  if (response.error !== undefined && response.error !== null) {
    throw JsonRpcError.from(response.error);
  }

  if (!("result" in response)) {
    throw missingResultError();
  }

  return response.result;
}

/**
 * Pull the results out of a decoded batch response, in the order the
 * server sent them. The first entry carrying an error fails the batch.
 */
export function extractBatchResults(response: unknown): unknown[] {
  if (!Array.isArray(response)) {
    // The server rejected the batch as a whole
    if (isRecord(response) && response.error !== undefined && response.error !== null) {
      throw JsonRpcError.from(response.error);
    }
    throw new JsonRpcError(ERROR_CODES.PARSE_ERROR, "Parse error");
  }

  const results: unknown[] = [];
  for (const entry of response) {
    results.push(extractResult(entry));
  }
  return results;
}
