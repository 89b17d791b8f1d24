import type { Decimal } from "decimal.js";
import type { Dispatcher } from "undici";
import type { REQUEST_PROTOCOLS } from "./constants.js";

/**
 * A JSON value as produced by the decimal-preserving parser.
 * Fractional and exponent literals become Decimal; integers too large
 * for a double become bigint.
 */
export type JsonValue =
  | null
  | boolean
  | string
  | number
  | bigint
  | Decimal
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Protocol tag written on single-call envelopes
 */
export type RequestProtocol = (typeof REQUEST_PROTOCOLS)[number];

/**
 * Immutable descriptor of the remote service, parsed once from its URL
 */
export interface Endpoint {
  readonly url: string;
  readonly protocol: string;
  readonly hostname: string;
  readonly port: number;
  readonly origin: string;
  /** Path and query sent on the request line */
  readonly path: string;
  readonly username: string;
  readonly password: string;
  /** Pre-computed `Basic <base64(user:password)>` header value */
  readonly authHeader: string;
}

/**
 * Error object as carried in a JSON-RPC response
 */
export interface RpcErrorObject {
  code: number;
  message: string;
}

export interface SingleRequestV1 {
  version: "1.1";
  method: string;
  params: unknown[];
  id: number;
}

export interface SingleRequestV2 {
  jsonrpc: "2.0";
  method: string;
  params: unknown[];
  id: number;
}

export type SingleRequest = SingleRequestV1 | SingleRequestV2;

/**
 * One entry of a batch request body
 */
export type BatchRequestEntry = SingleRequestV2;

/**
 * One call in a batch: the method name followed by its positional params
 */
export type BatchCall = readonly [method: string, ...params: unknown[]];

/**
 * The part of an HTTP connection the proxy relies on.
 * Any undici Dispatcher (Agent, Pool, Client, MockAgent) satisfies it.
 */
export interface RpcConnection {
  request(options: Dispatcher.RequestOptions): Promise<Dispatcher.ResponseData>;
  close(): Promise<void>;
}

/**
 * Who owns the connection a proxy sends through.
 *
 * - `shared`: supplied by the caller, never closed by the proxy
 * - `owned`: created per call by the proxy and closed once the response is decoded
 */
export type ConnectionOwnership =
  | { readonly kind: "shared"; readonly connection: RpcConnection }
  | { readonly kind: "owned"; readonly create: () => RpcConnection };

/**
 * HTTP response reduced to what the decoder looks at
 */
export interface HttpResponse {
  status: number;
  reason: string;
  contentType: string | undefined;
  /** Undefined when the body could not be read */
  body: string | undefined;
}

/**
 * Sink for request/response trace events
 */
export interface RpcLogger {
  debug(message: string): void;
}
