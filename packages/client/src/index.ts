// Proxy
export { ServiceProxy, isReservedName } from "./proxy.js";
export type { ServiceProxyOptions } from "./proxy.js";

// Errors
export {
  JsonRpcError,
  JsonRpcTimeoutError,
  ReservedNameError,
} from "./errors.js";

// Codec
export { decodeJson, encodeJson, formatDecimal } from "./json.js";
export {
  buildBatch,
  buildRequest,
  decodeResponse,
  extractBatchResults,
  extractResult,
} from "./codec.js";

// Transport
export { parseEndpoint, basicAuthHeader } from "./endpoint.js";
export { IdCounter, defaultIdCounter } from "./counter.js";
export { withConnection, withTimeout, postJson } from "./transport.js";

// Config & logging
export {
  getServiceUrl,
  getTimeoutMs,
  getRequestProtocol,
  isVerboseLogging,
} from "./config.js";
export { createConsoleLogger, silentLogger } from "./logger.js";

export * from "./constants.js";
export type * from "./types.js";

export { Decimal } from "decimal.js";
