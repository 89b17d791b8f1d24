/**
 * Sent as the User-Agent header on every request
 */
export const USER_AGENT = "AuthServiceProxy/0.1";

/** Default request timeout: 30 seconds */
export const DEFAULT_TIMEOUT_MS = 30_000;

/** Largest delay setTimeout honours; Node clamps anything above to 1ms */
export const MAX_TIMEOUT_MS = 2_147_483_647;

/** Port reported for service URLs that do not name one */
export const DEFAULT_PORT = 80;

/** Fractional digits kept when a decimal is written to the wire */
export const DECIMAL_PLACES = 8;

/**
 * Error codes raised locally (remote peers supply their own)
 */
export const ERROR_CODES = {
  /** Transport failure, timeout, empty or non-JSON response */
  TRANSPORT: -342,
  /** Response carried neither a result nor an error */
  MISSING_RESULT: -343,
  /** Peer error object without a usable numeric code */
  INTERNAL: -32603,
  /** Batch rejected outright by the server */
  PARSE_ERROR: -32700,
} as const;

export const REQUEST_PROTOCOLS = ["1.1", "2.0"] as const;
