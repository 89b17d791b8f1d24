import {
  DEFAULT_TIMEOUT_MS,
  MAX_TIMEOUT_MS,
  REQUEST_PROTOCOLS,
} from "./constants.js";
import type { RequestProtocol } from "./types.js";

// All readers are lazy so env vars set after module load are respected (e.g. in tests)

/**
 * Service URL from RPC_URL, if set
 */
export function getServiceUrl(): string | undefined {
  return process.env.RPC_URL || undefined;
}

/**
 * A timeout setTimeout can honour: finite, positive, at most MAX_TIMEOUT_MS
 */
export function isValidTimeout(timeoutMs: number): boolean {
  return Number.isFinite(timeoutMs) && timeoutMs > 0 && timeoutMs <= MAX_TIMEOUT_MS;
}

/**
 * Request timeout from RPC_TIMEOUT_MS, falling back to 30 seconds
 */
export function getTimeoutMs(): number {
  const envValue = process.env.RPC_TIMEOUT_MS;
  if (!envValue) return DEFAULT_TIMEOUT_MS;

  const parsed = Number(envValue);
  if (!isValidTimeout(parsed)) {
    console.warn(
      `[Config] Invalid RPC_TIMEOUT_MS value "${envValue}", using default (${DEFAULT_TIMEOUT_MS}ms)`,
    );
    return DEFAULT_TIMEOUT_MS;
  }

  return parsed;
}

function isRequestProtocol(value: string): value is RequestProtocol {
  return REQUEST_PROTOCOLS.some((protocol) => protocol === value);
}

/**
 * Protocol tag for single calls from RPC_PROTOCOL ("1.1" unless set to "2.0")
 */
export function getRequestProtocol(): RequestProtocol {
  const envValue = process.env.RPC_PROTOCOL;
  if (!envValue) return "1.1";

  if (!isRequestProtocol(envValue)) {
    console.warn(
      `[Config] Invalid RPC_PROTOCOL value "${envValue}", using default (1.1)`,
    );
    return "1.1";
  }

  return envValue;
}

export function isVerboseLogging(): boolean {
  return process.env.VERBOSE_LOGS === "true";
}
