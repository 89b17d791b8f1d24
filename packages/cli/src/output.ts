import { JsonRpcError, encodeJson } from "@authproxy/client";
import { USAGE, UsageError } from "./args.js";

/**
 * Strings print raw; everything else as indented JSON with exact decimals
 */
export function formatResult(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  return encodeJson(value, 2);
}

export function formatError(error: unknown): string {
  if (error instanceof JsonRpcError) {
    return `error: ${error.toString()}`;
  }
  if (error instanceof UsageError) {
    return `error: ${error.message}\n\n${USAGE}`;
  }
  if (error instanceof Error) {
    return `error: ${error.message}`;
  }
  return `error: ${String(error)}`;
}
