import { isVerboseLogging } from "./config.js";
import type { RpcLogger } from "./types.js";

/**
 * Console logger for trace events, tagged `[RPC]`.
 * Writes nothing unless verbose logging is on.
 */
export function createConsoleLogger(verbose = isVerboseLogging()): RpcLogger {
  return {
    debug(message: string): void {
      if (verbose) {
        console.debug(`[RPC] ${message}`);
      }
    },
  };
}

export const silentLogger: RpcLogger = {
  debug(): void {},
};
