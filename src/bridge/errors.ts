/**
 * errors.ts — Failures reported by the CAD host
 */

export const BRIDGE_ERROR_CODES = [
  "unavailable",
  "no_document",
  "unsupported_document",
  "not_found",
  "read_only",
  "host_error",
] as const;

export type BridgeErrorCode = (typeof BRIDGE_ERROR_CODES)[number];

export class BridgeError extends Error {
  readonly code: BridgeErrorCode;

  constructor(code: BridgeErrorCode, message: string) {
    super(message);
    this.name = "BridgeError";
    this.code = code;
  }
}

export function isBridgeError(err: unknown): err is BridgeError {
  return err instanceof BridgeError;
}
