/**
 * Deterministic error codes raised by flowpair packages.
 */
export type FlowErrorCode =
  | "FLOW_INVALID_ARGUMENT"
  | "FLOW_INVALID_CONFIG"
  | "FLOW_INVALID_STATE"
  | "FLOW_SURFACE_ERROR";

/**
 * Error class for contract violations and surface failures.
 * The `code` property identifies the specific violation.
 */
export class FlowError extends Error {
  override readonly name = "FlowError";
  readonly code: FlowErrorCode;

  constructor(code: FlowErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, FlowError);
    }
  }
}

export function isFlowError(value: unknown, code?: FlowErrorCode): value is FlowError {
  if (!(value instanceof FlowError)) return false;
  return code === undefined || value.code === code;
}
