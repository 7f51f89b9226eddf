/**
 * Error taxonomy shared by the router, the stores and the command handlers.
 */

export type BridgeErrorCode =
  | "UnboundChannel"
  | "InvalidBranchName"
  | "InvalidContext"
  | "UnknownProject"
  | "StaleSession"
  | "NothingToCancel"
  | "AgentFailure"
  | "PersistenceFailure";

export class BridgeError extends Error {
  readonly code: BridgeErrorCode;

  constructor(code: BridgeErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "BridgeError";
    this.code = code;
  }
}

export function isBridgeError(err: unknown, code?: BridgeErrorCode): err is BridgeError {
  if (!(err instanceof BridgeError)) return false;
  return code === undefined || err.code === code;
}

/** Normalize anything thrown into an Error. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
