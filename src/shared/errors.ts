import { getLogger } from "./logging.js";
import type { OperationKind } from "../session/types.js";

/** CLI exit codes. */
export const EXIT = {
  SUCCESS: 0,
  GENERIC_ERROR: 1,
  INVALID_ARGS: 2,
  SERVER_FAILURE: 3,
  SESSION_FAILURE: 4,
} as const;

export function exit(code: number, message?: string): never {
  if (message) {
    if (code === EXIT.SUCCESS) getLogger().info(message);
    else getLogger().error(message);
  }
  process.exit(code);
}

export type MatchlinkErrorCode =
  | "OPERATION_IN_PROGRESS"
  | "NOT_IMPLEMENTED"
  | "INVALID_ARGUMENT";

/** Base for errors raised by the session layer. `code` is stable across releases. */
export class MatchlinkError extends Error {
  constructor(
    message: string,
    readonly code: MatchlinkErrorCode
  ) {
    super(message);
    this.name = "MatchlinkError";
  }
}

/** An operation of the same kind is still waiting for its completion. */
export class OperationInProgressError extends MatchlinkError {
  constructor(readonly operation: OperationKind) {
    super(`A ${operation} operation is already in progress`, "OPERATION_IN_PROGRESS");
    this.name = "OperationInProgressError";
  }
}

/** The backend does not implement this operation. */
export class NotImplementedError extends MatchlinkError {
  constructor(
    readonly operation: OperationKind,
    readonly backendIdentity: string
  ) {
    super(`${operation} is not supported by the ${backendIdentity} backend`, "NOT_IMPLEMENTED");
    this.name = "NotImplementedError";
  }
}

export class InvalidSessionArgumentError extends MatchlinkError {
  constructor(message: string) {
    super(message, "INVALID_ARGUMENT");
    this.name = "InvalidSessionArgumentError";
  }
}
