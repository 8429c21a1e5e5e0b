export enum ErrorCode {
  EXTERNAL_TOOL = "EXTERNAL_TOOL",
  PERSISTENCE = "PERSISTENCE",
  PEER_UNREACHABLE = "PEER_UNREACHABLE",
  INVALID_STATE = "INVALID_STATE",
  CONFIG_INVALID = "CONFIG_INVALID",
  STOP_FAILED = "STOP_FAILED",
  MIGRATION_HALTED = "MIGRATION_HALTED",
}

export class RoachyardError extends Error {
  readonly code: ErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = "RoachyardError";
    this.code = code;
    this.context = context;
  }
}

export function isRoachyardError(err: unknown, code?: ErrorCode): err is RoachyardError {
  return err instanceof RoachyardError && (code === undefined || err.code === code);
}

/**
 * Best-effort message for anything thrown
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
