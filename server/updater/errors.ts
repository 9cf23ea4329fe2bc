export type UpdaterErrorCode = "unknown_service" | "missing_dependency" | "invalid_config" | "updater_busy";

export type RegistryLookupErrorKind = "network" | "parse";

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error && error.message.trim().length > 0) {
    return error.message.trim();
  }
  return String(error);
}

/**
 * Precondition failures. These are the only errors allowed to abort a whole
 * invocation; everything else is folded into a per-service outcome.
 */
export class UpdaterError extends Error {
  readonly code: UpdaterErrorCode;

  constructor(code: UpdaterErrorCode, message: string) {
    super(message);
    this.name = "UpdaterError";
    this.code = code;
  }
}

export class RegistryLookupError extends Error {
  readonly kind: RegistryLookupErrorKind;

  constructor(kind: RegistryLookupErrorKind, message: string) {
    super(message);
    this.name = "RegistryLookupError";
    this.kind = kind;
  }
}

export class ContainerCommandError extends Error {
  readonly command: string;

  constructor(command: string, reason: string) {
    super(`${command} failed: ${reason}`);
    this.name = "ContainerCommandError";
    this.command = command;
  }
}

export function isUpdaterError(error: unknown): error is UpdaterError {
  return error instanceof UpdaterError;
}
