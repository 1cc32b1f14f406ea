export type AuthErrorReason = "RefreshDenied" | "NotAuthenticated";

/**
 * The session can no longer be used; a fresh authorization is required.
 */
export class AuthError extends Error {
  readonly reason: AuthErrorReason;

  constructor(reason: AuthErrorReason, message?: string) {
    super(message ?? `Authentication failed: ${reason}`);
    this.name = "AuthError";
    this.reason = reason;
  }
}

export type ApiErrorKind =
  | "RateLimited"
  | "Unavailable"
  | "Unauthorized"
  | "Ambiguous"
  | "NoActiveDevice"
  | "Rejected";

export class ApiError extends Error {
  readonly kind: ApiErrorKind;
  readonly status?: number;
  readonly retryAfterMs?: number;

  constructor(
    kind: ApiErrorKind,
    message: string,
    options?: { status?: number; retryAfterMs?: number; cause?: unknown },
  ) {
    super(message, { cause: options?.cause });
    this.name = "ApiError";
    this.kind = kind;
    this.status = options?.status;
    this.retryAfterMs = options?.retryAfterMs;
  }
}

/** A command was acknowledged but its effect never showed up in a snapshot. */
export class ReconciliationTimeout extends Error {
  readonly commandKind: string;

  constructor(commandKind: string, deadlineMs: number) {
    super(`${commandKind} not observed within ${deadlineMs}ms`);
    this.name = "ReconciliationTimeout";
    this.commandKind = commandKind;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
