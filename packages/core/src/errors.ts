/**
 * Error codes and the error class for tickboard runtime violations.
 */

/**
 * Deterministic error codes for fatal and contract-violation conditions.
 * These are surfaced as TickboardError instances.
 */
export type TickboardErrorCode =
  | "TICKBOARD_CHANNEL_CLOSED"
  | "TICKBOARD_DRAW_FAILED"
  | "TICKBOARD_INVALID_STATE"
  | "TICKBOARD_TERMINAL_ERROR";

export type TickboardErrorOptions = Readonly<{
  cause?: unknown;
}>;

/**
 * Error class for all deterministic runtime violations.
 * The `code` property identifies the specific violation.
 */
export class TickboardError extends Error {
  override readonly name = "TickboardError";
  readonly code: TickboardErrorCode;

  constructor(code: TickboardErrorCode, message?: string, opts?: TickboardErrorOptions) {
    super(message ?? code, opts?.cause === undefined ? undefined : { cause: opts.cause });
    this.code = code;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TickboardError);
    }
  }
}

export function isTickboardError(
  value: unknown,
  code?: TickboardErrorCode,
): value is TickboardError {
  if (!(value instanceof TickboardError)) return false;
  return code === undefined || value.code === code;
}

/** Render any thrown value as `<name>: <message>` for stderr and trace lines. */
export function describeError(error: unknown): string {
  if (error instanceof Error) return `${error.name}: ${error.message}`;
  if (typeof error === "string") return error;
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}
