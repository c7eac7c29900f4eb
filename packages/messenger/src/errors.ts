export type MessagingErrorReason =
  | "INVALID_MESSAGE"
  | "PUBLISH_FAILED"
  | "FETCH_FAILED"
  | "MALFORMED_RECORD"
  | "REPLAY_SUSPECTED";

/**
 * The single error type raised by a messenger session.
 *
 * `reason` is diagnostic only: every failure is terminal for the call that
 * raised it, and the caller decides whether to try again.
 */
export class MessagingError extends Error {
  readonly reason: MessagingErrorReason;
  readonly context?: Record<string, unknown>;

  constructor(
    reason: MessagingErrorReason,
    message: string,
    options: { cause?: unknown; context?: Record<string, unknown> } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = "MessagingError";
    this.reason = reason;
    this.context = options.context;
  }

  /** Wrap an arbitrary thrown value, keeping it as `cause`. */
  static wrap(reason: MessagingErrorReason, err: unknown, context?: Record<string, unknown>): MessagingError {
    const message = err instanceof Error ? err.message : String(err);
    return new MessagingError(reason, message, { cause: err, context });
  }
}
