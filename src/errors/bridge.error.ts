export type BridgeErrorKind =
  | "ConfigurationMissing"
  | "InvalidInput"
  | "DeadlineTooClose"
  | "PublishFailure"
  | "ChannelReadFailure"
  | "Timeout";

/**
 * Typed failure surfaced by the dispatcher and the worker.
 * Malformed responses never become a BridgeError: the poll loop absorbs them.
 */
export class BridgeError extends Error {
  readonly kind: BridgeErrorKind;

  constructor(
    kind: BridgeErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "BridgeError";
    this.kind = kind;
  }

  /** The outcome is unknown, not a known failure. */
  get isTimeout(): boolean {
    return this.kind === "Timeout" || this.kind === "DeadlineTooClose";
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function asBridgeError(
  err: unknown,
  fallback: BridgeErrorKind
): BridgeError {
  if (err instanceof BridgeError) return err;
  return new BridgeError(fallback, describeError(err), { cause: err });
}
