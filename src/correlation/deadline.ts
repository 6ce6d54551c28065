import { BridgeError } from "../errors/bridge.error";

export const DEFAULT_WAIT_MS = 25_000;
// API Gateway gives up at 29s; the dispatcher Lambda itself runs with 30s.
export const MAX_WAIT_MS = 28_000;
export const DEADLINE_SAFETY_MARGIN_MS = 250;

/**
 * Wait budget for one dispatch: the requested wait (default when absent or
 * not positive) capped at MAX_WAIT_MS and, when the invocation reports its
 * remaining time, at that time minus the safety margin. Never negative.
 */
export function effectiveWaitMs(
  requestedMs?: number,
  remainingMs?: number
): number {
  let wait = requestedMs && requestedMs > 0 ? requestedMs : DEFAULT_WAIT_MS;
  wait = Math.min(wait, MAX_WAIT_MS);

  if (remainingMs === undefined) return wait;

  const remaining = remainingMs - DEADLINE_SAFETY_MARGIN_MS;
  if (remaining <= 0) return 0;
  return Math.min(remaining, wait);
}

export interface Deadline {
  readonly signal: AbortSignal;
  clear(): void;
}

/** Aborts its signal with a Timeout BridgeError once `ms` have passed. */
export function startDeadline(ms: number): Deadline {
  const controller = new AbortController();
  const timer = setTimeout(() => {
    controller.abort(
      new BridgeError("Timeout", `deadline of ${ms}ms exceeded`)
    );
  }, ms);

  return {
    signal: controller.signal,
    clear: () => clearTimeout(timer),
  };
}
