import { inject, injectable } from "inversify";
import { Logger } from "@aws-lambda-powertools/logger";

import { TYPES } from "../app/tokens";
import { DispatcherConfig } from "../config/bridge.config";
import { MessageChannel, clampDelaySeconds } from "../channel/message-channel";
import { newCorrelationId } from "../correlation/correlation-id";
import {
  CorrelationPoller,
  PollResult,
} from "../correlation/correlation.poller";
import { effectiveWaitMs, startDeadline } from "../correlation/deadline";
import {
  BridgeError,
  asBridgeError,
  describeError,
} from "../errors/bridge.error";
import { DispatchOutput } from "../types/dispatch-output";
import {
  MAX_PADDING_BYTES,
  RequestEnvelope,
} from "../types/request-envelope";

export interface DispatchRequest {
  runId?: string;
  delaySeconds?: number;
  /** Size of the `x` padding carried by the request, 0..MAX_PADDING_BYTES */
  messageBodyBytes?: number;
  maxWaitMs?: number;
}

export interface InvocationBudget {
  /** Time the surrounding invocation has left, when it reports one */
  remainingMs?: number;
}

export type DispatchOutcome =
  | { status: "OK"; totalMs: number; output: DispatchOutput }
  | { status: "TIMEOUT" | "ERROR"; totalMs: number; error: BridgeError };

@injectable()
export class DispatcherService {
  private readonly poller: CorrelationPoller;

  constructor(
    @inject(TYPES.DispatcherConfig) private readonly config: DispatcherConfig,
    @inject(TYPES.PushChannel) private readonly push: MessageChannel,
    @inject(TYPES.ReceiveChannel) receive: MessageChannel,
    @inject(Logger) private readonly log: Logger
  ) {
    this.poller = new CorrelationPoller(
      receive,
      {
        waitTimeSeconds: config.pollWaitSeconds,
        visibilityTimeoutSeconds: config.pollVisibilityTimeoutSeconds,
        mismatchBackoffMs: config.mismatchBackoffMs,
      },
      log
    );
  }

  /**
   * Publishes one request and waits for its callback. Never throws: every
   * failure comes back as a TIMEOUT or ERROR outcome.
   */
  async dispatch(
    request: DispatchRequest,
    budget: InvocationBudget = {}
  ): Promise<DispatchOutcome> {
    const dispatchStartMs = Date.now();
    const runId = request.runId?.trim() || `run-${dispatchStartMs}`;
    const delaySeconds = clampDelaySeconds(request.delaySeconds);
    const padding = "x".repeat(clampPaddingBytes(request.messageBodyBytes));

    const waitMs = effectiveWaitMs(request.maxWaitMs, budget.remainingMs);
    if (waitMs <= 0) {
      return this.fail(
        new BridgeError("DeadlineTooClose", "deadline too close"),
        dispatchStartMs,
        runId
      );
    }

    const id = newCorrelationId();
    const deadline = startDeadline(waitMs);

    try {
      const sendStartMs = Date.now();
      const envelope: RequestEnvelope = {
        id,
        runId,
        issuedAtMs: dispatchStartMs,
        sendStartMs,
        ...(padding ? { padding } : {}),
      };
      const body = JSON.stringify(envelope);

      try {
        await this.push.send(body, {
          delaySeconds,
          abortSignal: deadline.signal,
        });
      } catch (err) {
        return this.fail(
          publishError(err, deadline.signal),
          dispatchStartMs,
          runId,
          id
        );
      }
      const sendEndMs = Date.now();

      this.log.info("dispatch.publish.ok", {
        id,
        runId,
        queue: this.push.queueName,
        delaySeconds,
        waitMs,
      });

      const pollStartMs = Date.now();
      let polled: PollResult;
      try {
        polled = await this.poller.waitFor({ id, runId }, deadline.signal);
      } catch (err) {
        return this.fail(
          asBridgeError(err, "ChannelReadFailure"),
          dispatchStartMs,
          runId,
          id
        );
      }

      const output: DispatchOutput = {
        ...polled.response,
        id,
        runId,
        region: this.config.region,
        pushQueueName: this.config.pushQueueName,
        receiveQueueName: this.config.receiveQueueName,
        dispatchStartMs,
        sendStartMs,
        sendEndMs,
        pollStartMs,
        pollEndMs: polled.pollEndMs,
        receiveMessageMs: polled.receiveMessageMs,
      };

      const totalMs = Date.now() - dispatchStartMs;
      this.log.info("dispatch.complete", { id, runId, totalMs });
      return { status: "OK", totalMs, output };
    } finally {
      deadline.clear();
    }
  }

  private fail(
    error: BridgeError,
    dispatchStartMs: number,
    runId: string,
    id?: string
  ): DispatchOutcome {
    const totalMs = Date.now() - dispatchStartMs;
    const status = error.isTimeout ? "TIMEOUT" : "ERROR";
    this.log.warn("dispatch.failed", {
      id,
      runId,
      kind: error.kind,
      totalMs,
      err: error.message,
    });
    return { status, totalMs, error };
  }
}

export function clampPaddingBytes(messageBodyBytes?: number): number {
  if (!messageBodyBytes || !Number.isFinite(messageBodyBytes)) return 0;
  const bytes = Math.trunc(messageBodyBytes);
  return Math.min(Math.max(bytes, 0), MAX_PADDING_BYTES);
}

// A publish cut off by the deadline is a timeout.
function publishError(err: unknown, signal: AbortSignal): BridgeError {
  const detail = describeError(err);
  return signal.aborted
    ? new BridgeError("Timeout", `send message aborted: ${detail}`, {
        cause: err,
      })
    : new BridgeError("PublishFailure", `send message: ${detail}`, {
        cause: err,
      });
}
