import { setTimeout as sleep } from "node:timers/promises";
import { Logger } from "@aws-lambda-powertools/logger";

import { MessageChannel } from "../channel/message-channel";
import { BridgeError, describeError } from "../errors/bridge.error";
import {
  ResponseEnvelope,
  parseResponseEnvelope,
} from "../types/response-envelope";
import {
  ConsumeOutcome,
  FilteredConsumer,
  ReadPolicy,
} from "./filtered-consumer";

export interface CorrelationIdentity {
  id: string;
  runId: string;
}

export interface PollPolicy extends ReadPolicy {
  mismatchBackoffMs: number;
}

export interface PollResult {
  response: ResponseEnvelope;
  receiveMessageMs: number;
  pollEndMs: number;
}

export function matchesIdentity(
  response: ResponseEnvelope,
  identity: CorrelationIdentity
): boolean {
  return response.id === identity.id && response.runId === identity.runId;
}

/**
 * Polls the shared receive queue until the callback for one identity shows
 * up or the signal aborts. Callbacks of other callers are released, poison
 * messages deleted; neither ends the loop.
 */
export class CorrelationPoller {
  private readonly consumer: FilteredConsumer<ResponseEnvelope>;

  constructor(
    channel: MessageChannel,
    private readonly policy: PollPolicy,
    private readonly log: Logger
  ) {
    this.consumer = new FilteredConsumer(
      channel,
      parseResponseEnvelope,
      policy,
      log
    );
  }

  async waitFor(
    identity: CorrelationIdentity,
    signal: AbortSignal
  ): Promise<PollResult> {
    const isMine = (response: ResponseEnvelope) =>
      matchesIdentity(response, identity);
    let reads = 0;

    for (;;) {
      if (signal.aborted) throw this.timeout(identity, signal, reads);

      let outcome: ConsumeOutcome<ResponseEnvelope>;
      try {
        outcome = await this.consumer.next(isMine, signal);
      } catch (err) {
        if (signal.aborted) throw this.timeout(identity, signal, reads);
        throw new BridgeError(
          "ChannelReadFailure",
          `receive message: ${describeError(err)}`,
          { cause: err }
        );
      }
      reads += 1;

      switch (outcome.kind) {
        case "empty":
          // long polling already paces the loop unless it is switched off
          if (this.policy.waitTimeSeconds === 0) await this.backoff(signal);
          break;
        case "poison":
          this.log.warn("poll.poison.deleted", {
            id: identity.id,
            messageId: outcome.messageId,
          });
          break;
        case "released":
          this.log.debug("poll.mismatch.released", {
            id: identity.id,
            messageId: outcome.messageId,
            otherId: outcome.value.id,
          });
          await this.backoff(signal);
          break;
        case "consumed":
          return {
            response: outcome.value,
            receiveMessageMs: outcome.receivedAtMs,
            pollEndMs: Date.now(),
          };
      }
    }
  }

  private async backoff(signal: AbortSignal): Promise<void> {
    try {
      await sleep(this.policy.mismatchBackoffMs, undefined, { signal });
    } catch (err) {
      if (!signal.aborted) throw err;
    }
  }

  private timeout(
    identity: CorrelationIdentity,
    signal: AbortSignal,
    reads: number
  ): BridgeError {
    this.log.info("poll.timeout", {
      id: identity.id,
      runId: identity.runId,
      reads,
    });
    return new BridgeError(
      "Timeout",
      `no callback for id=${identity.id} before deadline`,
      { cause: signal.reason }
    );
  }
}
