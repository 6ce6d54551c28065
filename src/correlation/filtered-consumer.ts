import { Logger } from "@aws-lambda-powertools/logger";

import { ChannelMessage, MessageChannel } from "../channel/message-channel";
import { describeError } from "../errors/bridge.error";

export type ConsumeOutcome<T> =
  | { kind: "empty" }
  | { kind: "poison"; messageId: string }
  | { kind: "released"; messageId: string; value: T }
  | { kind: "consumed"; messageId: string; value: T; receivedAtMs: number };

export interface ReadPolicy {
  waitTimeSeconds: number;
  visibilityTimeoutSeconds: number;
}

/**
 * Read-one-and-inspect over a shared queue. A message is deleted only when it
 * matches or cannot be parsed; anything else has its lease released at once.
 */
export class FilteredConsumer<T> {
  constructor(
    private readonly channel: MessageChannel,
    private readonly parse: (body: string) => T | null,
    private readonly policy: ReadPolicy,
    private readonly log: Logger
  ) {}

  async next(
    match: (value: T) => boolean,
    abortSignal?: AbortSignal
  ): Promise<ConsumeOutcome<T>> {
    const messages = await this.channel.receive({
      maxMessages: 1,
      waitTimeSeconds: this.policy.waitTimeSeconds,
      visibilityTimeoutSeconds: this.policy.visibilityTimeoutSeconds,
      abortSignal,
    });

    const message = messages.at(0);
    if (!message) return { kind: "empty" };

    const receivedAtMs = Date.now();
    const value = this.parse(message.body);

    if (value === null) {
      await this.settle("delete", message);
      return { kind: "poison", messageId: message.messageId };
    }

    if (match(value)) {
      await this.settle("delete", message);
      return {
        kind: "consumed",
        messageId: message.messageId,
        value,
        receivedAtMs,
      };
    }

    await this.settle("release", message);
    return { kind: "released", messageId: message.messageId, value };
  }

  // Failures are logged only; the lease then runs out on its own.
  private async settle(
    action: "delete" | "release",
    message: ChannelMessage
  ): Promise<void> {
    try {
      if (action === "delete") {
        await this.channel.delete(message.receiptHandle);
      } else {
        await this.channel.release(message.receiptHandle);
      }
    } catch (err) {
      this.log.warn(`consumer.${action}.failed`, {
        queue: this.channel.queueName,
        messageId: message.messageId,
        err: describeError(err),
      });
    }
  }
}
