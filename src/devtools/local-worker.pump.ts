import { Logger } from "@aws-lambda-powertools/logger";
import { SQSRecord } from "aws-lambda";

import { ChannelMessage, MessageChannel } from "../channel/message-channel";
import { describeError } from "../errors/bridge.error";
import { WorkerService } from "../services/worker.service";

/**
 * Stands in for the SQS → Lambda event source mapping: drains the push
 * channel into WorkerService.processRecord and acknowledges a delivery only
 * after its callback went out. Failed deliveries stay leased and reappear
 * once the visibility timeout runs out.
 */
export class LocalWorkerPump {
  private readonly controller = new AbortController();
  private running?: Promise<void>;

  constructor(
    private readonly push: MessageChannel,
    private readonly worker: WorkerService,
    private readonly log: Logger,
    private readonly visibilityTimeoutSeconds = 30,
    private readonly region = "local"
  ) {}

  start(): void {
    if (this.running) return;
    this.running = this.loop(this.controller.signal).catch((err) => {
      this.log.error("pump.loop.failed", { err: describeError(err) });
    });
  }

  async stop(): Promise<void> {
    this.controller.abort();
    await this.running;
  }

  /** Processes what is visible now; resolves to the number acknowledged. */
  async drainOnce(): Promise<number> {
    const messages = await this.push.receive({
      maxMessages: 10,
      waitTimeSeconds: 0,
      visibilityTimeoutSeconds: this.visibilityTimeoutSeconds,
    });
    let acked = 0;
    for (const message of messages) {
      if (await this.deliver(message)) acked += 1;
    }
    return acked;
  }

  private async loop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let messages: ChannelMessage[];
      try {
        messages = await this.push.receive({
          maxMessages: 10,
          waitTimeSeconds: 20,
          visibilityTimeoutSeconds: this.visibilityTimeoutSeconds,
          abortSignal: signal,
        });
      } catch (err) {
        if (signal.aborted) return;
        throw err;
      }
      for (const message of messages) {
        await this.deliver(message);
      }
    }
  }

  private async deliver(message: ChannelMessage): Promise<boolean> {
    try {
      await this.worker.processRecord(this.toRecord(message));
      await this.push.delete(message.receiptHandle);
      return true;
    } catch (err) {
      this.log.warn("pump.record.failed", {
        messageId: message.messageId,
        err: describeError(err),
      });
      return false;
    }
  }

  private toRecord(message: ChannelMessage): SQSRecord {
    const { attributes } = message;
    return {
      messageId: message.messageId,
      receiptHandle: message.receiptHandle,
      body: message.body,
      attributes: {
        ApproximateReceiveCount: String(attributes.receiveCount),
        SentTimestamp: String(attributes.sentTimestampMs),
        SenderId: "local",
        ApproximateFirstReceiveTimestamp: String(
          attributes.firstReceiveTimestampMs
        ),
      },
      messageAttributes: {},
      md5OfBody: "",
      eventSource: "aws:sqs",
      eventSourceARN: [
        "arn:aws:sqs",
        this.region,
        "000000000000",
        this.push.queueName,
      ].join(":"),
      awsRegion: this.region,
    };
  }
}
