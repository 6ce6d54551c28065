import {
  ChangeMessageVisibilityCommand,
  DeleteMessageCommand,
  Message,
  ReceiveMessageCommand,
  SendMessageCommand,
  SQSClient,
} from "@aws-sdk/client-sqs";

import {
  ChannelMessage,
  MessageChannel,
  ReceiveOptions,
  SendOptions,
  clampDelaySeconds,
} from "./message-channel";
import { parseIntOrZero } from "../util/parse";
import { queueNameFromUrl } from "./queue-names";

export type SqsSender = Pick<SQSClient, "send">;

export class SqsChannel implements MessageChannel {
  readonly queueName: string;

  constructor(
    private readonly client: SqsSender,
    private readonly queueUrl: string
  ) {
    this.queueName = queueNameFromUrl(queueUrl);
  }

  async send(body: string, options: SendOptions = {}): Promise<string> {
    const res = await this.client.send(
      new SendMessageCommand({
        QueueUrl: this.queueUrl,
        MessageBody: body,
        DelaySeconds: clampDelaySeconds(options.delaySeconds),
      }),
      { abortSignal: options.abortSignal }
    );
    return res.MessageId ?? "";
  }

  async receive(options: ReceiveOptions): Promise<ChannelMessage[]> {
    const res = await this.client.send(
      new ReceiveMessageCommand({
        QueueUrl: this.queueUrl,
        MaxNumberOfMessages: options.maxMessages,
        WaitTimeSeconds: options.waitTimeSeconds,
        VisibilityTimeout: options.visibilityTimeoutSeconds,
        MessageSystemAttributeNames: [
          "SentTimestamp",
          "ApproximateFirstReceiveTimestamp",
          "ApproximateReceiveCount",
        ],
      }),
      { abortSignal: options.abortSignal }
    );

    return (res.Messages ?? []).flatMap((message) => {
      const mapped = toChannelMessage(message);
      return mapped ? [mapped] : [];
    });
  }

  async delete(receiptHandle: string): Promise<void> {
    await this.client.send(
      new DeleteMessageCommand({
        QueueUrl: this.queueUrl,
        ReceiptHandle: receiptHandle,
      })
    );
  }

  async release(receiptHandle: string): Promise<void> {
    await this.client.send(
      new ChangeMessageVisibilityCommand({
        QueueUrl: this.queueUrl,
        ReceiptHandle: receiptHandle,
        VisibilityTimeout: 0,
      })
    );
  }
}

// A message without a receipt handle can be neither deleted nor released.
function toChannelMessage(message: Message): ChannelMessage | null {
  if (!message.ReceiptHandle) return null;
  const attributes = message.Attributes;
  return {
    messageId: message.MessageId ?? "",
    receiptHandle: message.ReceiptHandle,
    body: message.Body ?? "",
    attributes: {
      sentTimestampMs: parseIntOrZero(attributes?.SentTimestamp),
      firstReceiveTimestampMs: parseIntOrZero(
        attributes?.ApproximateFirstReceiveTimestamp
      ),
      receiveCount: parseIntOrZero(attributes?.ApproximateReceiveCount),
    },
  };
}
