import { inject, injectable } from "inversify";
import { Logger } from "@aws-lambda-powertools/logger";
import {
  BatchProcessor,
  EventType,
  processPartialResponse,
} from "@aws-lambda-powertools/batch";
import { SQSBatchResponse, SQSEvent, SQSRecord } from "aws-lambda";

import { TYPES } from "../app/tokens";
import { WorkerConfig } from "../config/bridge.config";
import { MessageChannel } from "../channel/message-channel";
import { queueNameFromArn } from "../channel/queue-names";
import { BridgeError, describeError } from "../errors/bridge.error";
import { parseRequestEnvelope } from "../types/request-envelope";
import { ResponseEnvelope } from "../types/response-envelope";
import { parseIntOrZero } from "../util/parse";
import { WorkHandler } from "./work.handler";

@injectable()
export class WorkerService {
  private readonly processor = new BatchProcessor(EventType.SQS);

  constructor(
    @inject(TYPES.WorkerConfig) private readonly config: WorkerConfig,
    @inject(TYPES.ReceiveChannel) private readonly receive: MessageChannel,
    @inject(TYPES.WorkHandler) private readonly work: WorkHandler,
    @inject(Logger) private readonly log: Logger
  ) {}

  /**
   * Processes every record independently. Failed records come back in
   * `batchItemFailures` so SQS redelivers only those; if all of them fail
   * the returned promise rejects.
   */
  async processBatch(event: SQSEvent): Promise<SQSBatchResponse> {
    this.log.info("worker.batch.start", { recordCount: event.Records.length });

    const response = await processPartialResponse(
      event,
      (record: SQSRecord) => this.processRecord(record),
      this.processor
    );

    this.log.info("worker.batch.complete", {
      recordCount: event.Records.length,
      failed: response.batchItemFailures.length,
    });
    return response;
  }

  /**
   * Answers one request on the receive queue. Throws when the request is
   * malformed or the callback cannot be published; the caller then leaves
   * the delivery unacknowledged.
   */
  async processRecord(record: SQSRecord): Promise<ResponseEnvelope> {
    const request = parseRequestEnvelope(record.body);
    if (!request) {
      this.log.error("worker.record.invalid", { messageId: record.messageId });
      throw new BridgeError(
        "InvalidInput",
        `missing id/runId in message body for messageId=${record.messageId}`
      );
    }

    const workerReceiveMs = Date.now();
    await this.work.handle(request);
    const workerDoneMs = Date.now();

    const pushQueueName = queueNameFromArn(record.eventSourceARN);
    const attributes = record.attributes;
    const callbackSendStartMs = Date.now();
    const callback: ResponseEnvelope = {
      id: request.id,
      runId: request.runId,
      region: this.config.region,
      pushQueueName,
      receiveQueueName: this.config.receiveQueueName,
      issuedAtMs: request.issuedAtMs,
      sendStartMs: request.sendStartMs,
      workerReceiveMs,
      workerDoneMs,
      callbackSendStartMs,
      sqsSentTimestampMs: parseIntOrZero(attributes.SentTimestamp),
      sqsFirstReceiveTimestampMs: parseIntOrZero(
        attributes.ApproximateFirstReceiveTimestamp
      ),
      sqsApproxReceiveCount: parseIntOrZero(
        attributes.ApproximateReceiveCount
      ),
    };

    try {
      await this.receive.send(JSON.stringify(callback));
    } catch (err) {
      this.log.error("worker.callback.failed", {
        id: request.id,
        messageId: record.messageId,
        err: describeError(err),
      });
      throw new BridgeError(
        "PublishFailure",
        `send callback message: ${describeError(err)}`,
        { cause: err }
      );
    }
    const callbackSendEndMs = Date.now();

    this.log.info("worker.record.processed", {
      id: request.id,
      runId: request.runId,
      pushQueue: pushQueueName,
      callbackQueue: this.receive.queueName,
      workerReceiveMs,
      workerDoneMs,
      callbackSendStartMs,
      callbackSendEndMs,
      receiveCount: callback.sqsApproxReceiveCount,
    });

    return callback;
  }
}
