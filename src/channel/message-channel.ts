/** SQS accepts per-message delays of 0..900 seconds. */
export const MAX_DELAY_SECONDS = 900;

/** Largest message body SQS accepts (256 KiB). */
export const MAX_MESSAGE_BODY_BYTES = 262_144;

export interface DeliveryAttributes {
  sentTimestampMs: number;
  firstReceiveTimestampMs: number;
  receiveCount: number;
}

export interface ChannelMessage {
  messageId: string;
  /** Changes on every delivery; only the latest one can delete or release */
  receiptHandle: string;
  body: string;
  attributes: DeliveryAttributes;
}

export interface SendOptions {
  delaySeconds?: number;
  abortSignal?: AbortSignal;
}

export interface ReceiveOptions {
  maxMessages: number;
  waitTimeSeconds: number;
  visibilityTimeoutSeconds: number;
  abortSignal?: AbortSignal;
}

/**
 * At-least-once, lease-based queue. A delivered message stays hidden from
 * other readers until it is deleted, released, or its lease expires.
 */
export interface MessageChannel {
  readonly queueName: string;
  send(body: string, options?: SendOptions): Promise<string>;
  receive(options: ReceiveOptions): Promise<ChannelMessage[]>;
  delete(receiptHandle: string): Promise<void>;
  /** Ends the lease now so another reader sees the message again. */
  release(receiptHandle: string): Promise<void>;
}

export function clampDelaySeconds(delaySeconds?: number): number {
  if (!delaySeconds || !Number.isFinite(delaySeconds) || delaySeconds < 0) {
    return 0;
  }
  return Math.min(Math.trunc(delaySeconds), MAX_DELAY_SECONDS);
}
