import {
  ChannelMessage,
  MessageChannel,
  ReceiveOptions,
  SendOptions,
  clampDelaySeconds,
} from "./message-channel";

export type ChannelOperation = {
  op: "send" | "receive" | "delete" | "release";
  messageId: string;
};

interface StoredMessage {
  messageId: string;
  body: string;
  sentAtMs: number;
  visibleAtMs: number;
  receiveCount: number;
  firstReceiveAtMs?: number;
  receiptHandle?: string;
}

/**
 * In-process queue with SQS lease semantics: delayed visibility, visibility
 * timeouts, long-wait receives and per-delivery receipt handles.
 * Delivered messages move to the back so a released message does not shadow
 * the ones behind it. Every call is recorded in `operations`.
 */
export class InMemoryChannel implements MessageChannel {
  readonly operations: ChannelOperation[] = [];

  private messages: StoredMessage[] = [];
  private readonly waiters = new Set<() => void>();
  private sequence = 0;

  constructor(readonly queueName = "in-memory") {}

  get depth(): number {
    return this.messages.length;
  }

  visibleCount(): number {
    const now = Date.now();
    return this.messages.filter((m) => m.visibleAtMs <= now).length;
  }

  async send(body: string, options: SendOptions = {}): Promise<string> {
    options.abortSignal?.throwIfAborted();

    const now = Date.now();
    this.sequence += 1;
    const messageId = `${this.queueName}-${this.sequence}`;
    this.messages.push({
      messageId,
      body,
      sentAtMs: now,
      visibleAtMs: now + clampDelaySeconds(options.delaySeconds) * 1000,
      receiveCount: 0,
    });
    this.operations.push({ op: "send", messageId });
    this.notify();
    return messageId;
  }

  async receive(options: ReceiveOptions): Promise<ChannelMessage[]> {
    const waitUntil = Date.now() + options.waitTimeSeconds * 1000;

    for (;;) {
      options.abortSignal?.throwIfAborted();

      const batch = this.take(
        options.maxMessages,
        options.visibilityTimeoutSeconds
      );
      const now = Date.now();
      if (batch.length > 0 || now >= waitUntil) return batch;

      const wakeAt = Math.min(waitUntil, this.nextVisibleAt() ?? waitUntil);
      await this.waitForChange(wakeAt - now, options.abortSignal);
    }
  }

  async delete(receiptHandle: string): Promise<void> {
    const index = this.messages.findIndex(
      (m) => m.receiptHandle === receiptHandle
    );
    if (index < 0) {
      throw new Error(`ReceiptHandleIsInvalid: ${receiptHandle}`);
    }
    const [removed] = this.messages.splice(index, 1);
    this.operations.push({ op: "delete", messageId: removed.messageId });
  }

  async release(receiptHandle: string): Promise<void> {
    const message = this.messages.find(
      (m) => m.receiptHandle === receiptHandle
    );
    if (!message) {
      throw new Error(`ReceiptHandleIsInvalid: ${receiptHandle}`);
    }
    message.visibleAtMs = Date.now();
    this.operations.push({ op: "release", messageId: message.messageId });
    this.notify();
  }

  private take(
    maxMessages: number,
    visibilityTimeoutSeconds: number
  ): ChannelMessage[] {
    const now = Date.now();
    const taken: StoredMessage[] = [];

    for (const message of this.messages) {
      if (taken.length >= maxMessages) break;
      if (message.visibleAtMs > now) continue;

      message.receiveCount += 1;
      message.firstReceiveAtMs ??= now;
      message.receiptHandle = `${message.messageId}#${message.receiveCount}`;
      message.visibleAtMs = now + visibilityTimeoutSeconds * 1000;
      taken.push(message);
    }

    if (taken.length > 0) {
      this.messages = [
        ...this.messages.filter((m) => !taken.includes(m)),
        ...taken,
      ];
    }

    return taken.map((message) => {
      this.operations.push({ op: "receive", messageId: message.messageId });
      return {
        messageId: message.messageId,
        receiptHandle: `${message.messageId}#${message.receiveCount}`,
        body: message.body,
        attributes: {
          sentTimestampMs: message.sentAtMs,
          firstReceiveTimestampMs: message.firstReceiveAtMs ?? now,
          receiveCount: message.receiveCount,
        },
      };
    });
  }

  private nextVisibleAt(): number | undefined {
    const now = Date.now();
    const pending = this.messages
      .map((m) => m.visibleAtMs)
      .filter((visibleAt) => visibleAt > now);
    return pending.length > 0 ? Math.min(...pending) : undefined;
  }

  private waitForChange(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      const done = () => {
        clearTimeout(timer);
        this.waiters.delete(done);
        signal?.removeEventListener("abort", done);
        resolve();
      };
      const timer = setTimeout(done, Math.max(ms, 0));
      this.waiters.add(done);
      signal?.addEventListener("abort", done, { once: true });
    });
  }

  private notify(): void {
    for (const wake of [...this.waiters]) wake();
  }
}
