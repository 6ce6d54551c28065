import { Logger } from "@aws-lambda-powertools/logger";

import { InMemoryChannel } from "../channel/in-memory.channel";
import { MessageChannel } from "../channel/message-channel";
import { BridgeError } from "../errors/bridge.error";
import { CorrelationPoller } from "./correlation.poller";
import { startDeadline } from "./deadline";

const log = new Logger({ serviceName: "poller-test", logLevel: "SILENT" });
const policy = {
  waitTimeSeconds: 20,
  visibilityTimeoutSeconds: 10,
  mismatchBackoffMs: 1,
};
const mine = { id: "abc", runId: "run-1" };

function callback(
  id: string,
  runId: string,
  extra: Record<string, unknown> = {}
): string {
  return JSON.stringify({
    id,
    runId,
    workerReceiveMs: 1_000,
    workerDoneMs: 1_001,
    ...extra,
  });
}

function failingChannel(
  error: Error
): MessageChannel & { receive: jest.Mock } {
  return {
    queueName: "broken",
    send: jest.fn(),
    receive: jest.fn().mockRejectedValue(error),
    delete: jest.fn(),
    release: jest.fn(),
  };
}

describe("CorrelationPoller", () => {
  it("consumes its own callback and leaves another one visible", async () => {
    const channel = new InMemoryChannel("receive");
    await channel.send(callback("xyz", "run-2"));
    await channel.send(callback("abc", "run-1", { sqsApproxReceiveCount: 1 }));
    const poller = new CorrelationPoller(channel, policy, log);
    const deadline = startDeadline(2_000);

    try {
      const result = await poller.waitFor(mine, deadline.signal);

      expect(result.response).toMatchObject({
        id: "abc",
        runId: "run-1",
        workerReceiveMs: 1_000,
        workerDoneMs: 1_001,
        sqsApproxReceiveCount: 1,
      });
      expect(result.pollEndMs).toBeGreaterThanOrEqual(result.receiveMessageMs);
    } finally {
      deadline.clear();
    }

    expect(channel.operations.slice(2)).toEqual([
      { op: "receive", messageId: "receive-1" },
      { op: "release", messageId: "receive-1" },
      { op: "receive", messageId: "receive-2" },
      { op: "delete", messageId: "receive-2" },
    ]);
    expect(channel.depth).toBe(1);
    expect(channel.visibleCount()).toBe(1);
  });

  it("never deletes a callback whose runId differs", async () => {
    const channel = new InMemoryChannel("receive");
    await channel.send(callback("abc", "run-other"));
    const poller = new CorrelationPoller(channel, policy, log);
    const deadline = startDeadline(100);

    await expect(poller.waitFor(mine, deadline.signal)).rejects.toMatchObject({
      kind: "Timeout",
    });
    deadline.clear();

    const ops = channel.operations.map((o) => o.op);
    expect(ops).toContain("release");
    expect(ops).not.toContain("delete");
    expect(channel.depth).toBe(1);
    expect(channel.visibleCount()).toBe(1);
  });

  it("deletes malformed callbacks and keeps polling", async () => {
    const channel = new InMemoryChannel("receive");
    await channel.send("not json");
    await channel.send(JSON.stringify({ id: "abc" }));
    await channel.send(callback("abc", "run-1"));
    const poller = new CorrelationPoller(channel, policy, log);
    const deadline = startDeadline(2_000);

    const result = await poller.waitFor(mine, deadline.signal);
    deadline.clear();

    expect(result.response.id).toBe("abc");
    expect(channel.operations.slice(3)).toEqual([
      { op: "receive", messageId: "receive-1" },
      { op: "delete", messageId: "receive-1" },
      { op: "receive", messageId: "receive-2" },
      { op: "delete", messageId: "receive-2" },
      { op: "receive", messageId: "receive-3" },
      { op: "delete", messageId: "receive-3" },
    ]);
    expect(channel.depth).toBe(0);
  });

  it("times out while long polling an empty queue", async () => {
    const channel = new InMemoryChannel("receive");
    const poller = new CorrelationPoller(channel, policy, log);
    const startedAt = Date.now();
    const deadline = startDeadline(50);

    const error = await poller
      .waitFor(mine, deadline.signal)
      .catch((err: unknown) => err);
    deadline.clear();

    expect(error).toBeInstanceOf(BridgeError);
    expect(error).toMatchObject({ kind: "Timeout" });
    expect(Date.now() - startedAt).toBeLessThan(1_000);
  });

  it("does not read once the signal has already fired", async () => {
    const channel = failingChannel(new Error("unused"));
    const poller = new CorrelationPoller(channel, policy, log);
    const controller = new AbortController();
    controller.abort();

    await expect(
      poller.waitFor(mine, controller.signal)
    ).rejects.toMatchObject({ kind: "Timeout" });
    expect(channel.receive).not.toHaveBeenCalled();
  });

  it("maps other read errors to ChannelReadFailure", async () => {
    const channel = failingChannel(new Error("throttled"));
    const poller = new CorrelationPoller(channel, policy, log);
    const deadline = startDeadline(2_000);

    await expect(poller.waitFor(mine, deadline.signal)).rejects.toMatchObject({
      kind: "ChannelReadFailure",
      message: "receive message: throttled",
    });
    deadline.clear();
    expect(channel.receive).toHaveBeenCalledTimes(1);
  });
});
