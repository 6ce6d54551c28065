import { Logger } from "@aws-lambda-powertools/logger";

import { InMemoryChannel } from "../channel/in-memory.channel";
import { DispatcherConfig } from "../config/bridge.config";
import { LocalWorkerPump } from "../devtools/local-worker.pump";
import { BridgeError } from "../errors/bridge.error";
import {
  DispatchOutcome,
  DispatcherService,
} from "../services/dispatcher.service";
import { PassThroughWorkHandler } from "../services/work.handler";
import { WorkerService } from "../services/worker.service";
import { DispatchOutput } from "../types/dispatch-output";
import {
  MAX_PADDING_BYTES,
  MAX_RUN_ID_LENGTH,
} from "../types/request-envelope";
import { DispatchController } from "./dispatch.controller";

const log = new Logger({
  serviceName: "controller-test",
  logLevel: "SILENT",
});

const config: DispatcherConfig = {
  region: "test-region",
  pushQueueUrl: "memory://push",
  pushQueueName: "push",
  receiveQueueUrl: "memory://receive",
  receiveQueueName: "receive",
  pollWaitSeconds: 20,
  pollVisibilityTimeoutSeconds: 10,
  mismatchBackoffMs: 5,
};

const output: DispatchOutput = {
  id: "abc",
  runId: "run-1",
  region: "test-region",
  pushQueueName: "push",
  receiveQueueName: "receive",
  issuedAtMs: 1,
  sendStartMs: 2,
  workerReceiveMs: 4,
  workerDoneMs: 5,
  callbackSendStartMs: 6,
  sqsSentTimestampMs: 3,
  sqsFirstReceiveTimestampMs: 4,
  sqsApproxReceiveCount: 1,
  dispatchStartMs: 1,
  sendEndMs: 3,
  pollStartMs: 3,
  pollEndMs: 8,
  receiveMessageMs: 8,
};

describe("DispatchController", () => {
  let push: InMemoryChannel;
  let receive: InMemoryChannel;
  let dispatcher: DispatcherService;
  let controller: DispatchController;

  beforeEach(() => {
    push = new InMemoryChannel("push");
    receive = new InMemoryChannel("receive");
    dispatcher = new DispatcherService(config, push, receive, log);
    controller = new DispatchController(dispatcher, log);
  });

  function stubOutcome(outcome: DispatchOutcome): jest.SpyInstance {
    return jest.spyOn(dispatcher, "dispatch").mockResolvedValue(outcome);
  }

  it("dispatches with defaults for an empty body", async () => {
    const dispatch = stubOutcome({ status: "OK", totalMs: 7, output });

    const response = await controller.handle({ body: null });

    expect(dispatch).toHaveBeenCalledWith({}, { remainingMs: undefined });
    expect(response.statusCode).toBe(200);
    expect(response.headers).toEqual({ "Content-Type": "application/json" });
    expect(JSON.parse(response.body)).toEqual({
      status: "OK",
      totalMs: 7,
      output,
    });
  });

  it("passes the parsed body and the remaining invocation time", async () => {
    const dispatch = stubOutcome({ status: "OK", totalMs: 7, output });
    const body = {
      runId: "run-1",
      delaySeconds: 2,
      messageBodyBytes: 16,
      maxWaitMs: 1_500,
    };

    await controller.handle(
      { body: JSON.stringify(body) },
      { getRemainingTimeInMillis: () => 12_000 }
    );

    expect(dispatch).toHaveBeenCalledWith(body, { remainingMs: 12_000 });
  });

  it("decodes base64 bodies", async () => {
    const dispatch = stubOutcome({ status: "OK", totalMs: 7, output });

    await controller.handle({
      body: Buffer.from('{"runId":"run-b64"}').toString("base64"),
      isBase64Encoded: true,
    });

    expect(dispatch).toHaveBeenCalledWith(
      { runId: "run-b64" },
      { remainingMs: undefined }
    );
  });

  it("treats null fields as absent", async () => {
    const dispatch = stubOutcome({ status: "OK", totalMs: 7, output });

    const response = await controller.handle({
      body: '{"runId":"run-1","maxWaitMs":null,"delaySeconds":null}',
    });

    expect(response.statusCode).toBe(200);
    const [request] = dispatch.mock.calls[0];
    expect(request).toEqual({ runId: "run-1" });
    expect(request.maxWaitMs).toBeUndefined();
  });

  it("rejects a body that is not JSON", async () => {
    const dispatch = jest.spyOn(dispatcher, "dispatch");

    const response = await controller.handle({ body: "{" });

    expect(response.statusCode).toBe(400);
    const parsed = JSON.parse(response.body);
    expect(parsed.status).toBe("ERROR");
    expect(parsed.totalMs).toBe(0);
    expect(parsed.error).toMatch(/^invalid json body: /);
    expect(dispatch).not.toHaveBeenCalled();
  });

  it("rejects fields of the wrong type", async () => {
    const response = await controller.handle({ body: '{"maxWaitMs":"fast"}' });

    expect(response.statusCode).toBe(400);
    expect(JSON.parse(response.body)).toEqual({
      status: "ERROR",
      totalMs: 0,
      error:
        "invalid request body: maxWaitMs: Expected number, received string",
    });
  });

  it("rejects padding larger than one message can carry", async () => {
    const dispatch = jest.spyOn(dispatcher, "dispatch");
    const sendSpy = jest.spyOn(push, "send");

    const response = await controller.handle({
      body: '{"messageBodyBytes":1000000000,"maxWaitMs":100}',
    });

    expect(response.statusCode).toBe(400);
    expect(JSON.parse(response.body)).toEqual({
      status: "ERROR",
      totalMs: 0,
      error:
        "invalid request body: messageBodyBytes: " +
        `Number must be less than or equal to ${MAX_PADDING_BYTES}`,
    });
    expect(dispatch).not.toHaveBeenCalled();
    expect(sendSpy).not.toHaveBeenCalled();
  });

  it("accepts padding right at the limit", async () => {
    const dispatch = stubOutcome({ status: "OK", totalMs: 7, output });

    const response = await controller.handle({
      body: JSON.stringify({ messageBodyBytes: MAX_PADDING_BYTES }),
    });

    expect(response.statusCode).toBe(200);
    expect(dispatch).toHaveBeenCalledWith(
      { messageBodyBytes: MAX_PADDING_BYTES },
      { remainingMs: undefined }
    );
  });

  it("rejects an overlong run label", async () => {
    const response = await controller.handle({
      body: JSON.stringify({ runId: "r".repeat(MAX_RUN_ID_LENGTH + 1) }),
    });

    expect(response.statusCode).toBe(400);
    expect(JSON.parse(response.body).error).toMatch(
      /^invalid request body: runId: /
    );
  });

  it.each([
    ["Timeout", 504, "TIMEOUT"],
    ["DeadlineTooClose", 504, "TIMEOUT"],
    ["PublishFailure", 502, "ERROR"],
    ["ChannelReadFailure", 502, "ERROR"],
  ] as const)("maps %s to HTTP %i", async (kind, statusCode, status) => {
    stubOutcome({
      status,
      totalMs: 50,
      error: new BridgeError(kind, `${kind} happened`),
    });

    const response = await controller.handle({ body: "{}" });

    expect(response.statusCode).toBe(statusCode);
    expect(JSON.parse(response.body)).toEqual({
      status,
      totalMs: 50,
      error: `${kind} happened`,
    });
  });

  it("round-trips through a live worker", async () => {
    const pump = new LocalWorkerPump(
      push,
      new WorkerService(config, receive, new PassThroughWorkHandler(), log),
      log
    );
    pump.start();

    try {
      const response = await controller.handle({
        body: JSON.stringify({ runId: "run-live", maxWaitMs: 2_000 }),
      });

      expect(response.statusCode).toBe(200);
      const parsed = JSON.parse(response.body);
      expect(parsed.status).toBe("OK");
      expect(parsed.output.runId).toBe("run-live");
      expect(parsed.output.receiveQueueName).toBe("receive");
    } finally {
      await pump.stop();
    }
  });
});
