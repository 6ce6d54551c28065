// Local runner: one dispatch per line typed on stdin, against two in-memory
// queues and a pump that plays the SQS → worker Lambda trigger.
//
// Each line is the JSON body of the POST request, e.g.
//   {"runId":"local-1","maxWaitMs":2000,"messageBodyBytes":64}
// An empty line dispatches with defaults.

import "reflect-metadata";
import { createInterface } from "node:readline";
import { Logger } from "@aws-lambda-powertools/logger";

import { InMemoryChannel } from "../channel/in-memory.channel";
import { DispatcherConfig } from "../config/bridge.config";
import { DispatchController } from "../controller/dispatch.controller";
import { DispatcherService } from "../services/dispatcher.service";
import { PassThroughWorkHandler } from "../services/work.handler";
import { WorkerService } from "../services/worker.service";
import { LocalWorkerPump } from "./local-worker.pump";

const logger = new Logger({
  serviceName: "sqs-sync-bridge-local",
  logLevel: process.env.LOCAL_LOG_LEVEL === "debug" ? "DEBUG" : "WARN",
});

const push = new InMemoryChannel("local-push");
const receive = new InMemoryChannel("local-receive");

const config: DispatcherConfig = {
  region: "local",
  pushQueueUrl: "memory://local-push",
  pushQueueName: push.queueName,
  receiveQueueUrl: "memory://local-receive",
  receiveQueueName: receive.queueName,
  pollWaitSeconds: 20,
  pollVisibilityTimeoutSeconds: 10,
  mismatchBackoffMs: 20,
};

const controller = new DispatchController(
  new DispatcherService(config, push, receive, logger),
  logger
);
const pump = new LocalWorkerPump(
  push,
  new WorkerService(config, receive, new PassThroughWorkHandler(), logger),
  logger
);

async function main() {
  pump.start();
  console.log(
    "Local dispatcher ready. Type a JSON body (or empty line), q to exit."
  );

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  rl.setPrompt("dispatch> ");
  rl.prompt();

  for await (const line of rl) {
    if (line.trim().toLowerCase() === "q") break;

    const response = await controller.handle({ body: line });
    console.log(`HTTP ${response.statusCode}`);
    console.log(JSON.stringify(JSON.parse(response.body), null, 2));
    rl.prompt();
  }

  rl.close();
  await pump.stop();
}

main().catch((err) => {
  console.error("local runner failed:", err);
  process.exit(1);
});
