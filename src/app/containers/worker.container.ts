import { Container } from "inversify";
import { Logger } from "@aws-lambda-powertools/logger";
import { SQSClient } from "@aws-sdk/client-sqs";

import { TYPES } from "../tokens";
import { WorkerConfig, loadWorkerConfig } from "../../config/bridge.config";
import { MessageChannel } from "../../channel/message-channel";
import { SqsChannel } from "../../channel/sqs.channel";
import {
  PassThroughWorkHandler,
  WorkHandler,
} from "../../services/work.handler";
import { WorkerService } from "../../services/worker.service";

const workerContainer: Container = new Container({
  defaultScope: "Singleton",
});

workerContainer
  .bind(Logger)
  .toConstantValue(
    new Logger({ serviceName: process.env.SERVICE_NAME ?? "worker-lambda" })
  );
workerContainer.bind(SQSClient).toConstantValue(new SQSClient({}));

workerContainer
  .bind<WorkerConfig>(TYPES.WorkerConfig)
  .toDynamicValue(() => loadWorkerConfig(process.env));
workerContainer
  .bind<MessageChannel>(TYPES.ReceiveChannel)
  .toDynamicValue(
    (ctx) =>
      new SqsChannel(
        ctx.container.get(SQSClient),
        ctx.container.get<WorkerConfig>(TYPES.WorkerConfig).receiveQueueUrl
      )
  );
workerContainer.bind<WorkHandler>(TYPES.WorkHandler).to(PassThroughWorkHandler);
workerContainer.bind(WorkerService).toSelf();

export { workerContainer };
