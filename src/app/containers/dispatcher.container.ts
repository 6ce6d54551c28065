import { Container, interfaces } from "inversify";
import { Logger } from "@aws-lambda-powertools/logger";
import { SQSClient } from "@aws-sdk/client-sqs";

import { TYPES } from "../tokens";
import {
  DispatcherConfig,
  loadDispatcherConfig,
} from "../../config/bridge.config";
import { MessageChannel } from "../../channel/message-channel";
import { SqsChannel } from "../../channel/sqs.channel";
import { DispatcherService } from "../../services/dispatcher.service";
import { DispatchController } from "../../controller/dispatch.controller";

const dispatcherContainer: Container = new Container({
  defaultScope: "Singleton",
});

dispatcherContainer
  .bind(Logger)
  .toConstantValue(
    new Logger({ serviceName: process.env.SERVICE_NAME ?? "dispatcher-lambda" })
  );
dispatcherContainer.bind(SQSClient).toConstantValue(new SQSClient({}));

// Resolved lazily: a missing env var surfaces from the first get().
dispatcherContainer
  .bind<DispatcherConfig>(TYPES.DispatcherConfig)
  .toDynamicValue(() => loadDispatcherConfig(process.env));
dispatcherContainer
  .bind<MessageChannel>(TYPES.PushChannel)
  .toDynamicValue(
    (ctx) =>
      new SqsChannel(
        ctx.container.get(SQSClient),
        configOf(ctx.container).pushQueueUrl
      )
  );
dispatcherContainer
  .bind<MessageChannel>(TYPES.ReceiveChannel)
  .toDynamicValue(
    (ctx) =>
      new SqsChannel(
        ctx.container.get(SQSClient),
        configOf(ctx.container).receiveQueueUrl
      )
  );

dispatcherContainer.bind(DispatcherService).toSelf();
dispatcherContainer.bind(DispatchController).toSelf();

function configOf(container: interfaces.Container): DispatcherConfig {
  return container.get<DispatcherConfig>(TYPES.DispatcherConfig);
}

export { dispatcherContainer };
