import "reflect-metadata";
import {
  APIGatewayProxyEvent,
  APIGatewayProxyResult,
  Context,
} from "aws-lambda";
import { Logger } from "@aws-lambda-powertools/logger";

import { dispatcherContainer } from "../containers/dispatcher.container";
import { DispatchController } from "../../controller/dispatch.controller";
import { errorResponse } from "../../controller/api-response";
import { asBridgeError } from "../../errors/bridge.error";

const logger = dispatcherContainer.get(Logger);

// API Gateway → publish to the push queue → wait for the matching callback
export const handler = async (
  event: APIGatewayProxyEvent,
  context: Context
): Promise<APIGatewayProxyResult> => {
  let controller: DispatchController;
  try {
    controller = dispatcherContainer.get(DispatchController);
  } catch (err) {
    const error = asBridgeError(err, "ConfigurationMissing");
    logger.error("dispatcher.init.failed", {
      kind: error.kind,
      err: error.message,
    });
    return errorResponse(error);
  }

  return controller.handle(event, context);
};
