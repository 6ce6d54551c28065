import "reflect-metadata";
import { SQSBatchResponse, SQSEvent } from "aws-lambda";

import { workerContainer } from "../containers/worker.container";
import { WorkerService } from "../../services/worker.service";

// Push queue event source mapping with ReportBatchItemFailures enabled.
// A configuration error rejects the whole batch so SQS retries it.
export const handler = async (event: SQSEvent): Promise<SQSBatchResponse> => {
  const worker = workerContainer.get(WorkerService);
  return worker.processBatch(event);
};
