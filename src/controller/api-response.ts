import { APIGatewayProxyResult } from "aws-lambda";

import { BridgeError, BridgeErrorKind } from "../errors/bridge.error";
import { DispatchOutput } from "../types/dispatch-output";

export type ApiStatus = "OK" | "TIMEOUT" | "ERROR";

export interface ApiResponseBody {
  status: ApiStatus;
  totalMs: number;
  output?: DispatchOutput;
  error?: string;
}

const STATUS_CODES: Record<BridgeErrorKind, number> = {
  InvalidInput: 400,
  ConfigurationMissing: 500,
  PublishFailure: 502,
  ChannelReadFailure: 502,
  Timeout: 504,
  DeadlineTooClose: 504,
};

export function statusCodeFor(kind: BridgeErrorKind): number {
  return STATUS_CODES[kind];
}

export function jsonResponse(
  statusCode: number,
  body: ApiResponseBody
): APIGatewayProxyResult {
  return {
    statusCode,
    headers: {
      "Content-Type": "application/json",
    },
    body: JSON.stringify(body),
  };
}

export function errorResponse(
  error: BridgeError,
  totalMs = 0
): APIGatewayProxyResult {
  return jsonResponse(statusCodeFor(error.kind), {
    status: error.isTimeout ? "TIMEOUT" : "ERROR",
    totalMs,
    error: error.message,
  });
}
