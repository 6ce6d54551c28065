import { inject, injectable } from "inversify";
import { z } from "zod";
import { Logger } from "@aws-lambda-powertools/logger";
import {
  APIGatewayProxyEvent,
  APIGatewayProxyResult,
  Context,
} from "aws-lambda";

import { BridgeError, describeError } from "../errors/bridge.error";
import {
  DispatchRequest,
  DispatcherService,
} from "../services/dispatcher.service";
import {
  MAX_PADDING_BYTES,
  MAX_RUN_ID_LENGTH,
} from "../types/request-envelope";
import { errorResponse, jsonResponse } from "./api-response";

// JSON null reads as "not given"
const optional = <S extends z.ZodTypeAny>(schema: S) =>
  schema.nullish().transform((value) => value ?? undefined);

const dispatchSchema = z.object({
  runId: optional(z.string().max(MAX_RUN_ID_LENGTH)),
  delaySeconds: optional(z.number().int()),
  // negative sizes still mean "no padding"
  messageBodyBytes: optional(z.number().int().max(MAX_PADDING_BYTES)),
  maxWaitMs: optional(z.number().int()),
});

export type DispatchEvent = Pick<APIGatewayProxyEvent, "body"> &
  Partial<Pick<APIGatewayProxyEvent, "isBase64Encoded">>;

export type RemainingTime = Pick<Context, "getRemainingTimeInMillis">;

@injectable()
export class DispatchController {
  constructor(
    @inject(DispatcherService) private readonly dispatcher: DispatcherService,
    @inject(Logger) private readonly log: Logger
  ) {}

  async handle(
    event: DispatchEvent,
    context?: RemainingTime
  ): Promise<APIGatewayProxyResult> {
    let request: DispatchRequest;
    try {
      request = this.parseBody(event);
    } catch (err) {
      if (!(err instanceof BridgeError)) throw err;
      this.log.warn("dispatch.api.invalid", { err: err.message });
      return errorResponse(err);
    }

    this.log.info("dispatch.api.received", {
      runId: request.runId,
      delaySeconds: request.delaySeconds,
      messageBodyBytes: request.messageBodyBytes,
      maxWaitMs: request.maxWaitMs,
    });

    const outcome = await this.dispatcher.dispatch(request, {
      remainingMs: context?.getRemainingTimeInMillis(),
    });

    if (outcome.status === "OK") {
      return jsonResponse(200, {
        status: "OK",
        totalMs: outcome.totalMs,
        output: outcome.output,
      });
    }
    return errorResponse(outcome.error, outcome.totalMs);
  }

  private parseBody(event: DispatchEvent): DispatchRequest {
    const text = event.isBase64Encoded
      ? Buffer.from(event.body ?? "", "base64").toString("utf8")
      : event.body ?? "";
    if (!text.trim()) return {};

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new BridgeError(
        "InvalidInput",
        `invalid json body: ${describeError(err)}`,
        { cause: err }
      );
    }

    const parsed = dispatchSchema.safeParse(raw);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`)
        .join("; ");
      throw new BridgeError("InvalidInput", `invalid request body: ${detail}`);
    }
    return parsed.data;
  }
}
