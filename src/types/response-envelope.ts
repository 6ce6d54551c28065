import { z } from "zod";

import { parseJsonWith } from "../util/parse";

const timestamp = z.number().default(0);

/** Callback the worker writes to the receive queue. */
export const responseEnvelopeSchema = z.object({
  id: z.string().trim().min(1),
  runId: z.string().trim().min(1),

  region: z.string().default(""),
  pushQueueName: z.string().default(""),
  receiveQueueName: z.string().default(""),

  issuedAtMs: timestamp,
  sendStartMs: timestamp,

  workerReceiveMs: timestamp,
  workerDoneMs: timestamp,
  callbackSendStartMs: timestamp,

  // provenance of the inbound delivery, from SQS system attributes
  sqsSentTimestampMs: timestamp,
  sqsFirstReceiveTimestampMs: timestamp,
  sqsApproxReceiveCount: timestamp,
});

export type ResponseEnvelope = z.infer<typeof responseEnvelopeSchema>;

/** Returns null for anything that is not a well-formed callback. */
export function parseResponseEnvelope(body: string): ResponseEnvelope | null {
  return parseJsonWith(responseEnvelopeSchema, body);
}
