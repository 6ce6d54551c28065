import { z } from "zod";

import { MAX_MESSAGE_BODY_BYTES } from "../channel/message-channel";
import { parseJsonWith } from "../util/parse";

/** Longest caller-supplied run label. */
export const MAX_RUN_ID_LENGTH = 256;

/**
 * Largest padding that still fits one SQS message next to the rest of the
 * envelope: id, a run label of MAX_RUN_ID_LENGTH escaped characters, the
 * timestamps and the keys.
 */
export const MAX_PADDING_BYTES = MAX_MESSAGE_BODY_BYTES - 2_048;

export const requestEnvelopeSchema = z.object({
  /** Correlation id: the only key responses are matched on */
  id: z.string().trim().min(1),
  /** Caller-supplied run label; not unique */
  runId: z.string().trim().min(1),
  issuedAtMs: z.number().default(0),
  sendStartMs: z.number().default(0),
  padding: z.string().optional(),
});

export type RequestEnvelope = z.infer<typeof requestEnvelopeSchema>;

export function parseRequestEnvelope(body: string): RequestEnvelope | null {
  return parseJsonWith(requestEnvelopeSchema, body);
}
