import { randomBytes } from "node:crypto";

export const CORRELATION_ID_BYTES = 16;

/** 128 random bits as 32 lowercase hex chars. */
export function newCorrelationId(): string {
  return randomBytes(CORRELATION_ID_BYTES).toString("hex");
}
