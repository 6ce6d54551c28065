import { z } from "zod";

/** Parses JSON and validates it; null when either step fails. */
export function parseJsonWith<S extends z.ZodTypeAny>(
  schema: S,
  body: string
): z.output<S> | null {
  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch {
    return null;
  }
  const parsed = schema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

// SQS hands numeric attributes over as strings, sometimes missing.
export function parseIntOrZero(value?: string): number {
  if (!value || !value.trim()) return 0;
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? 0 : parsed;
}
