import { ResponseEnvelope } from "./response-envelope";

/**
 * Locally observed marks of one dispatch plus everything the worker reported,
 * passed through untouched.
 */
export interface DispatchOutput extends ResponseEnvelope {
  dispatchStartMs: number;
  sendEndMs: number;
  pollStartMs: number;
  pollEndMs: number;
  receiveMessageMs: number;
}
