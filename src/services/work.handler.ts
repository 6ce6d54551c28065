import { injectable } from "inversify";

import { RequestEnvelope } from "../types/request-envelope";

/** Business step the worker runs between receiving and answering a request. */
export interface WorkHandler {
  handle(request: RequestEnvelope): Promise<void>;
}

@injectable()
export class PassThroughWorkHandler implements WorkHandler {
  async handle(): Promise<void> {
    // no-op: the bridge measures transport, not work
  }
}
