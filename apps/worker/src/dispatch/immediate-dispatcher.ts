import type { DeliveryLog } from "@missive/db";
import type { DeliveryExecutor } from "./executor.js";
import type { DispatchPreparer } from "./preparer.js";
import type { DispatchRequest, Dispatcher } from "./types.js";

/**
 * Sends inline. The returned log is SENT; a transport failure leaves it
 * FAILED and rejects with the TransportError.
 */
export class ImmediateDispatcher implements Dispatcher {
  readonly mode = "immediate";

  constructor(
    private preparer: DispatchPreparer,
    private executor: DeliveryExecutor
  ) {}

  async dispatch(request: DispatchRequest): Promise<DeliveryLog> {
    const entry = await this.preparer.prepare(request);
    const outcome = await this.executor.deliver(entry);

    switch (outcome.status) {
      case "sent":
        return outcome.log;
      case "failed":
        throw outcome.error;
      case "skipped":
        return outcome.log ?? entry;
    }
  }
}
