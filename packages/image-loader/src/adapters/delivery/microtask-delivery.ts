import type { DeliveryContext } from "../../ports/delivery-context"

/**
 * Runs tasks on the microtask queue: after the current synchronous code
 * finishes, before any timer or I/O callback.
 */
export class MicrotaskDelivery implements DeliveryContext {
  dispatch(task: () => void): void {
    queueMicrotask(task)
  }
}
