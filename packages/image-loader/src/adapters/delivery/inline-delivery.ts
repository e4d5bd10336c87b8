import type { DeliveryContext } from "../../ports/delivery-context"

export class InlineDelivery implements DeliveryContext {
  dispatch(task: () => void): void {
    task()
  }
}
