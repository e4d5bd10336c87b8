/**
 * Where terminal load states are handed to observers.
 *
 * A dispatched task runs exactly once, after `dispatch` returns or during it,
 * depending on the implementation. Tasks run in dispatch order.
 */
export interface DeliveryContext {
  dispatch(task: () => void): void
}
