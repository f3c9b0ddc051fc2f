/**
 * @handoff/notify
 *
 * One-shot, single-producer/single-consumer handoff with cancellation.
 *
 * A Notify delivers one value to a NotifyWaiter. Disposing the waiter before
 * the value arrives is visible to the producer through isCanceled().
 *
 * @packageDocumentation
 */

// Handles
export { Notify, NotifyWaiter, withWaiter } from "./notify"
export { CompletionState } from "./state"
export { Mutex } from "./mutex"
export { createWaker } from "./waker"
export { defaultLogger } from "./logger"

// Types
export type { WaitOptions } from "./notify"
export type { NotifyOptions, NotifyStatus } from "./state"
export type { MutexOptions } from "./mutex"
export type { Poll, TaskKey, Waker } from "./waker"
export type { Logger } from "./logger"

// Errors
export {
  LockReentryError,
  WaitAbortedError,
  WaiterBusyError,
  WaiterConsumedError,
  WaiterDisposedError,
} from "./error"
