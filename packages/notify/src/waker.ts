/**
 * Resumption tokens handed to a suspension point by the host scheduler.
 */

/**
 * Result of a single suspension check.
 */
export type Poll<T> = { ready: true; value: T } | { ready: false }

/**
 * A token that asks the host to poll a suspended operation again.
 *
 * `wake()` may be called from any callback, timer or microtask.
 * `willWake()` compares task identity and exists only so a suspension point
 * can skip re-registering a waker it already holds.
 */
export interface Waker {
  wake: () => void
  willWake: (other: Waker) => boolean
}

/**
 * Identity of a logical task. Any object works; wakers created with the same
 * key resume the same task.
 */
export type TaskKey = object

class CallbackWaker implements Waker {
  readonly task: TaskKey
  readonly #onWake: () => void

  constructor(task: TaskKey, onWake: () => void) {
    this.task = task
    this.#onWake = onWake
  }

  wake(): void {
    this.#onWake()
  }

  willWake(other: Waker): boolean {
    return other instanceof CallbackWaker && other.task === this.task
  }
}

/**
 * Create a waker that runs `onWake` when woken.
 *
 * @example
 * ```typescript
 * const task = {}
 * const waker = createWaker(task, () => schedule(task))
 * const result = state.poll(waker)
 * ```
 */
export function createWaker(task: TaskKey, onWake: () => void): Waker {
  return new CallbackWaker(task, onWake)
}

/**
 * Build a ready poll result.
 */
export function ready<T>(value: T): Poll<T> {
  return { ready: true, value }
}

export const pending: Poll<never> = { ready: false }
