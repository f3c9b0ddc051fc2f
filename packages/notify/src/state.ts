/**
 * Shared completion state between one Notify and one NotifyWaiter.
 */

import { WaiterConsumedError } from "./error"
import { defaultLogger } from "./logger"
import { Mutex } from "./mutex"
import { pending, ready } from "./waker"
import type { Logger } from "./logger"
import type { Poll, Waker } from "./waker"

/**
 * State of a notify/waiter exchange.
 */
export type NotifyStatus = `pending` | `completed` | `canceled`

/**
 * Options shared by the state and the handles built on it.
 */
export interface NotifyOptions {
  /**
   * Name used as the log prefix.
   */
  name?: string

  /**
   * Logger for lock recovery warnings and debug output.
   */
  logger?: Logger
}

interface StateFields<T> {
  waker: Waker | undefined
  // Boxed so that `undefined` is a valid value to deliver
  slot: { value: T } | undefined
  isCompleted: boolean
  isCanceled: boolean
}

export class CompletionState<T> {
  readonly #mutex: Mutex<StateFields<T>>
  readonly #name: string
  readonly #logger: Logger

  private constructor(opts: NotifyOptions) {
    this.#name = opts.name ?? `Notify`
    this.#logger = opts.logger ?? defaultLogger
    this.#mutex = new Mutex<StateFields<T>>(
      {
        waker: undefined,
        slot: undefined,
        isCompleted: false,
        isCanceled: false,
      },
      { name: this.#name, logger: this.#logger }
    )
  }

  /**
   * Create an empty state.
   */
  static create<T>(opts: NotifyOptions = {}): CompletionState<T> {
    return new CompletionState<T>(opts)
  }

  /**
   * Deliver `value`. Only the first call on a pending state has any effect.
   *
   * The stored waker is woken after the lock is released, so it may poll
   * again synchronously.
   *
   * @returns true if this call completed the state
   */
  complete(value: T): boolean {
    const outcome = this.#mutex.lock((state) => {
      if (state.isCompleted) return `late` as const
      if (state.isCanceled) return `canceled` as const

      state.slot = { value }
      state.isCompleted = true
      const waker = state.waker
      state.waker = undefined
      return waker
    })

    if (outcome === `late`) {
      this.#logger.debug(
        `[${this.#name}] Ignoring completion, already completed`
      )
      return false
    }
    if (outcome === `canceled`) {
      this.#logger.debug(`[${this.#name}] Dropping value, waiter was canceled`)
      return false
    }

    outcome?.wake()
    return true
  }

  /**
   * Store `waker` unless the current one already resumes the same task.
   */
  registerWaiter(waker: Waker): void {
    this.#mutex.lock((state) => {
      storeWaker(state, waker)
    })
  }

  /**
   * Take the value if it has been delivered, otherwise register `waker`.
   *
   * @throws {WaiterConsumedError} if the value was already taken
   */
  poll(waker: Waker): Poll<T> {
    const result = this.#mutex.lock((state): Poll<T> | undefined => {
      if (state.isCompleted) {
        const slot = state.slot
        if (!slot) return undefined
        state.slot = undefined
        return ready(slot.value)
      }

      storeWaker(state, waker)
      return pending
    })

    if (!result) {
      throw new WaiterConsumedError()
    }
    return result
  }

  /**
   * Mark the exchange canceled unless it already completed. The stored waker
   * is dropped either way.
   */
  markCanceledIfIncomplete(): void {
    this.#mutex.lock((state) => {
      state.waker = undefined
      if (!state.isCompleted) {
        state.isCanceled = true
      }
    })
  }

  get isCompleted(): boolean {
    return this.#mutex.lock((state) => state.isCompleted)
  }

  get isCanceled(): boolean {
    return this.#mutex.lock((state) => state.isCanceled)
  }

  get status(): NotifyStatus {
    return this.#mutex.lock((state): NotifyStatus => {
      if (state.isCompleted) return `completed`
      if (state.isCanceled) return `canceled`
      return `pending`
    })
  }
}

function storeWaker<T>(state: StateFields<T>, waker: Waker): void {
  if (!state.waker || !state.waker.willWake(waker)) {
    state.waker = waker
  }
}
