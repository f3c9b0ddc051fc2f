/**
 * Notify - a one-shot, cancel-aware handoff between two tasks.
 *
 * The producer holds a Notify and delivers exactly one value. The consumer
 * holds a NotifyWaiter and awaits it exactly once. Disposing the waiter
 * before a value arrives marks the exchange canceled, which the producer
 * can check to stop work nobody is waiting for.
 */

import {
  WaitAbortedError,
  WaiterBusyError,
  WaiterDisposedError,
} from "./error"
import { CompletionState } from "./state"
import { createWaker } from "./waker"
import type { NotifyOptions, NotifyStatus } from "./state"
import type { Poll, Waker } from "./waker"

/**
 * Options for NotifyWaiter.wait().
 */
export interface WaitOptions {
  /**
   * Aborting the signal disposes the waiter and rejects the wait.
   */
  signal?: AbortSignal
}

/**
 * Producer side of a handoff.
 *
 * @example
 * ```typescript
 * const [notify, waiter] = Notify.create<number>()
 *
 * setTimeout(() => {
 *   if (!notify.isCanceled()) notify.notify(42)
 * }, 50)
 *
 * const result = await waiter
 * ```
 */
export class Notify<T> {
  readonly #state: CompletionState<T>

  private constructor(state: CompletionState<T>) {
    this.#state = state
  }

  /**
   * Create a linked producer and waiter.
   */
  static create<T>(opts: NotifyOptions = {}): [Notify<T>, NotifyWaiter<T>] {
    const state = CompletionState.create<T>(opts)
    return [new Notify<T>(state), new NotifyWaiter<T>(state)]
  }

  /**
   * Deliver `value` to the waiter. Later calls, and calls after the waiter
   * was disposed, are ignored.
   *
   * May resume a suspended waiter synchronously.
   *
   * @returns true if this call delivered the value
   */
  notify(value: T): boolean {
    return this.#state.complete(value)
  }

  /**
   * Whether the waiter was disposed before a value was delivered.
   *
   * Advisory: the waiter can still be disposed right after this returns
   * false, in which case notify() is a no-op.
   */
  isCanceled(): boolean {
    return this.#state.isCanceled
  }

  get status(): NotifyStatus {
    return this.#state.status
  }
}

/**
 * Consumer side of a handoff. Awaitable once.
 */
export class NotifyWaiter<T> implements PromiseLike<T> {
  readonly #state: CompletionState<T>
  #disposed = false
  #waiting = false
  // Rejects the in-flight wait(), if any
  #abortWait: ((err: Error) => void) | undefined

  /**
   * @internal Use Notify.create().
   */
  constructor(state: CompletionState<T>) {
    this.#state = state
  }

  get disposed(): boolean {
    return this.#disposed
  }

  get status(): NotifyStatus {
    return this.#state.status
  }

  /**
   * Check for the value once. Registers `waker` when it is not there yet.
   *
   * @throws {WaiterConsumedError} if the value was already taken
   * @throws {WaiterDisposedError} if the waiter was disposed
   * @throws {WaiterBusyError} if a wait() is in progress
   */
  poll(waker: Waker): Poll<T> {
    if (this.#waiting) {
      throw new WaiterBusyError()
    }
    return this.#poll(waker)
  }

  /**
   * Wait for the value.
   *
   * Rejects with WaiterConsumedError once the value has been taken, with
   * WaiterBusyError while another wait() is pending, and with
   * WaiterDisposedError if the waiter is disposed before the value arrives.
   * A value that is already there, or a misuse error, takes precedence over
   * an already aborted `signal`.
   */
  wait(opts: WaitOptions = {}): Promise<T> {
    if (this.#waiting) {
      return Promise.reject(new WaiterBusyError())
    }

    const { signal } = opts
    this.#waiting = true
    return new Promise<T>((resolve, reject) => {
      let settled = false

      const cleanup = (): void => {
        settled = true
        this.#waiting = false
        this.#abortWait = undefined
        signal?.removeEventListener(`abort`, abortHandler)
      }

      const fail = (err: unknown): void => {
        cleanup()
        reject(err)
      }

      const abortHandler = (): void => {
        fail(new WaitAbortedError(signal?.reason))
        this.dispose()
      }

      const drive = (): void => {
        // Woken after this wait was already settled
        if (settled) return

        let result: Poll<T>
        try {
          result = this.#poll(waker)
        } catch (err) {
          fail(err)
          return
        }

        if (result.ready) {
          cleanup()
          resolve(result.value)
        }
      }

      const waker = createWaker({}, drive)
      drive()
      if (settled) return

      if (signal?.aborted) {
        abortHandler()
        return
      }

      this.#abortWait = fail
      signal?.addEventListener(`abort`, abortHandler, { once: true })
    })
  }

  then<TResult1 = T, TResult2 = never>(
    onfulfilled?: ((value: T) => TResult1 | PromiseLike<TResult1>) | null,
    onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null
  ): Promise<TResult1 | TResult2> {
    return this.wait().then(onfulfilled, onrejected)
  }

  /**
   * Release the waiter. If no value was delivered yet the exchange becomes
   * canceled, and a pending wait() rejects with WaiterDisposedError. Safe to
   * call more than once.
   */
  dispose(): void {
    if (this.#disposed) return
    this.#disposed = true
    this.#state.markCanceledIfIncomplete()
    this.#abortWait?.(new WaiterDisposedError())
  }

  #poll(waker: Waker): Poll<T> {
    if (this.#disposed) {
      throw new WaiterDisposedError()
    }
    return this.#state.poll(waker)
  }
}

/**
 * Run `fn` with `waiter` and dispose the waiter however `fn` exits.
 *
 * @example
 * ```typescript
 * const [notify, waiter] = Notify.create<string>()
 * startJob(notify)
 * const result = await withWaiter(waiter, (w) => w.wait({ signal }))
 * ```
 */
export async function withWaiter<T, R>(
  waiter: NotifyWaiter<T>,
  fn: (waiter: NotifyWaiter<T>) => R | PromiseLike<R>
): Promise<R> {
  try {
    return await fn(waiter)
  } finally {
    waiter.dispose()
  }
}
