/**
 * Mutual exclusion for synchronous critical sections.
 *
 * JavaScript runs one callback at a time, so the lock never blocks. What it
 * enforces is the discipline: a critical section is synchronous, is never
 * re-entered, and a holder that throws leaves the guarded value usable for
 * the next caller.
 */

import { LockReentryError } from "./error"
import { defaultLogger } from "./logger"
import type { Logger } from "./logger"

/**
 * Options for creating a Mutex.
 */
export interface MutexOptions {
  /**
   * Name used as the log prefix and in errors.
   */
  name?: string

  /**
   * Where recovery warnings go.
   */
  logger?: Logger
}

export class Mutex<S> {
  readonly name: string
  readonly #value: S
  readonly #logger: Logger
  #locked = false
  #poisoned = false

  constructor(value: S, opts: MutexOptions = {}) {
    this.name = opts.name ?? `Mutex`
    this.#value = value
    this.#logger = opts.logger ?? defaultLogger
  }

  /**
   * Whether the last critical section threw before releasing the lock.
   */
  get poisoned(): boolean {
    return this.#poisoned
  }

  /**
   * Run `fn` with exclusive access to the guarded value.
   *
   * `fn` must not await: the lock is released as soon as it returns.
   *
   * @throws {LockReentryError} if called from inside another critical section of this lock
   */
  lock<R>(fn: (value: S) => R): R {
    if (this.#locked) {
      throw new LockReentryError(this.name)
    }

    if (this.#poisoned) {
      this.#logger.warn(
        `[${this.name}] Recovering lock after a critical section threw`
      )
      this.#poisoned = false
    }

    this.#locked = true
    let released = false
    try {
      const result = fn(this.#value)
      released = true
      return result
    } finally {
      this.#locked = false
      if (!released) this.#poisoned = true
    }
  }
}
