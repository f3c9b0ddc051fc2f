/**
 * Notify Error Classes
 */

/**
 * Error thrown when a waiter is awaited again after it already yielded its value.
 */
export class WaiterConsumedError extends Error {
  constructor(
    message = `Waiter was awaited after its value had already been taken`
  ) {
    super(message)
    this.name = `WaiterConsumedError`
  }
}

/**
 * Error thrown when a waiter is awaited by more than one task at a time.
 */
export class WaiterBusyError extends Error {
  constructor(message = `Waiter is already being awaited by another task`) {
    super(message)
    this.name = `WaiterBusyError`
  }
}

/**
 * Error thrown when a disposed waiter is polled or awaited.
 */
export class WaiterDisposedError extends Error {
  constructor(message = `Waiter has been disposed`) {
    super(message)
    this.name = `WaiterDisposedError`
  }
}

/**
 * Error thrown when a wait() is aborted through its AbortSignal.
 */
export class WaitAbortedError extends Error {
  constructor(reason?: unknown) {
    super(`Wait aborted`, { cause: reason })
    this.name = `WaitAbortedError`
  }
}

/**
 * Error thrown when a lock is acquired again from inside its own critical section.
 */
export class LockReentryError extends Error {
  constructor(name: string) {
    super(`${name} lock was acquired again from inside its critical section`)
    this.name = `LockReentryError`
  }
}
