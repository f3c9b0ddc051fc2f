/**
 * Tests for CompletionState.
 */

import { describe, expect, it } from "vitest"
import { CompletionState, WaiterConsumedError } from "../src/index"
import { CountingWaker, createTestLogger } from "./support/test-helpers"
import type { Waker } from "../src/index"

// ============================================================================
// complete()
// ============================================================================

describe(`CompletionState complete()`, () => {
  it(`should start pending`, () => {
    const state = CompletionState.create<number>()
    expect(state.status).toBe(`pending`)
    expect(state.isCompleted).toBe(false)
    expect(state.isCanceled).toBe(false)
  })

  it(`should store the first value and report the winning write`, () => {
    const state = CompletionState.create<number>({ logger: createTestLogger() })
    expect(state.complete(1)).toBe(true)
    expect(state.complete(2)).toBe(false)
    expect(state.status).toBe(`completed`)
    expect(state.poll(new CountingWaker())).toEqual({ ready: true, value: 1 })
  })

  it(`should wake the registered waker once`, () => {
    const state = CompletionState.create<string>({ logger: createTestLogger() })
    const waker = new CountingWaker()
    expect(state.poll(waker)).toEqual({ ready: false })

    state.complete(`done`)
    state.complete(`again`)

    expect(waker.wakes).toBe(1)
  })

  it(`should wake outside the lock so the waker can poll again`, () => {
    const state = CompletionState.create<number>()
    const seen: Array<unknown> = []
    const waker: Waker = {
      wake: () => {
        seen.push(state.poll(waker))
      },
      willWake: () => false,
    }

    state.registerWaiter(waker)
    state.complete(5)

    expect(seen).toEqual([{ ready: true, value: 5 }])
  })

  it(`should deliver undefined as a value`, () => {
    const state = CompletionState.create<undefined>()
    state.complete(undefined)
    expect(state.poll(new CountingWaker())).toEqual({
      ready: true,
      value: undefined,
    })
  })

  it(`should log late completions at debug level`, () => {
    const logger = createTestLogger()
    const state = CompletionState.create<number>({ name: `Job`, logger })
    state.complete(1)
    state.complete(2)
    expect(logger.debug).toHaveBeenCalledWith(
      `[Job] Ignoring completion, already completed`
    )
  })
})

// ============================================================================
// poll() and registerWaiter()
// ============================================================================

describe(`CompletionState poll()`, () => {
  it(`should take the value only once`, () => {
    const state = CompletionState.create<number>()
    state.complete(7)
    expect(state.poll(new CountingWaker())).toEqual({ ready: true, value: 7 })
    expect(() => state.poll(new CountingWaker())).toThrow(WaiterConsumedError)
  })

  it(`should keep the stored waker when the same task polls again`, () => {
    const state = CompletionState.create<number>()
    const task = {}
    const first = new CountingWaker(task)
    const second = new CountingWaker(task)

    state.poll(first)
    state.poll(second)
    state.complete(1)

    expect(first.wakes).toBe(1)
    expect(second.wakes).toBe(0)
  })

  it(`should replace the stored waker when another task polls`, () => {
    const state = CompletionState.create<number>()
    const first = new CountingWaker()
    const second = new CountingWaker()

    state.poll(first)
    state.registerWaiter(second)
    state.complete(1)

    expect(first.wakes).toBe(0)
    expect(second.wakes).toBe(1)
  })

  it(`should not poison the lock when the value was already taken`, () => {
    const logger = createTestLogger()
    const state = CompletionState.create<number>({ logger })
    state.complete(1)
    state.poll(new CountingWaker())
    expect(() => state.poll(new CountingWaker())).toThrow(WaiterConsumedError)

    expect(state.status).toBe(`completed`)
    expect(logger.warn).not.toHaveBeenCalled()
  })
})

// ============================================================================
// markCanceledIfIncomplete()
// ============================================================================

describe(`CompletionState markCanceledIfIncomplete()`, () => {
  it(`should cancel a pending state`, () => {
    const state = CompletionState.create<number>()
    state.markCanceledIfIncomplete()
    expect(state.isCanceled).toBe(true)
    expect(state.status).toBe(`canceled`)
  })

  it(`should drop the stored waker`, () => {
    const state = CompletionState.create<number>({ logger: createTestLogger() })
    const waker = new CountingWaker()
    state.poll(waker)
    state.markCanceledIfIncomplete()
    state.complete(1)
    expect(waker.wakes).toBe(0)
  })

  it(`should ignore completion after cancellation`, () => {
    const logger = createTestLogger()
    const state = CompletionState.create<number>({ logger })
    state.markCanceledIfIncomplete()

    expect(state.complete(1)).toBe(false)
    expect(state.isCompleted).toBe(false)
    expect(state.isCanceled).toBe(true)
    expect(logger.debug).toHaveBeenCalledWith(
      `[Notify] Dropping value, waiter was canceled`
    )
  })

  it(`should not cancel a completed state`, () => {
    const state = CompletionState.create<number>()
    state.complete(1)
    state.markCanceledIfIncomplete()
    expect(state.isCanceled).toBe(false)
    expect(state.status).toBe(`completed`)
  })
})
