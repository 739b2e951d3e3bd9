import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest'
import {
  AdmissionController,
  AdmissionSlot,
} from '../../src/admission/admission-controller'
import { AdmissionRejectedError } from '../../src/errors/gateway-errors'
import { silentLogger } from '../helpers'

const globalScope = { kind: 'global' } as const

describe('AdmissionController', () => {
  beforeEach(() => {
    vi.useFakeTimers()
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  const deadline = (ms = 5000) => Date.now() + ms

  test('rejects the 11th request at ceiling 10 with zero wait', async () => {
    const admission = new AdmissionController(
      { maxConcurrent: 10, maxWait: 0 },
      silentLogger,
    )
    const slots: AdmissionSlot[] = []
    for (let i = 0; i < 10; i++) {
      slots.push(await admission.acquire(globalScope, deadline()))
    }

    await expect(admission.acquire(globalScope, deadline())).rejects.toThrow(
      'Admission wait expired for global',
    )
    expect(admission.inFlight).toBe(10)
    expect(admission.getStats()).toEqual([
      { scope: 'global', limit: 10, active: 10, queued: 0, rejected: 1 },
    ])
  })

  test('a waiter proceeds when a slot is released', async () => {
    const admission = new AdmissionController(
      { maxConcurrent: 1, maxWait: 1000 },
      silentLogger,
    )
    const first = await admission.acquire(globalScope, deadline())
    const second = admission.acquire(globalScope, deadline())
    expect(admission.getStats()[0]?.queued).toBe(1)

    first.release()
    const slot = await second
    expect(slot.scope).toBe('global')
    expect(admission.inFlight).toBe(1)
  })

  test('serves waiters in arrival order', async () => {
    const admission = new AdmissionController(
      { maxConcurrent: 1 },
      silentLogger,
    )
    const held = await admission.acquire(globalScope, deadline())
    const order: string[] = []
    const first = admission.acquire(globalScope, deadline()).then((slot) => {
      order.push('first')
      return slot
    })
    const second = admission.acquire(globalScope, deadline()).then(() => {
      order.push('second')
    })

    held.release()
    const slot = await first
    slot.release()
    await second
    expect(order).toEqual(['first', 'second'])
  })

  test('sheds arrivals past the queue bound', async () => {
    const admission = new AdmissionController(
      { maxConcurrent: 1, maxQueue: 1 },
      silentLogger,
    )
    await admission.acquire(globalScope, deadline())
    const queued = admission.acquire(globalScope, deadline())

    await expect(admission.acquire(globalScope, deadline())).rejects.toThrow(
      'Admission queue full for global',
    )

    const assertion = expect(queued).rejects.toThrow(AdmissionRejectedError)
    await vi.advanceTimersByTimeAsync(1000)
    await assertion
  })

  test('the wait is bounded by the request deadline', async () => {
    const admission = new AdmissionController(
      { maxConcurrent: 1, maxWait: 10000 },
      silentLogger,
    )
    await admission.acquire(globalScope, deadline())

    const assertion = expect(
      admission.acquire(globalScope, deadline(100)),
    ).rejects.toThrow(AdmissionRejectedError)
    await vi.advanceTimersByTimeAsync(100)
    await assertion
    expect(admission.getStats()[0]).toMatchObject({ queued: 0, rejected: 1 })
  })

  test('an aborted waiter frees its queue position', async () => {
    const admission = new AdmissionController(
      { maxConcurrent: 1 },
      silentLogger,
    )
    const held = await admission.acquire(globalScope, deadline())
    const controller = new AbortController()
    const assertion = expect(
      admission.acquire(globalScope, deadline(), controller.signal),
    ).rejects.toThrow('cancelled')

    controller.abort(new Error('cancelled'))
    await assertion
    held.release()
    expect(admission.getStats()[0]).toMatchObject({ active: 0, queued: 0 })
  })

  test('release is idempotent', async () => {
    const admission = new AdmissionController(
      { maxConcurrent: 2 },
      silentLogger,
    )
    const slot = await admission.acquire(globalScope, deadline())
    await admission.acquire(globalScope, deadline())

    slot.release()
    admission.release(slot)
    expect(slot.isReleased).toBe(true)
    expect(admission.inFlight).toBe(1)
  })

  test('route scopes are independent and limit 0 is unlimited', async () => {
    const admission = new AdmissionController(
      { maxConcurrent: 100, maxWait: 0 },
      silentLogger,
    )
    const users = { kind: 'route', routeId: 'users', limit: 1 } as const
    const open = { kind: 'route', routeId: 'open', limit: 0 } as const

    await admission.acquire(users, deadline())
    await expect(admission.acquire(users, deadline())).rejects.toThrow(
      'Admission wait expired for route:users',
    )
    for (let i = 0; i < 5; i++) {
      await admission.acquire(open, deadline())
    }
    expect(
      admission.getStats().find((s) => s.scope === 'route:open')?.active,
    ).toBe(5)
  })

  test('a raised route limit admits queued waiters', async () => {
    const admission = new AdmissionController({}, silentLogger)
    await admission.acquire(
      { kind: 'route', routeId: 'r', limit: 1 },
      deadline(),
    )
    const queued = admission.acquire(
      { kind: 'route', routeId: 'r', limit: 1 },
      deadline(),
    )

    await admission.acquire({ kind: 'route', routeId: 'r', limit: 3 }, deadline())
    await expect(queued).resolves.toBeInstanceOf(AdmissionSlot)
    expect(admission.getStats()[0]).toMatchObject({
      scope: 'route:r',
      limit: 3,
      active: 3,
    })
  })

  test('route scopes are dropped once nothing holds or awaits them', async () => {
    const admission = new AdmissionController({}, silentLogger)
    for (let port = 40000; port < 40300; port++) {
      const slot = await admission.acquire(
        { kind: 'route', routeId: `service:svc:${port}`, limit: 0 },
        deadline(),
      )
      slot.release()
    }
    expect(admission.getStats()).toEqual([])

    const r = { kind: 'route', routeId: 'r', limit: 1 } as const
    const held = await admission.acquire(r, deadline())
    const queued = admission.acquire(r, deadline())
    held.release()
    const next = await queued
    expect(admission.getStats().map((s) => s.scope)).toEqual(['route:r'])

    next.release()
    expect(admission.getStats()).toEqual([])
  })
})
