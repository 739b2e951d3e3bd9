import { PassThrough } from 'node:stream'
import { text } from 'node:stream/consumers'
import { describe, test, expect } from 'vitest'
import { LazyRequestBody } from '../../src/proxy/request-body'

describe('LazyRequestBody', () => {
  test('destroying an unread body leaves the inbound stream usable', async () => {
    const source = new PassThrough()
    source.end('hello world')

    const refused = new LazyRequestBody(source)
    refused.destroy()

    expect(source.destroyed).toBe(false)
    expect(source.readableDidRead).toBe(false)

    const retry = new LazyRequestBody(source)
    expect(await text(retry)).toBe('hello world')
    expect(source.readableDidRead).toBe(true)
  })

  test('relays inbound chunks in order', async () => {
    const source = new PassThrough()
    const body = new LazyRequestBody(source)
    const reading = text(body)

    source.write('a'.repeat(70000))
    source.write('b')
    source.end('c')

    const received = await reading
    expect(received).toHaveLength(70002)
    expect(received.endsWith('abc')).toBe(true)
  })

  test('an inbound error fails the body', async () => {
    const source = new PassThrough()
    const body = new LazyRequestBody(source)
    const reading = text(body)
    await new Promise((resolve) => setImmediate(resolve))

    source.write('partial')
    source.destroy(new Error('client reset'))
    await expect(reading).rejects.toThrow('client reset')
  })
})
