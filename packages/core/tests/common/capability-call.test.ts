import { describe, it, expect } from 'vitest'
import { Ok, Err, KBForgeError, callCapability, withTimeout } from '../../src/common/index.js'

describe('withTimeout', () => {
  it('returns the value of a call that finishes in time', async () => {
    const result = await withTimeout('fast', 1000, async () => 'done')
    expect(result).toEqual({ ok: true, value: 'done' })
  })

  it('reports a timed-out call as a retryable capability error and aborts it', async () => {
    let aborted = false
    const result = await withTimeout('slow', 10, (signal) => new Promise<string>(() => {
      signal.addEventListener('abort', () => { aborted = true })
    }))
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.code).toBe('CAPABILITY_ERROR')
      expect(result.error.message).toBe('slow timed out after 10ms')
      expect(result.error.retryable).toBe(true)
    }
    expect(aborted).toBe(true)
  })

  it('wraps a rejection as a capability error', async () => {
    const result = await withTimeout('embed', 1000, async () => { throw new Error('ECONNRESET') })
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.message).toBe('embed failed: ECONNRESET')
  })
})

describe('callCapability', () => {
  it('makes maxRetries + 1 attempts with exponential backoff', async () => {
    const delays: number[] = []
    let attempts = 0
    const result = await callCapability<string>(
      { label: 'gen', timeoutMs: 1000, retry: { maxRetries: 2, baseDelayMs: 5 }, sleep: async (ms) => { delays.push(ms) } },
      async () => {
        attempts++
        return Err(KBForgeError.capability('rate limited'))
      },
    )
    expect(attempts).toBe(3)
    expect(delays).toEqual([5, 10])
    expect(result.ok).toBe(false)
  })

  it('stops at the first success', async () => {
    let attempts = 0
    const result = await callCapability<number>(
      { label: 'gen', timeoutMs: 1000, retry: { maxRetries: 3, baseDelayMs: 0 }, sleep: async () => {} },
      async () => {
        attempts++
        return attempts < 2 ? Err(KBForgeError.capability('flaky')) : Ok(attempts)
      },
    )
    expect(result).toEqual({ ok: true, value: 2 })
  })

  it('does not retry non-retryable errors', async () => {
    let attempts = 0
    const result = await callCapability<string>(
      { label: 'gen', timeoutMs: 1000, retry: { maxRetries: 5, baseDelayMs: 0 } },
      async () => {
        attempts++
        return Err(KBForgeError.parse('not json'))
      },
    )
    expect(attempts).toBe(1)
    if (!result.ok) expect(result.error.code).toBe('PARSE_ERROR')
  })

  it('returns a cancelled error without calling when the signal is already aborted', async () => {
    const controller = new AbortController()
    controller.abort()
    let called = false
    const result = await callCapability<string>(
      { label: 'embed', timeoutMs: 1000, signal: controller.signal },
      async () => {
        called = true
        return Ok('x')
      },
    )
    expect(called).toBe(false)
    if (!result.ok) expect(result.error.message).toBe('embed cancelled')
  })
})
