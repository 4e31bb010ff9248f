/**
 * Timeout and retry wrapper for capability calls (generation, embedding, vector store).
 * A call that exceeds its timeout is aborted and reported as a retryable CAPABILITY_ERROR.
 */

import { Ok, Err } from './result.js'
import type { Result } from './result.js'
import { KBForgeError, errorMessage } from './errors.js'

export interface RetryPolicy {
  /** Retries after the first attempt. 0 disables retrying. */
  maxRetries: number
  /** First backoff delay; doubles on each retry. */
  baseDelayMs: number
}

export interface CapabilityCallOptions {
  label: string
  timeoutMs: number
  retry?: RetryPolicy
  signal?: AbortSignal
  /** Injected for tests. */
  sleep?: (ms: number) => Promise<void>
}

const defaultSleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms))

/** Run `fn` once, aborting it after `timeoutMs`. Rejections become CAPABILITY_ERRORs. */
export async function withTimeout<T>(
  label: string,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>,
  outer?: AbortSignal,
): Promise<Result<T, KBForgeError>> {
  const controller = new AbortController()
  const onOuterAbort = (): void => controller.abort()
  outer?.addEventListener('abort', onOuterAbort, { once: true })

  let timer: ReturnType<typeof setTimeout> | undefined
  const timedOut = new Promise<Result<T, KBForgeError>>(resolve => {
    timer = setTimeout(() => {
      controller.abort()
      resolve(Err(KBForgeError.capability(`${label} timed out after ${timeoutMs}ms`)))
    }, timeoutMs)
  })

  const attempt = fn(controller.signal).then(
    (value): Result<T, KBForgeError> => Ok(value),
    (err: unknown): Result<T, KBForgeError> =>
      Err(err instanceof KBForgeError ? err : KBForgeError.capability(`${label} failed: ${errorMessage(err)}`)),
  )

  try {
    return await Promise.race([attempt, timedOut])
  } finally {
    clearTimeout(timer)
    outer?.removeEventListener('abort', onOuterAbort)
  }
}

/**
 * Run a capability call with timeout and exponential backoff.
 * Only retryable errors are retried; an aborted outer signal stops retrying.
 */
export async function callCapability<T>(
  options: CapabilityCallOptions,
  fn: (signal: AbortSignal) => Promise<Result<T, KBForgeError>>,
): Promise<Result<T, KBForgeError>> {
  const { label, timeoutMs, retry = { maxRetries: 0, baseDelayMs: 0 }, signal, sleep = defaultSleep } = options

  let last: Result<T, KBForgeError> = Err(KBForgeError.capability(`${label} was not attempted`))
  for (let attempt = 0; attempt <= retry.maxRetries; attempt++) {
    if (signal?.aborted) {
      return Err(KBForgeError.capability(`${label} cancelled`))
    }
    if (attempt > 0) {
      const delay = retry.baseDelayMs * 2 ** (attempt - 1)
      console.warn(`[capability] ${label} retry ${attempt}/${retry.maxRetries} in ${delay}ms: ${last.ok ? '' : last.error.message}`)
      await sleep(delay)
    }

    const outcome = await withTimeout(label, timeoutMs, fn, signal)
    last = outcome.ok ? outcome.value : outcome
    if (last.ok || !last.error.retryable) return last
  }
  return last
}
