/**
 * Common utilities: Result pattern, typed errors, hashing, bounded concurrency,
 * capability timeouts and retries.
 */

export { Ok, Err, unwrap, isOk, isErr, mapErr } from './result.js'
export type { Result } from './result.js'

export { KBForgeError, errorMessage } from './errors.js'
export type { ErrorCode } from './errors.js'

export { TimestampSchema, FilePathSchema, SourceNameSchema } from './schemas.js'

export { computeContentHash, titleToSlug } from './hash.js'

export { Semaphore, mapSettled } from './concurrency.js'
export type { Settled } from './concurrency.js'

export { withTimeout, callCapability } from './capability-call.js'
export type { RetryPolicy, CapabilityCallOptions } from './capability-call.js'
