/**
 * Typed error class for kbforge operations.
 *
 * CAPABILITY_ERROR is the only retryable code: network, quota and timeout
 * failures of the generation, embedding and vector-store capabilities.
 */

export type ErrorCode =
  | 'CAPABILITY_ERROR'
  | 'PARSE_ERROR'
  | 'QUALITY_ERROR'
  | 'CONFIGURATION_ERROR'
  | 'NOT_FOUND'
  | 'DB_ERROR'
  | 'IO_ERROR'
  | 'VALIDATION_ERROR'
  | 'INTERNAL_ERROR'

export class KBForgeError extends Error {
  readonly code: ErrorCode

  constructor(code: ErrorCode, message: string) {
    super(message)
    this.name = 'KBForgeError'
    this.code = code
  }

  get retryable(): boolean {
    return this.code === 'CAPABILITY_ERROR'
  }

  static capability(message: string): KBForgeError {
    return new KBForgeError('CAPABILITY_ERROR', message)
  }

  static parse(message: string): KBForgeError {
    return new KBForgeError('PARSE_ERROR', message)
  }

  static quality(message: string): KBForgeError {
    return new KBForgeError('QUALITY_ERROR', message)
  }

  static configuration(message: string): KBForgeError {
    return new KBForgeError('CONFIGURATION_ERROR', message)
  }

  static notFound(entity: string, id: string): KBForgeError {
    return new KBForgeError('NOT_FOUND', `${entity} not found: ${id}`)
  }

  static db(message: string): KBForgeError {
    return new KBForgeError('DB_ERROR', message)
  }

  static io(message: string): KBForgeError {
    return new KBForgeError('IO_ERROR', message)
  }

  static internal(message: string): KBForgeError {
    return new KBForgeError('INTERNAL_ERROR', message)
  }

  static validation(message: string): KBForgeError {
    return new KBForgeError('VALIDATION_ERROR', message)
  }
}

/** Message of an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
