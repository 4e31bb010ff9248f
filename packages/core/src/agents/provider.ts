/**
 * LLM provider interface: the generation capability.
 *
 * All providers (Anthropic, OpenAI, Ollama) implement LLMProvider. chatComplete
 * never throws: transport, quota and timeout failures come back as
 * CAPABILITY_ERROR results, rejected credentials as CONFIGURATION_ERROR.
 */

import type { Result } from '../common/index.js'
import { KBForgeError, errorMessage } from '../common/index.js'

export interface ChatMessage {
  role: 'user' | 'assistant'
  content: string
}

export interface ChatOptions {
  signal?: AbortSignal
  maxTokens?: number
}

export interface LLMProvider {
  readonly name: string
  readonly model: string
  chatComplete(
    messages: ChatMessage[],
    systemPrompt: string,
    options?: ChatOptions,
  ): Promise<Result<string, KBForgeError>>
}

/**
 * Map an SDK error onto the error taxonomy. Rejected credentials are a
 * configuration problem; everything else (network, 429, 5xx, abort) is retryable.
 */
export function classifyProviderError(provider: string, err: unknown): KBForgeError {
  const message = errorMessage(err)
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    if (err.status === 401 || err.status === 403) {
      return KBForgeError.configuration(`${provider} rejected credentials (${err.status}): ${message}`)
    }
  }
  return KBForgeError.capability(`${provider}: ${message}`)
}
