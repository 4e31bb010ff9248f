/**
 * Generator: the `generate(prompt, context, options) -> text` capability.
 *
 * Wraps an LLMProvider with the configured timeout and retry/backoff. Context,
 * when present, is placed ahead of the prompt inside a delimited block so the
 * model can tell source material from instructions.
 */

import { callCapability } from '../common/index.js'
import type { Result, RetryPolicy } from '../common/index.js'
import type { KBForgeError } from '../common/index.js'
import type { GenerationConfig } from '../config/index.js'
import type { LLMProvider } from './provider.js'
import { createProvider } from './provider-factory.js'

export interface GenerateOptions {
  systemPrompt?: string
  maxTokens?: number
  signal?: AbortSignal
  /** Label used in logs and error messages. */
  operation?: string
}

export interface TextGenerator {
  generate(prompt: string, context: string, options?: GenerateOptions): Promise<Result<string, KBForgeError>>
}

export interface GeneratorOptions {
  timeoutMs: number
  retry: RetryPolicy
  sleep?: (ms: number) => Promise<void>
}

const DEFAULT_SYSTEM_PROMPT = 'You are a principal engineer writing precise, well-structured technical knowledge-base articles in markdown.'

export function composeUserMessage(prompt: string, context: string): string {
  if (!context.trim()) return prompt
  return `<context>\n${context}\n</context>\n\n${prompt}`
}

export class Generator implements TextGenerator {
  constructor(
    private readonly provider: LLMProvider,
    private readonly options: GeneratorOptions,
  ) {}

  static fromConfig(config: GenerationConfig): Generator {
    return new Generator(createProvider(config), {
      timeoutMs: config.timeoutMs,
      retry: config.retry,
    })
  }

  get providerName(): string {
    return this.provider.name
  }

  async generate(prompt: string, context: string, options: GenerateOptions = {}): Promise<Result<string, KBForgeError>> {
    const operation = options.operation ?? 'generate'
    const startTime = Date.now()
    const result = await callCapability(
      {
        label: `${this.provider.name}:${operation}`,
        timeoutMs: this.options.timeoutMs,
        retry: this.options.retry,
        signal: options.signal,
        sleep: this.options.sleep,
      },
      (signal) => this.provider.chatComplete(
        [{ role: 'user', content: composeUserMessage(prompt, context) }],
        options.systemPrompt ?? DEFAULT_SYSTEM_PROMPT,
        { signal, maxTokens: options.maxTokens },
      ),
    )

    const elapsed = Date.now() - startTime
    if (result.ok) {
      console.log(`[generation] ${operation} via ${this.provider.name}/${this.provider.model}: ${result.value.length} chars in ${elapsed}ms`)
    } else {
      console.error(`[generation] ${operation} failed after ${elapsed}ms: ${result.error.message}`)
    }
    return result
  }
}
