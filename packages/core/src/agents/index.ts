/**
 * Agents: generation capability: LLM providers and the timeout/retry Generator.
 */

export type { ChatMessage, ChatOptions, LLMProvider } from './provider.js'
export { classifyProviderError } from './provider.js'

export { AnthropicProvider } from './anthropic-provider.js'
export type { AnthropicProviderOptions } from './anthropic-provider.js'
export { OpenAIProvider } from './openai-provider.js'
export type { OpenAIProviderOptions } from './openai-provider.js'
export { OllamaProvider, normalizeOllamaUrl, DEFAULT_OLLAMA_URL } from './ollama-provider.js'
export type { OllamaProviderOptions } from './ollama-provider.js'

export { createProvider, DEFAULT_MODELS } from './provider-factory.js'

export { Generator, composeUserMessage } from './generator.js'
export type { TextGenerator, GenerateOptions, GeneratorOptions } from './generator.js'
