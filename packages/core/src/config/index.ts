/**
 * Configuration: schema, defaults, file/env loading, fail-fast checks.
 */

export {
  AppConfigSchema,
  GenerationConfigSchema,
  EmbeddingConfigSchema,
  SourceConfigSchema,
  ProviderNameSchema,
  defaultConfig,
} from './schemas.js'
export type {
  AppConfig,
  GenerationConfig,
  EmbeddingConfig,
  SourceConfig,
  MarkdownSourceConfig,
  DataSourceConfig,
  WikiSourceConfig,
  RetrievalConfig,
  QualityConfig,
  PipelineConfig,
  BatchConfig,
  ProviderName,
  EmbeddingProviderName,
} from './schemas.js'

export { loadConfig, applyEnvOverrides, requireCapabilities, DEFAULT_CONFIG_FILE } from './loader.js'
export type { LoadConfigOptions, LoadedConfig, Capability } from './loader.js'
