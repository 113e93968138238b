/**
 * kql-pilot
 *
 * Natural-language to KQL translation pipeline.
 *
 * @example
 * import { createKqlTranslator } from 'kql-pilot';
 *
 * const translator = createKqlTranslator();
 * const result = await translator.translateToResult('failed requests in the last hour');
 * if (result.ok) console.log(result.query);
 */

// Pipeline
export {
  KqlTranslator,
  createKqlTranslator,
  renderTranslation,
  findFallbackExample,
  ERROR_SENTINEL,
  type KqlTranslatorDeps,
  type CreateKqlTranslatorOptions,
} from './services/kql-translator.js';

// Building blocks
export * from './services/kql/index.js';
export * from './services/corpus/index.js';
export * from './services/embeddings/index.js';
export * from './llm/index.js';

// Core and configuration
export * from './core/index.js';
export {
  loadConfig,
  getConfigPath,
  getConfigKeys,
  isValidConfigKey,
  CONFIG_ENV_VARS,
  type PipelineConfig,
  type LoadConfigOptions,
} from './config/pipeline-config.js';
export {
  resolveAzureChatSettings,
  detectModelFamily,
  normalizeEndpoint,
  maskKey,
  chatCompletionsUrl,
  describeChatSettings,
  API_VERSIONS,
  type AzureChatSettings,
} from './config/llm-config.js';
export { DOMAIN_DEFINITIONS, type DomainDefinition } from './config/domains.js';
export { DEFAULTS } from './config/defaults.js';
