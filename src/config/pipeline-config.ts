/**
 * Pipeline Configuration
 *
 * Resolves the translator settings from three layers, later layers winning:
 * built-in defaults, an optional JSON file (~/.kql-pilot/config.json or
 * KQL_PILOT_CONFIG), and environment variables.
 *
 * Every field is validated with zod. Invalid or out-of-range values fall
 * back to their default instead of failing the load.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { z } from 'zod';
import { DEFAULTS } from './defaults.js';

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

/** Corpus files shipped with the package */
const BUNDLED_CORPUS_DIR = path.resolve(__dirname, '../../data/corpus');

// === Field schemas ===

function blankToUndefined(value: unknown): unknown {
  if (value === null) return undefined;
  if (typeof value === 'string' && value.trim() === '') return undefined;
  return value;
}

function parseBoolean(value: unknown): unknown {
  const raw = blankToUndefined(value);
  if (typeof raw !== 'string') return raw;
  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return raw;
}

function intSetting(defaultValue: number, min: number, max: number) {
  return z
    .preprocess(blankToUndefined, z.coerce.number().int().min(min).max(max).default(defaultValue))
    .catch(defaultValue);
}

function numberSetting(defaultValue: number, min: number, max: number) {
  return z
    .preprocess(blankToUndefined, z.coerce.number().min(min).max(max).default(defaultValue))
    .catch(defaultValue);
}

function booleanSetting(defaultValue: boolean) {
  return z.preprocess(parseBoolean, z.boolean().default(defaultValue)).catch(defaultValue);
}

const optionalString = z
  .preprocess(blankToUndefined, z.string().trim().min(1).optional())
  .catch(undefined);

function stringSetting(defaultValue: string) {
  return z
    .preprocess(blankToUndefined, z.string().trim().min(1).default(defaultValue))
    .catch(defaultValue);
}

const configSchema = z.object({
  azureEndpoint: optionalString,
  azureApiKey: optionalString,
  deployment: stringSetting(DEFAULTS.DEPLOYMENT),
  apiVersion: optionalString,
  modelFamily: z
    .preprocess(blankToUndefined, z.enum(['standard', 'constrained']).optional())
    .catch(undefined),

  maxOutputTokens: intSetting(DEFAULTS.MAX_OUTPUT_TOKENS, 1, 32768),
  maxOutputTokensCeiling: intSetting(DEFAULTS.MAX_OUTPUT_TOKENS_CEILING, 1, 32768),
  temperature: numberSetting(DEFAULTS.TEMPERATURE, 0, 2),
  topP: numberSetting(DEFAULTS.TOP_P, 0, 1),
  temperatureIncrement: numberSetting(DEFAULTS.TEMPERATURE_INCREMENT, 0, 1),
  temperatureMax: numberSetting(DEFAULTS.TEMPERATURE_MAX, 0, 2),
  adaptTemperature: booleanSetting(true),
  allowEscalation: booleanSetting(true),

  chatMaxRetries: intSetting(DEFAULTS.CHAT_MAX_RETRIES, 1, 10),
  retryBaseDelayMs: intSetting(DEFAULTS.RETRY_BASE_DELAY_MS, 0, 60000),
  requestTimeoutMs: intSetting(DEFAULTS.REQUEST_TIMEOUT_MS, 1000, 600000),
  translationDeadlineMs: intSetting(DEFAULTS.TRANSLATION_DEADLINE_MS, 1000, 3600000),
  pipelineMaxAttempts: intSetting(DEFAULTS.PIPELINE_MAX_ATTEMPTS, 1, 10),
  promptTokenLimit: intSetting(DEFAULTS.PROMPT_TOKEN_LIMIT, 256, 200000),
  fallbackMinOverlap: intSetting(DEFAULTS.FALLBACK_MIN_OVERLAP, 1, 100),
  annotateResults: booleanSetting(true),

  corpusDir: stringSetting(BUNDLED_CORPUS_DIR),
  openaiApiKey: optionalString,
  embeddingModel: stringSetting(DEFAULTS.EMBEDDING_MODEL),
  embeddingDeployment: optionalString,
  embeddingTimeoutMs: intSetting(DEFAULTS.EMBEDDING_TIMEOUT_MS, 100, 600000),

  chatEventLog: booleanSetting(false),
  chatEventLogPath: stringSetting(DEFAULTS.CHAT_EVENT_LOG_PATH),
  chatEventFullContent: booleanSetting(false),
  logLevel: z
    .preprocess(
      (value) => {
        const raw = blankToUndefined(value);
        return typeof raw === 'string' ? raw.trim().toLowerCase() : raw;
      },
      z.enum(LOG_LEVELS).default('warn')
    )
    .catch('warn'),
});

export type PipelineConfig = z.infer<typeof configSchema>;

/**
 * Environment variable backing each setting.
 */
export const CONFIG_ENV_VARS: Record<keyof PipelineConfig, string> = {
  azureEndpoint: 'AZURE_OPENAI_ENDPOINT',
  azureApiKey: 'AZURE_OPENAI_KEY',
  deployment: 'AZURE_OPENAI_DEPLOYMENT',
  apiVersion: 'AZURE_OPENAI_API_VERSION',
  modelFamily: 'KQL_MODEL_FAMILY',
  maxOutputTokens: 'KQL_MAX_OUTPUT_TOKENS',
  maxOutputTokensCeiling: 'KQL_MAX_OUTPUT_TOKENS_CEILING',
  temperature: 'KQL_TEMPERATURE',
  topP: 'KQL_TOP_P',
  temperatureIncrement: 'KQL_TEMPERATURE_INCREMENT',
  temperatureMax: 'KQL_TEMPERATURE_MAX',
  adaptTemperature: 'KQL_ADAPT_TEMPERATURE',
  allowEscalation: 'KQL_ALLOW_ESCALATION',
  chatMaxRetries: 'KQL_CHAT_MAX_RETRIES',
  retryBaseDelayMs: 'KQL_RETRY_BASE_DELAY_MS',
  requestTimeoutMs: 'KQL_REQUEST_TIMEOUT_MS',
  translationDeadlineMs: 'KQL_TRANSLATION_DEADLINE_MS',
  pipelineMaxAttempts: 'KQL_PIPELINE_MAX_ATTEMPTS',
  promptTokenLimit: 'PROMPT_TOKEN_LIMIT',
  fallbackMinOverlap: 'KQL_FALLBACK_MIN_OVERLAP',
  annotateResults: 'KQL_ANNOTATE_RESULTS',
  corpusDir: 'KQL_CORPUS_DIR',
  openaiApiKey: 'OPENAI_API_KEY',
  embeddingModel: 'EMBEDDING_MODEL',
  embeddingDeployment: 'AZURE_OPENAI_EMBEDDING_DEPLOYMENT',
  embeddingTimeoutMs: 'KQL_EMBEDDING_TIMEOUT_MS',
  chatEventLog: 'CHAT_EVENT_LOG',
  chatEventLogPath: 'CHAT_EVENT_LOG_PATH',
  chatEventFullContent: 'CHAT_EVENT_FULL_CONTENT',
  logLevel: 'LOG_LEVEL',
};

export interface LoadConfigOptions {
  /** Environment to read (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Config file to read; null skips the file layer */
  configPath?: string | null;
}

/**
 * Get the path to the config directory
 */
export function getConfigDir(): string {
  return path.join(os.homedir(), '.kql-pilot');
}

/**
 * Get the path to the config file
 */
export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.KQL_PILOT_CONFIG || path.join(getConfigDir(), 'config.json');
}

function readConfigFile(configPath: string): Record<string, unknown> {
  if (!fs.existsSync(configPath)) {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
      return { ...parsed };
    }
    console.warn(`Warning: Config file ${configPath} is not a JSON object, using defaults`);
  } catch (error) {
    console.warn(
      `Warning: Could not parse config file, using defaults: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return {};
}

function readEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const values: Record<string, string> = {};
  for (const [key, envVar] of Object.entries(CONFIG_ENV_VARS)) {
    const value = env[envVar];
    if (value !== undefined && value.trim() !== '') {
      values[key] = value;
    }
  }
  return values;
}

/**
 * Load the pipeline configuration.
 * Never throws: unusable values are replaced by their defaults.
 */
export function loadConfig(options: LoadConfigOptions = {}): PipelineConfig {
  const env = options.env ?? process.env;
  const configPath = options.configPath === undefined ? getConfigPath(env) : options.configPath;
  const fileConfig = configPath ? readConfigFile(configPath) : {};

  const config = configSchema.parse({ ...fileConfig, ...readEnv(env) });

  // Keep dependent bounds coherent
  if (config.maxOutputTokensCeiling < config.maxOutputTokens) {
    config.maxOutputTokensCeiling = config.maxOutputTokens;
  }
  if (config.temperatureMax < config.temperature) {
    config.temperatureMax = config.temperature;
  }

  return config;
}

/**
 * Get all valid config keys
 */
export function getConfigKeys(): (keyof PipelineConfig)[] {
  return Object.keys(configSchema.shape).filter(isValidConfigKey);
}

/**
 * Check if a key is a valid config key
 */
export function isValidConfigKey(key: string): key is keyof PipelineConfig {
  return key in CONFIG_ENV_VARS;
}
