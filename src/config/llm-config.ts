/**
 * Configuration for the Azure OpenAI chat integration
 */
import type { ModelFamily } from '../core/types.js';
import type { PipelineConfig } from './pipeline-config.js';

export const API_VERSIONS: Record<ModelFamily, string> = {
  standard: '2024-09-01-preview',
  // o-series deployments need the newer surface for max_completion_tokens
  constrained: '2024-12-01-preview',
};

export interface AzureChatSettings {
  endpoint: string;
  apiKey: string;
  deployment: string;
  apiVersion: string;
  /** True when AZURE_OPENAI_API_VERSION overrode the adaptive choice */
  apiVersionOverridden: boolean;
  modelFamily: ModelFamily;
}

/**
 * Detect o-series reasoning deployments (o1, o3-mini, o4-mini, ...).
 * `gpt-4o` is a standard model: the `o` has no digit after it.
 */
export function detectModelFamily(deployment: string): ModelFamily {
  return /(?:^|[^a-z0-9])o[1-9]/.test(deployment.toLowerCase()) ? 'constrained' : 'standard';
}

/**
 * Add a scheme when missing and drop trailing slashes.
 */
export function normalizeEndpoint(endpoint: string): string {
  const trimmed = endpoint.trim();
  const withScheme = /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
  return withScheme.replace(/\/+$/, '');
}

/**
 * Render a credential for diagnostics without leaking it.
 */
export function maskKey(key: string | undefined): string {
  if (!key) return '';
  return `${key.slice(0, 4)}***len=${key.length}`;
}

/**
 * Resolve chat settings from the pipeline config.
 * Returns null when the endpoint or credential is missing.
 */
export function resolveAzureChatSettings(config: PipelineConfig): AzureChatSettings | null {
  if (!config.azureEndpoint || !config.azureApiKey) {
    return null;
  }

  const modelFamily = config.modelFamily ?? detectModelFamily(config.deployment);

  return {
    endpoint: normalizeEndpoint(config.azureEndpoint),
    apiKey: config.azureApiKey,
    deployment: config.deployment,
    apiVersion: config.apiVersion ?? API_VERSIONS[modelFamily],
    apiVersionOverridden: config.apiVersion !== undefined,
    modelFamily,
  };
}

/**
 * Full chat-completions URL, used for diagnostics and event logs.
 */
export function chatCompletionsUrl(settings: AzureChatSettings): string {
  return `${settings.endpoint}/openai/deployments/${settings.deployment}/chat/completions?api-version=${settings.apiVersion}`;
}

/**
 * One-line description of the chat settings with the key masked.
 */
export function describeChatSettings(settings: AzureChatSettings): string {
  return [
    `endpoint=${settings.endpoint}`,
    `deployment=${settings.deployment}`,
    `family=${settings.modelFamily}`,
    `apiVersion=${settings.apiVersion}${settings.apiVersionOverridden ? ' (override)' : ''}`,
    `key=${maskKey(settings.apiKey)}`,
  ].join(' ');
}
