/**
 * LLM Module
 *
 * Entry point for the chat-completion layer.
 */

// Types
export type {
  ChatMessage,
  ChatPayload,
  ChatTransport,
  TransportRequestOptions,
  TransportFailure,
  BackoffKind,
  CompletionExtraction,
} from './types.js';

export { buildChatPayload } from './request-builder.js';
export { extractCompletion } from './response-parser.js';

// Transport
export {
  AzureOpenAIChatTransport,
  classifyTransportError,
} from './providers/azure-openai-transport.js';

// Orchestration
export {
  ChatOrchestrator,
  maybeEscalateTokens,
  maybeEscalateTemperature,
  type ChatOrchestratorOptions,
  type ChatRunOptions,
} from './chat-orchestrator.js';

export {
  ChatEventLogger,
  buildChatEvent,
  hashContent,
  type ChatEvent,
  type ChatEventContext,
  type ChatEventLoggerOptions,
} from './chat-events.js';
