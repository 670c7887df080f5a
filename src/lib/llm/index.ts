export { LLMService, DEGRADED_MESSAGE, DEGRADED_PROVIDER_NAME, RESPONSE_RESERVE_TOKENS } from "./service";
export type { LLMServiceConfig } from "./service";
export { ClaudeProvider } from "./providers/claude";
export { OpenAIProvider } from "./providers/openai";
export { BaseProvider } from "./providers/base";
export type { ProviderOptions } from "./providers/base";
export {
  InMemoryConversationRepository,
  StaticSystemPromptProvider,
  DEFAULT_SYSTEM_PROMPT,
} from "./conversation";
export { ProviderRegistry } from "./registry";
export { FailoverController } from "./failover";
export { ModelRefreshScheduler, findUpgrade } from "./model-refresh";
export type { ModelRefreshOptions, RefreshSummary } from "./model-refresh";
export { ToolCallProcessor, detectToolInvocations, parseToolArguments } from "./tool-calls";
export type { DetectedToolInvocation } from "./tool-calls";
export {
  estimateTextTokens,
  estimateMessageTokens,
  estimateConversationTokens,
  trimConversation,
} from "./tokens";
export {
  FatalOrchestrationError,
  NoProviderAvailableError,
  NoVisionProviderError,
  ConversationNotFoundError,
  ProviderError,
} from "./errors";
export type {
  ChunkHandler,
  Conversation,
  ConversationRepository,
  LLMAttemptLog,
  LLMProvider,
  LLMResponse,
  Message,
  MessageRole,
  Model,
  NewConversationOptions,
  OrchestratedResponse,
  ProviderStatus,
  SendOptions,
  SystemPromptProvider,
  ToolCall,
  ToolDefinition,
  ToolExecutor,
  ToolResult,
} from "./types";
