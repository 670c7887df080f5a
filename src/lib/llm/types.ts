export type MessageRole = "system" | "user" | "assistant" | "tool";

export interface Message {
  role: MessageRole;
  content: string;
  /** Set on tool-role messages */
  toolName?: string;
  timestamp?: string;
}

export interface Model {
  readonly id: string;
  readonly name: string;
  readonly maxContextLength: number;
  readonly supportsToolCalls: boolean;
  readonly supportsVision: boolean;
}

export interface ToolCall {
  id: string;
  name: string;
  /** Serialized argument payload, usually JSON */
  arguments: string;
}

export interface ToolDefinition {
  name: string;
  description: string;
  /** JSON schema describing the tool's arguments */
  parameters: Record<string, unknown>;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface LLMResponse {
  content: string;
  provider: string;
  model: string;
  toolCalls: ToolCall[];
  usage: TokenUsage;
  latencyMs: number;
  conversationId?: string;
}

export type ChunkHandler = (chunk: string) => void;

/**
 * A swappable model backend. Implementations wrap a vendor SDK; everything
 * above this interface is vendor-agnostic.
 */
export interface LLMProvider {
  readonly name: string;
  readonly supportsStreaming: boolean;
  readonly supportsToolCalls: boolean;
  readonly supportsVision: boolean;
  readonly hasValidApiKey: boolean;
  readonly currentModel: Model;
  readonly availableModels: readonly Model[];

  initialize(): Promise<void>;
  send(messages: Message[], systemPrompt?: string, signal?: AbortSignal): Promise<LLMResponse>;
  sendStreaming(
    messages: Message[],
    systemPrompt: string | undefined,
    onChunk: ChunkHandler,
    signal?: AbortSignal
  ): Promise<LLMResponse>;
  sendWithTools(
    messages: Message[],
    tools: ToolDefinition[],
    systemPrompt?: string,
    signal?: AbortSignal
  ): Promise<LLMResponse>;
  sendWithToolsStreaming(
    messages: Message[],
    tools: ToolDefinition[],
    systemPrompt: string | undefined,
    onChunk: ChunkHandler,
    signal?: AbortSignal
  ): Promise<LLMResponse>;
  sendWithImage(
    message: string,
    image: Uint8Array,
    systemPrompt?: string,
    signal?: AbortSignal
  ): Promise<LLMResponse>;
  fetchAvailableModels(): Promise<Model[]>;
  setModel(modelId: string): Promise<boolean>;
}

// ─── Collaborators ───────────────────────────────────────────────────────────

export interface Conversation {
  id: string;
  classId?: string;
  /** YYYY-MM-DD */
  date: string;
  timeSlot?: number;
  messages: Message[];
  createdAt: string;
  updatedAt: string;
}

export interface ConversationRepository {
  get(id: string): Promise<Conversation | null>;
  add(conversation: Conversation): Promise<string>;
  update(conversation: Conversation): Promise<void>;
  delete(id: string): Promise<void>;
}

export interface SystemPrompt {
  content: string;
}

export interface SystemPromptProvider {
  getDefaultPrompt(): Promise<SystemPrompt>;
}

export type ToolArguments = Record<string, unknown>;

export type ToolResult =
  | { success: true; data: unknown }
  | { success: false; errorMessage: string };

export interface ToolExecutor {
  execute(toolName: string, args: ToolArguments, signal?: AbortSignal): Promise<ToolResult>;
}

// ─── Orchestrator surface ────────────────────────────────────────────────────

export interface SendOptions {
  /** Overrides the default system prompt for this call */
  systemPrompt?: string;
  conversationId?: string;
  signal?: AbortSignal;
}

export interface NewConversationOptions {
  classId?: string;
  date?: string;
  timeSlot?: number;
}

export interface LLMAttemptLog {
  provider: string;
  model: string;
  latencyMs: number;
  success: boolean;
  error?: string;
}

interface OrchestratedFields {
  conversationId: string;
  attempts: LLMAttemptLog[];
}

/** Tagged result of a send: a normal reply, or an apology after every provider failed */
export type OrchestratedResponse =
  | (LLMResponse & OrchestratedFields & { outcome: "completed" })
  | (LLMResponse & OrchestratedFields & { outcome: "degraded"; failure: string });

export interface ProviderStatus {
  name: string;
  model: string;
  state: "unknown" | "uninitialized" | "initialized" | "active" | "failed";
  hasValidApiKey: boolean;
  lastFailureAt: number | null;
}
