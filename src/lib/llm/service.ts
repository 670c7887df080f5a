import { createLogger, type Logger } from "../logger";
import { appendMessages, createMessage, newConversation } from "./conversation";
import {
  ConversationNotFoundError,
  NoProviderAvailableError,
  NoVisionProviderError,
  errorMessage,
  isAbortError,
} from "./errors";
import { FailoverController } from "./failover";
import { ModelRefreshScheduler, type ModelRefreshOptions, type RefreshSummary } from "./model-refresh";
import { ProviderRegistry, type ProviderFilter } from "./registry";
import { estimateConversationTokens, estimateTextTokens, trimConversation } from "./tokens";
import { ToolCallProcessor } from "./tool-calls";
import type {
  ChunkHandler,
  Conversation,
  ConversationRepository,
  LLMAttemptLog,
  LLMProvider,
  LLMResponse,
  Message,
  NewConversationOptions,
  OrchestratedResponse,
  ProviderStatus,
  SendOptions,
  SystemPromptProvider,
  ToolDefinition,
  ToolExecutor,
} from "./types";

export const RESPONSE_RESERVE_TOKENS = 1000;
export const DEGRADED_PROVIDER_NAME = "System";
export const DEGRADED_MESSAGE =
  "I'm sorry, but I'm having trouble reaching the language model service right now. " +
  "Please try again in a moment.";

export interface LLMServiceConfig {
  providers: LLMProvider[];
  conversations: ConversationRepository;
  systemPrompts: SystemPromptProvider;
  /** Enables tool-call post-processing of every response */
  toolExecutor?: ToolExecutor;
  responseReserveTokens?: number;
  backoffMs?: number;
  modelRefresh?: ModelRefreshOptions;
  logger?: Logger;
  now?: () => number;
}

type Dispatch = (
  provider: LLMProvider,
  history: Message[],
  systemPrompt: string,
  signal?: AbortSignal
) => Promise<LLMResponse>;

interface PipelineRequest {
  incoming: Message[];
  options: SendOptions;
  dispatch: Dispatch;
  /** Tool sends refuse to silently replace an unknown conversation */
  requireExistingConversation?: boolean;
  /** Capability the serving provider must have */
  requirement?: ProviderFilter;
  stream?: StreamRelay;
}

const supportsVision: ProviderFilter = (p) => p.supportsVision;

/**
 * Forwards chunks to the caller while keeping a copy of what the serving
 * provider has produced so far.
 */
class StreamRelay {
  private buffer = "";
  private readonly onChunk: ChunkHandler;

  constructor(onChunk: ChunkHandler) {
    this.onChunk = onChunk;
  }

  readonly handler: ChunkHandler = (chunk) => {
    this.buffer += chunk;
    this.onChunk(chunk);
  };

  get text(): string {
    return this.buffer;
  }

  /** Announces the substitute and drops the failed provider's partial output */
  switchTo(providerName: string): void {
    this.buffer = "";
    this.onChunk(`\n\n[Switching to backup provider: ${providerName}...]\n\n`);
  }

  notice(text: string): void {
    this.onChunk(text);
  }
}

/**
 * Façade over the provider pool. Every send resolves a conversation, trims it
 * to the serving model's budget, dispatches with one failover retry, runs
 * tool calls and persists the result.
 */
export class LLMService {
  private readonly registry: ProviderRegistry;
  private readonly failover: FailoverController;
  private readonly refresher: ModelRefreshScheduler;
  private readonly conversations: ConversationRepository;
  private readonly systemPrompts: SystemPromptProvider;
  private readonly toolProcessor: ToolCallProcessor | null;
  private readonly responseReserveTokens: number;
  private readonly logger: Logger;
  private initialization: Promise<void> | null = null;

  constructor(config: LLMServiceConfig) {
    this.logger = config.logger ?? createLogger("llm-service");
    this.registry = new ProviderRegistry(config.providers, {
      backoffMs: config.backoffMs,
      now: config.now,
    });
    this.failover = new FailoverController(this.registry, this.logger.child({ component: "failover" }));
    this.refresher = new ModelRefreshScheduler(this.registry, {
      logger: this.logger.child({ component: "model-refresh" }),
      ...config.modelRefresh,
    });
    this.conversations = config.conversations;
    this.systemPrompts = config.systemPrompts;
    this.toolProcessor = config.toolExecutor
      ? new ToolCallProcessor(config.toolExecutor, this.logger.child({ component: "tool-calls" }))
      : null;
    this.responseReserveTokens = config.responseReserveTokens ?? RESPONSE_RESERVE_TOKENS;
  }

  // ─── Lifecycle ─────────────────────────────────────────────────────────────

  initialize(): Promise<void> {
    const initialization = this.failover.initialize().then(() => undefined);
    this.initialization = initialization;
    return initialization;
  }

  /** Initializes providers and starts the periodic model refresh */
  async start(): Promise<void> {
    await this.initialize();
    this.refresher.start();
  }

  stop(): void {
    this.refresher.stop();
  }

  // ─── Providers ─────────────────────────────────────────────────────────────

  setActiveProvider(name: string): Promise<boolean> {
    return this.failover.setActive(name);
  }

  getProvider(name: string): LLMProvider | null {
    return this.registry.get(name) ?? null;
  }

  async getActiveProvider(): Promise<LLMProvider | null> {
    return (await this.failover.currentProvider()) ?? null;
  }

  listProviders(): ProviderStatus[] {
    return this.registry.list().map((provider) => ({
      name: provider.name,
      model: provider.currentModel.id,
      state: this.registry.stateOf(provider),
      hasValidApiKey: provider.hasValidApiKey,
      lastFailureAt: this.registry.lastFailure(provider) ?? null,
    }));
  }

  refreshModels(): Promise<RefreshSummary | null> {
    return this.refresher.refreshAll();
  }

  refreshModelsForProvider(name: string): Promise<boolean> {
    return this.refresher.refreshProvider(name);
  }

  // ─── Conversations ─────────────────────────────────────────────────────────

  async createConversation(options: NewConversationOptions = {}): Promise<string> {
    const conversation = await this.startConversation(options);
    return conversation.id;
  }

  async deleteConversation(conversationId: string): Promise<void> {
    await this.conversations.delete(conversationId);
  }

  async getConversationHistory(conversationId: string): Promise<Message[]> {
    const conversation = await this.conversations.get(conversationId);
    if (!conversation) {
      this.logger.warn({ conversationId }, "Conversation not found");
      return [];
    }
    return conversation.messages;
  }

  // ─── Sends ─────────────────────────────────────────────────────────────────

  sendMessage(message: string, options: SendOptions = {}): Promise<OrchestratedResponse> {
    return this.run({
      incoming: [createMessage("user", message)],
      options,
      dispatch: (provider, history, systemPrompt, signal) =>
        provider.send(history, systemPrompt, signal),
    });
  }

  sendMessages(messages: Message[], options: SendOptions = {}): Promise<OrchestratedResponse> {
    return this.run({
      incoming: messages.map((m) => ({ ...m })),
      options,
      dispatch: (provider, history, systemPrompt, signal) =>
        provider.send(history, systemPrompt, signal),
    });
  }

  sendMessagesStreaming(
    messages: Message[],
    onChunk: ChunkHandler,
    options: SendOptions = {}
  ): Promise<OrchestratedResponse> {
    const stream = new StreamRelay(onChunk);
    return this.run({
      incoming: messages.map((m) => ({ ...m })),
      options,
      stream,
      dispatch: async (provider, history, systemPrompt, signal) => {
        if (provider.supportsStreaming) {
          return provider.sendStreaming(history, systemPrompt, stream.handler, signal);
        }
        const response = await provider.send(history, systemPrompt, signal);
        stream.handler(response.content);
        return response;
      },
    });
  }

  sendMessageWithTools(
    message: string,
    tools: ToolDefinition[],
    options: SendOptions = {}
  ): Promise<OrchestratedResponse> {
    return this.run({
      incoming: [createMessage("user", message)],
      options,
      requireExistingConversation: true,
      dispatch: (provider, history, systemPrompt, signal) =>
        provider.supportsToolCalls
          ? provider.sendWithTools(history, tools, systemPrompt, signal)
          : provider.send(history, systemPrompt, signal),
    });
  }

  sendMessageWithToolsStreaming(
    message: string,
    tools: ToolDefinition[],
    onChunk: ChunkHandler,
    options: SendOptions = {}
  ): Promise<OrchestratedResponse> {
    const stream = new StreamRelay(onChunk);
    return this.run({
      incoming: [createMessage("user", message)],
      options,
      stream,
      requireExistingConversation: true,
      dispatch: async (provider, history, systemPrompt, signal) => {
        if (provider.supportsStreaming) {
          return provider.supportsToolCalls
            ? provider.sendWithToolsStreaming(history, tools, systemPrompt, stream.handler, signal)
            : provider.sendStreaming(history, systemPrompt, stream.handler, signal);
        }
        const response = provider.supportsToolCalls
          ? await provider.sendWithTools(history, tools, systemPrompt, signal)
          : await provider.send(history, systemPrompt, signal);
        stream.handler(response.content);
        return response;
      },
    });
  }

  sendMessageWithImage(
    message: string,
    image: Uint8Array,
    options: SendOptions = {}
  ): Promise<OrchestratedResponse> {
    return this.run({
      incoming: [createMessage("user", message)],
      options,
      requirement: supportsVision,
      dispatch: (provider, _history, systemPrompt, signal) =>
        provider.sendWithImage(message, image, systemPrompt, signal),
    });
  }

  // ─── Pipeline ──────────────────────────────────────────────────────────────

  /** Sends made before `initialize()` or `start()` initialize the providers first */
  private ensureInitialized(): Promise<void> {
    return this.initialization ?? this.initialize();
  }

  private async run(request: PipelineRequest): Promise<OrchestratedResponse> {
    const { signal } = request.options;
    signal?.throwIfAborted();
    await this.ensureInitialized();

    const provider = request.requirement
      ? await this.failover.resolveWith(request.requirement)
      : await this.failover.currentProvider();
    if (!provider) {
      throw request.requirement ? new NoVisionProviderError() : new NoProviderAvailableError();
    }

    const conversation = await this.resolveConversation(
      request.options.conversationId,
      request.requireExistingConversation ?? false
    );
    appendMessages(conversation, request.incoming);

    const systemPrompt =
      request.options.systemPrompt ?? (await this.systemPrompts.getDefaultPrompt()).content;

    const attempts: LLMAttemptLog[] = [];
    let response: LLMResponse;
    try {
      response = await this.attempt(provider, conversation, systemPrompt, request, attempts);
    } catch (firstError) {
      if (isAbortError(firstError, signal)) throw firstError;

      const substitute = await this.failover.demote(provider, request.requirement);
      if (!substitute) {
        return this.degrade(conversation, request, attempts, errorMessage(firstError));
      }

      this.logger.warn(
        { failed: provider.name, substitute: substitute.name, err: errorMessage(firstError) },
        "Retrying with backup provider"
      );
      request.stream?.switchTo(substitute.name);

      try {
        response = await this.attempt(substitute, conversation, systemPrompt, request, attempts);
      } catch (secondError) {
        if (isAbortError(secondError, signal)) throw secondError;
        await this.failover.markFailed(substitute);
        return this.degrade(conversation, request, attempts, errorMessage(secondError));
      }
    }

    if (request.stream && !response.content) {
      response = { ...response, content: request.stream.text };
    }

    if (this.toolProcessor) {
      const processed = await this.toolProcessor.processStreamed(response, signal);
      if (request.stream && processed.trailing) request.stream.notice(processed.trailing);
      response = processed.response;
    }

    appendMessages(conversation, [createMessage("assistant", response.content)]);
    await this.conversations.update(conversation);

    return { ...response, conversationId: conversation.id, attempts, outcome: "completed" };
  }

  private async attempt(
    provider: LLMProvider,
    conversation: Conversation,
    systemPrompt: string,
    request: PipelineRequest,
    attempts: LLMAttemptLog[]
  ): Promise<LLMResponse> {
    const budget = Math.max(0, provider.currentModel.maxContextLength - this.responseReserveTokens);
    const history = trimConversation(conversation.messages, budget);
    if (history !== conversation.messages) {
      this.logger.debug(
        { provider: provider.name, kept: history.length, total: conversation.messages.length },
        "Trimmed conversation to fit context window"
      );
    }

    const start = Date.now();
    try {
      const response = await request.dispatch(provider, history, systemPrompt, request.options.signal);
      attempts.push({
        provider: provider.name,
        model: response.model,
        latencyMs: Date.now() - start,
        success: true,
      });
      return response;
    } catch (error) {
      attempts.push({
        provider: provider.name,
        model: provider.currentModel.id,
        latencyMs: Date.now() - start,
        success: false,
        error: errorMessage(error),
      });
      this.logger.error({ provider: provider.name, err: errorMessage(error) }, "LLM provider call failed");
      throw error;
    }
  }

  /** All providers failed: keep the user's turn, answer with an apology */
  private async degrade(
    conversation: Conversation,
    request: PipelineRequest,
    attempts: LLMAttemptLog[],
    failure: string
  ): Promise<OrchestratedResponse> {
    await this.conversations.update(conversation);
    request.stream?.notice(DEGRADED_MESSAGE);

    const promptTokens = estimateConversationTokens(conversation.messages);
    const completionTokens = estimateTextTokens(DEGRADED_MESSAGE);
    return {
      content: DEGRADED_MESSAGE,
      provider: DEGRADED_PROVIDER_NAME,
      model: "none",
      toolCalls: [],
      usage: { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens },
      latencyMs: 0,
      conversationId: conversation.id,
      attempts,
      outcome: "degraded",
      failure,
    };
  }

  private async resolveConversation(
    conversationId: string | undefined,
    requireExisting: boolean
  ): Promise<Conversation> {
    if (conversationId) {
      const existing = await this.conversations.get(conversationId);
      if (existing) return existing;
      if (requireExisting) throw new ConversationNotFoundError(conversationId);
      this.logger.warn({ conversationId }, "Conversation not found, creating new conversation");
    }
    return this.startConversation();
  }

  private async startConversation(options: NewConversationOptions = {}): Promise<Conversation> {
    const prompt = await this.systemPrompts.getDefaultPrompt();
    const conversation = newConversation(prompt.content, options);
    await this.conversations.add(conversation);
    return conversation;
  }
}
