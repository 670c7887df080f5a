import Anthropic from "@anthropic-ai/sdk";
import { ProviderError, isAbortError } from "../errors";
import type { ChunkHandler, LLMResponse, Message, Model, ToolCall, ToolDefinition } from "../types";
import {
  BaseProvider,
  detectImageMediaType,
  resolveSystemPrompt,
  toBase64,
  toChatTurns,
  type ProviderOptions,
} from "./base";

const CLAUDE_CONTEXT_LENGTH = 200000;

export const CLAUDE_MODELS: Model[] = [
  { id: "claude-3-5-sonnet-20241022", name: "Claude 3.5 Sonnet", maxContextLength: CLAUDE_CONTEXT_LENGTH, supportsToolCalls: true, supportsVision: true },
  { id: "claude-3-5-haiku-20241022", name: "Claude 3.5 Haiku", maxContextLength: CLAUDE_CONTEXT_LENGTH, supportsToolCalls: true, supportsVision: true },
  { id: "claude-3-opus-20240229", name: "Claude 3 Opus", maxContextLength: CLAUDE_CONTEXT_LENGTH, supportsToolCalls: true, supportsVision: true },
  { id: "claude-3-haiku-20240307", name: "Claude 3 Haiku", maxContextLength: CLAUDE_CONTEXT_LENGTH, supportsToolCalls: true, supportsVision: true },
];

export const DEFAULT_CLAUDE_MODEL = "claude-3-5-sonnet-20241022";

export class ClaudeProvider extends BaseProvider {
  public readonly name = "claude";
  private client: Anthropic;

  constructor(options: ProviderOptions = {}) {
    super(options, CLAUDE_MODELS, DEFAULT_CLAUDE_MODEL, "claude-provider");
    this.client = new Anthropic({ apiKey: this.apiKey });
  }

  send(messages: Message[], systemPrompt?: string, signal?: AbortSignal): Promise<LLMResponse> {
    return this.complete(this.buildParams(messages, systemPrompt), signal);
  }

  sendStreaming(
    messages: Message[],
    systemPrompt: string | undefined,
    onChunk: ChunkHandler,
    signal?: AbortSignal
  ): Promise<LLMResponse> {
    return this.stream(this.buildParams(messages, systemPrompt), onChunk, signal);
  }

  sendWithTools(
    messages: Message[],
    tools: ToolDefinition[],
    systemPrompt?: string,
    signal?: AbortSignal
  ): Promise<LLMResponse> {
    return this.complete(this.buildParams(messages, systemPrompt, tools), signal);
  }

  sendWithToolsStreaming(
    messages: Message[],
    tools: ToolDefinition[],
    systemPrompt: string | undefined,
    onChunk: ChunkHandler,
    signal?: AbortSignal
  ): Promise<LLMResponse> {
    return this.stream(this.buildParams(messages, systemPrompt, tools), onChunk, signal);
  }

  sendWithImage(
    message: string,
    image: Uint8Array,
    systemPrompt?: string,
    signal?: AbortSignal
  ): Promise<LLMResponse> {
    const params: Anthropic.MessageCreateParamsNonStreaming = {
      model: this.currentModel.id,
      max_tokens: this.maxTokens,
      temperature: this.temperature,
      messages: [
        {
          role: "user",
          content: [
            {
              type: "image",
              source: { type: "base64", media_type: detectImageMediaType(image), data: toBase64(image) },
            },
            { type: "text", text: message },
          ],
        },
      ],
    };
    if (systemPrompt) params.system = systemPrompt;
    return this.complete(params, signal);
  }

  protected async listModels(): Promise<Model[]> {
    const models: Model[] = [];
    for await (const info of this.client.models.list()) {
      models.push({
        id: info.id,
        name: info.display_name,
        maxContextLength: CLAUDE_CONTEXT_LENGTH,
        supportsToolCalls: true,
        supportsVision: true,
      });
    }
    return models;
  }

  // ─── SDK plumbing ──────────────────────────────────────────────────────────

  private buildParams(
    messages: Message[],
    systemPrompt?: string,
    tools?: ToolDefinition[]
  ): Anthropic.MessageCreateParamsNonStreaming {
    const params: Anthropic.MessageCreateParamsNonStreaming = {
      model: this.currentModel.id,
      max_tokens: this.maxTokens,
      temperature: this.temperature,
      messages: toChatTurns(messages),
    };

    const system = resolveSystemPrompt(messages, systemPrompt);
    if (system) params.system = system;

    if (tools && tools.length > 0) {
      params.tools = tools.map((tool) => ({
        name: tool.name,
        description: tool.description,
        input_schema: { ...tool.parameters, type: "object" as const },
      }));
    }
    return params;
  }

  private async complete(
    params: Anthropic.MessageCreateParamsNonStreaming,
    signal?: AbortSignal
  ): Promise<LLMResponse> {
    const start = Date.now();
    try {
      const response = await this.client.messages.create(params, { signal });
      return this.toResponse(response, Date.now() - start);
    } catch (error) {
      if (isAbortError(error, signal)) throw error;
      throw new ProviderError(this.name, "Claude", error);
    }
  }

  private async stream(
    params: Anthropic.MessageCreateParamsNonStreaming,
    onChunk: ChunkHandler,
    signal?: AbortSignal
  ): Promise<LLMResponse> {
    const start = Date.now();
    try {
      const stream = this.client.messages.stream(params, { signal });
      stream.on("text", (delta) => onChunk(delta));
      const response = await stream.finalMessage();
      return this.toResponse(response, Date.now() - start);
    } catch (error) {
      if (isAbortError(error, signal)) throw error;
      throw new ProviderError(this.name, "Claude", error);
    }
  }

  private toResponse(response: Anthropic.Message, latencyMs: number): LLMResponse {
    let content = "";
    const toolCalls: ToolCall[] = [];
    for (const block of response.content) {
      if (block.type === "text") {
        content += block.text;
      } else if (block.type === "tool_use") {
        toolCalls.push({ id: block.id, name: block.name, arguments: JSON.stringify(block.input) });
      }
    }

    const promptTokens = response.usage.input_tokens;
    const completionTokens = response.usage.output_tokens;
    return {
      content,
      provider: this.name,
      model: response.model,
      toolCalls,
      usage: { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens },
      latencyMs,
    };
  }
}
