import OpenAI from "openai";
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
  ChatCompletionTool,
} from "openai/resources/chat/completions";
import { ProviderError, isAbortError } from "../errors";
import type { ChunkHandler, LLMResponse, Message, Model, TokenUsage, ToolCall, ToolDefinition } from "../types";
import {
  BaseProvider,
  detectImageMediaType,
  resolveSystemPrompt,
  toBase64,
  toChatTurns,
  type ProviderOptions,
} from "./base";

export const OPENAI_MODELS: Model[] = [
  { id: "gpt-4o", name: "GPT-4o", maxContextLength: 128000, supportsToolCalls: true, supportsVision: true },
  { id: "gpt-4o-mini", name: "GPT-4o mini", maxContextLength: 128000, supportsToolCalls: true, supportsVision: true },
  { id: "gpt-4-turbo", name: "GPT-4 Turbo", maxContextLength: 128000, supportsToolCalls: true, supportsVision: true },
  { id: "gpt-3.5-turbo", name: "GPT-3.5 Turbo", maxContextLength: 16385, supportsToolCalls: true, supportsVision: false },
];

export const DEFAULT_OPENAI_MODEL = "gpt-4o";

// Longest matching prefix wins
const CONTEXT_BY_PREFIX: Array<[string, number]> = [
  ["gpt-4o", 128000],
  ["gpt-4-turbo", 128000],
  ["gpt-4-32k", 32768],
  ["gpt-4", 8192],
  ["gpt-3.5-turbo", 16385],
  ["o1", 200000],
  ["o3", 200000],
];

const CHAT_MODEL_PATTERN = /^(gpt-|o\d)/;

export function describeOpenAIModel(id: string): Model {
  const known = OPENAI_MODELS.find((m) => m.id === id);
  if (known) return known;

  const match = CONTEXT_BY_PREFIX.filter(([prefix]) => id.startsWith(prefix)).sort(
    (a, b) => b[0].length - a[0].length
  )[0];
  return {
    id,
    name: id,
    maxContextLength: match ? match[1] : 8192,
    supportsToolCalls: !id.includes("instruct"),
    supportsVision: /4o|gpt-4-turbo|vision/.test(id),
  };
}

interface PartialToolCall {
  id: string;
  name: string;
  arguments: string;
}

export class OpenAIProvider extends BaseProvider {
  public readonly name = "openai";
  private client: OpenAI;

  constructor(options: ProviderOptions = {}) {
    super(options, OPENAI_MODELS, DEFAULT_OPENAI_MODEL, "openai-provider");
    this.client = new OpenAI({ apiKey: this.apiKey });
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
    const dataUrl = `data:${detectImageMediaType(image)};base64,${toBase64(image)}`;
    const chat: ChatCompletionMessageParam[] = [];
    if (systemPrompt) chat.push({ role: "system", content: systemPrompt });
    chat.push({
      role: "user",
      content: [
        { type: "text", text: message },
        { type: "image_url", image_url: { url: dataUrl } },
      ],
    });

    return this.complete(
      {
        model: this.currentModel.id,
        max_tokens: this.maxTokens,
        temperature: this.temperature,
        messages: chat,
      },
      signal
    );
  }

  protected async listModels(): Promise<Model[]> {
    const models: Model[] = [];
    for await (const info of this.client.models.list()) {
      if (CHAT_MODEL_PATTERN.test(info.id)) {
        models.push(describeOpenAIModel(info.id));
      }
    }
    return models;
  }

  // ─── SDK plumbing ──────────────────────────────────────────────────────────

  private buildParams(
    messages: Message[],
    systemPrompt?: string,
    tools?: ToolDefinition[]
  ): ChatCompletionCreateParamsNonStreaming {
    const chat: ChatCompletionMessageParam[] = [];
    const system = resolveSystemPrompt(messages, systemPrompt);
    if (system) chat.push({ role: "system", content: system });
    for (const turn of toChatTurns(messages)) {
      chat.push(
        turn.role === "user"
          ? { role: "user", content: turn.content }
          : { role: "assistant", content: turn.content }
      );
    }

    const params: ChatCompletionCreateParamsNonStreaming = {
      model: this.currentModel.id,
      max_tokens: this.maxTokens,
      temperature: this.temperature,
      messages: chat,
    };
    if (tools && tools.length > 0) {
      params.tools = tools.map(
        (tool): ChatCompletionTool => ({
          type: "function",
          function: { name: tool.name, description: tool.description, parameters: tool.parameters },
        })
      );
    }
    return params;
  }

  private async complete(
    params: ChatCompletionCreateParamsNonStreaming,
    signal?: AbortSignal
  ): Promise<LLMResponse> {
    const start = Date.now();
    try {
      const response = await this.client.chat.completions.create(params, { signal });
      return this.toResponse(response, Date.now() - start);
    } catch (error) {
      if (isAbortError(error, signal)) throw error;
      throw new ProviderError(this.name, "OpenAI", error);
    }
  }

  private async stream(
    params: ChatCompletionCreateParamsNonStreaming,
    onChunk: ChunkHandler,
    signal?: AbortSignal
  ): Promise<LLMResponse> {
    const start = Date.now();
    try {
      const stream = await this.client.chat.completions.create(
        { ...params, stream: true, stream_options: { include_usage: true } },
        { signal }
      );

      let content = "";
      let model = params.model;
      let usage: TokenUsage | null = null;
      const partials = new Map<number, PartialToolCall>();

      for await (const chunk of stream) {
        model = chunk.model || model;
        if (chunk.usage) {
          usage = {
            promptTokens: chunk.usage.prompt_tokens,
            completionTokens: chunk.usage.completion_tokens,
            totalTokens: chunk.usage.total_tokens,
          };
        }

        const delta = chunk.choices[0]?.delta;
        if (!delta) continue;
        if (delta.content) {
          content += delta.content;
          onChunk(delta.content);
        }
        for (const part of delta.tool_calls ?? []) {
          const partial = partials.get(part.index) ?? { id: "", name: "", arguments: "" };
          if (part.id) partial.id = part.id;
          if (part.function?.name) partial.name += part.function.name;
          if (part.function?.arguments) partial.arguments += part.function.arguments;
          partials.set(part.index, partial);
        }
      }

      const toolCalls: ToolCall[] = [...partials.entries()]
        .sort(([a], [b]) => a - b)
        .map(([, call]) => call);

      return {
        content,
        provider: this.name,
        model,
        toolCalls,
        usage: usage ?? { promptTokens: 0, completionTokens: 0, totalTokens: 0 },
        latencyMs: Date.now() - start,
      };
    } catch (error) {
      if (isAbortError(error, signal)) throw error;
      throw new ProviderError(this.name, "OpenAI", error);
    }
  }

  private toResponse(response: ChatCompletion, latencyMs: number): LLMResponse {
    const message = response.choices[0]?.message;
    const toolCalls: ToolCall[] = (message?.tool_calls ?? []).map((call) => ({
      id: call.id,
      name: call.function.name,
      arguments: call.function.arguments,
    }));

    const promptTokens = response.usage?.prompt_tokens ?? 0;
    const completionTokens = response.usage?.completion_tokens ?? 0;
    return {
      content: message?.content ?? "",
      provider: this.name,
      model: response.model,
      toolCalls,
      usage: { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens },
      latencyMs,
    };
  }
}
