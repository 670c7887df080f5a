import { createLogger, type Logger } from "../../logger";
import { errorMessage } from "../errors";
import type {
  ChunkHandler,
  LLMProvider,
  LLMResponse,
  Message,
  Model,
  ToolDefinition,
} from "../types";

export interface ProviderOptions {
  apiKey?: string;
  model?: string;
  maxTokens?: number;
  temperature?: number;
  logger?: Logger;
}

export const DEFAULT_MAX_TOKENS = 1024;

/**
 * Catalog bookkeeping shared by the vendor providers. Subclasses supply the
 * SDK calls and the vendor's model listing.
 */
export abstract class BaseProvider implements LLMProvider {
  abstract readonly name: string;
  readonly supportsStreaming: boolean = true;

  protected readonly apiKey: string;
  protected readonly maxTokens: number;
  protected readonly temperature: number;
  protected readonly logger: Logger;
  private models: Model[];
  private model: Model;

  protected constructor(
    options: ProviderOptions,
    defaultCatalog: Model[],
    defaultModelId: string,
    component: string
  ) {
    this.apiKey = options.apiKey ?? "";
    this.maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.temperature = options.temperature ?? 0;
    this.logger = options.logger ?? createLogger(component);
    this.models = [...defaultCatalog];

    const wanted = options.model ?? defaultModelId;
    this.model = this.models.find((m) => m.id === wanted) ?? describeUnknownModel(wanted, defaultCatalog);
  }

  get hasValidApiKey(): boolean {
    return this.apiKey.trim().length > 0;
  }

  get currentModel(): Model {
    return this.model;
  }

  get supportsToolCalls(): boolean {
    return this.model.supportsToolCalls;
  }

  get supportsVision(): boolean {
    return this.model.supportsVision;
  }

  get availableModels(): readonly Model[] {
    return this.models;
  }

  async initialize(): Promise<void> {
    if (!this.hasValidApiKey) {
      throw new Error(`${this.name} API key is not configured`);
    }
    try {
      await this.fetchAvailableModels();
    } catch (error) {
      this.logger.warn(
        { provider: this.name, err: errorMessage(error) },
        "Could not fetch models, keeping built-in catalog"
      );
    }
  }

  async fetchAvailableModels(): Promise<Model[]> {
    if (!this.hasValidApiKey) return [...this.models];

    const fetched = await this.listModels();
    if (fetched.length > 0) {
      this.models = fetched;
      const refreshed = fetched.find((m) => m.id === this.model.id);
      if (refreshed) this.model = refreshed;
    }
    return [...this.models];
  }

  async setModel(modelId: string): Promise<boolean> {
    let model = this.models.find((m) => m.id === modelId);
    if (!model && this.hasValidApiKey) {
      await this.fetchAvailableModels();
      model = this.models.find((m) => m.id === modelId);
    }
    if (!model) {
      this.logger.warn({ provider: this.name, model: modelId }, "Model not found");
      return false;
    }
    this.model = model;
    this.logger.info({ provider: this.name, model: modelId }, "Model set");
    return true;
  }

  protected abstract listModels(): Promise<Model[]>;

  abstract send(messages: Message[], systemPrompt?: string, signal?: AbortSignal): Promise<LLMResponse>;
  abstract sendStreaming(
    messages: Message[],
    systemPrompt: string | undefined,
    onChunk: ChunkHandler,
    signal?: AbortSignal
  ): Promise<LLMResponse>;
  abstract sendWithTools(
    messages: Message[],
    tools: ToolDefinition[],
    systemPrompt?: string,
    signal?: AbortSignal
  ): Promise<LLMResponse>;
  abstract sendWithToolsStreaming(
    messages: Message[],
    tools: ToolDefinition[],
    systemPrompt: string | undefined,
    onChunk: ChunkHandler,
    signal?: AbortSignal
  ): Promise<LLMResponse>;
  abstract sendWithImage(
    message: string,
    image: Uint8Array,
    systemPrompt?: string,
    signal?: AbortSignal
  ): Promise<LLMResponse>;
}

// Configured ids outside the catalog inherit the first entry's limits
function describeUnknownModel(id: string, catalog: Model[]): Model {
  const template = catalog[0];
  return {
    id,
    name: id,
    maxContextLength: template?.maxContextLength ?? 8192,
    supportsToolCalls: template?.supportsToolCalls ?? false,
    supportsVision: template?.supportsVision ?? false,
  };
}

// ─── Shared helpers ──────────────────────────────────────────────────────────

export type ImageMediaType = "image/png" | "image/jpeg" | "image/gif" | "image/webp";

/** Sniffs the container from magic bytes; unrecognised data is sent as JPEG */
export function detectImageMediaType(image: Uint8Array): ImageMediaType {
  if (image[0] === 0x89 && image[1] === 0x50 && image[2] === 0x4e && image[3] === 0x47) {
    return "image/png";
  }
  if (image[0] === 0x47 && image[1] === 0x49 && image[2] === 0x46) {
    return "image/gif";
  }
  if (
    image[0] === 0x52 &&
    image[1] === 0x49 &&
    image[2] === 0x46 &&
    image[3] === 0x46 &&
    image[8] === 0x57 &&
    image[9] === 0x45 &&
    image[10] === 0x42 &&
    image[11] === 0x50
  ) {
    return "image/webp";
  }
  return "image/jpeg";
}

export function toBase64(image: Uint8Array): string {
  return Buffer.from(image).toString("base64");
}

/** The explicit prompt wins; otherwise system-role history entries are joined */
export function resolveSystemPrompt(messages: Message[], systemPrompt?: string): string | undefined {
  if (systemPrompt) return systemPrompt;
  const fromHistory = messages
    .filter((m) => m.role === "system")
    .map((m) => m.content)
    .join("\n\n");
  return fromHistory || undefined;
}

/** Conversation turns a vendor chat API accepts: tool output is relayed as user text */
export function toChatTurns(messages: Message[]): Array<{ role: "user" | "assistant"; content: string }> {
  const turns: Array<{ role: "user" | "assistant"; content: string }> = [];
  for (const message of messages) {
    if (message.role === "system") continue;
    if (message.role === "tool") {
      const label = message.toolName ? `Tool result (${message.toolName})` : "Tool result";
      turns.push({ role: "user", content: `${label}:\n${message.content}` });
      continue;
    }
    turns.push({ role: message.role, content: message.content });
  }
  return turns;
}
