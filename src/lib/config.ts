import * as path from "path";
import { config as loadDotenv } from "dotenv";
import { z } from "zod";
import { LOG_LEVELS, setLogLevel, type LogLevel } from "./logger";
import { InMemoryConversationRepository, StaticSystemPromptProvider } from "./llm/conversation";
import { ClaudeProvider, DEFAULT_CLAUDE_MODEL } from "./llm/providers/claude";
import { OpenAIProvider, DEFAULT_OPENAI_MODEL } from "./llm/providers/openai";
import { DEFAULT_BACKOFF_MS } from "./llm/registry";
import { DEFAULT_REFRESH_INITIAL_DELAY_MS, DEFAULT_REFRESH_INTERVAL_MS } from "./llm/model-refresh";
import { LLMService, RESPONSE_RESERVE_TOKENS } from "./llm/service";
import type { ConversationRepository, LLMProvider, ToolExecutor } from "./llm/types";
import { formatIssues } from "./tools/registry";

const EnvSchema = z.object({
  ANTHROPIC_API_KEY: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  LLM_PRIMARY_PROVIDER: z.enum(["claude", "openai"]).default("claude"),
  CLAUDE_MODEL: z.string().default(DEFAULT_CLAUDE_MODEL),
  OPENAI_MODEL: z.string().default(DEFAULT_OPENAI_MODEL),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(1024),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0),
  LLM_RESPONSE_RESERVE_TOKENS: z.coerce.number().int().nonnegative().default(RESPONSE_RESERVE_TOKENS),
  LLM_BACKOFF_MS: z.coerce.number().int().nonnegative().default(DEFAULT_BACKOFF_MS),
  MODEL_REFRESH_INTERVAL_MS: z.coerce.number().int().positive().default(DEFAULT_REFRESH_INTERVAL_MS),
  MODEL_REFRESH_INITIAL_DELAY_MS: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(DEFAULT_REFRESH_INITIAL_DELAY_MS),
  LLM_SYSTEM_PROMPT: z.string().optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
});

export type ProviderName = z.infer<typeof EnvSchema>["LLM_PRIMARY_PROVIDER"];

export interface AppConfig {
  anthropicApiKey?: string;
  openaiApiKey?: string;
  primaryProvider: ProviderName;
  claudeModel: string;
  openaiModel: string;
  maxTokens: number;
  temperature: number;
  responseReserveTokens: number;
  backoffMs: number;
  modelRefreshIntervalMs: number;
  modelRefreshInitialDelayMs: number;
  systemPrompt?: string;
  logLevel: LogLevel;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** `.env.local` first, so it wins over `.env`; variables already set are kept */
export function loadEnvFiles(cwd: string = process.cwd()): void {
  loadDotenv({ path: path.resolve(cwd, ".env.local") });
  loadDotenv({ path: path.resolve(cwd, ".env") });
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Blank variables count as unset
  const raw: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") raw[key] = value.trim();
  }

  const parsed = EnvSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }

  const e = parsed.data;
  return {
    anthropicApiKey: e.ANTHROPIC_API_KEY,
    openaiApiKey: e.OPENAI_API_KEY,
    primaryProvider: e.LLM_PRIMARY_PROVIDER,
    claudeModel: e.CLAUDE_MODEL,
    openaiModel: e.OPENAI_MODEL,
    maxTokens: e.LLM_MAX_TOKENS,
    temperature: e.LLM_TEMPERATURE,
    responseReserveTokens: e.LLM_RESPONSE_RESERVE_TOKENS,
    backoffMs: e.LLM_BACKOFF_MS,
    modelRefreshIntervalMs: e.MODEL_REFRESH_INTERVAL_MS,
    modelRefreshInitialDelayMs: e.MODEL_REFRESH_INITIAL_DELAY_MS,
    systemPrompt: e.LLM_SYSTEM_PROMPT,
    logLevel: e.LOG_LEVEL,
  };
}

/** Both providers, primary first; registry order is the fallback order */
export function buildProviders(config: AppConfig): LLMProvider[] {
  const claude = new ClaudeProvider({
    apiKey: config.anthropicApiKey,
    model: config.claudeModel,
    maxTokens: config.maxTokens,
    temperature: config.temperature,
  });
  const openai = new OpenAIProvider({
    apiKey: config.openaiApiKey,
    model: config.openaiModel,
    maxTokens: config.maxTokens,
    temperature: config.temperature,
  });
  return config.primaryProvider === "openai" ? [openai, claude] : [claude, openai];
}

export interface ServiceDependencies {
  providers?: LLMProvider[];
  conversations?: ConversationRepository;
  toolExecutor?: ToolExecutor;
}

/** Applies the configured log level before building anything that logs */
export function createService(config: AppConfig, deps: ServiceDependencies = {}): LLMService {
  setLogLevel(config.logLevel);
  return new LLMService({
    providers: deps.providers ?? buildProviders(config),
    conversations: deps.conversations ?? new InMemoryConversationRepository(),
    systemPrompts: new StaticSystemPromptProvider(config.systemPrompt),
    toolExecutor: deps.toolExecutor,
    responseReserveTokens: config.responseReserveTokens,
    backoffMs: config.backoffMs,
    modelRefresh: {
      intervalMs: config.modelRefreshIntervalMs,
      initialDelayMs: config.modelRefreshInitialDelayMs,
    },
  });
}
