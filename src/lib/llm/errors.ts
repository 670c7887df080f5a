export type FatalErrorCode = "NO_PROVIDER" | "NO_VISION_PROVIDER" | "CONVERSATION_NOT_FOUND";

/**
 * Conditions the orchestrator never masks behind a degraded response.
 * Transient provider failures are recovered locally and do not use this type.
 */
export class FatalOrchestrationError extends Error {
  readonly code: FatalErrorCode;

  constructor(code: FatalErrorCode, message: string) {
    super(message);
    this.name = "FatalOrchestrationError";
    this.code = code;
  }
}

export class NoProviderAvailableError extends FatalOrchestrationError {
  constructor() {
    super("NO_PROVIDER", "No LLM provider available");
    this.name = "NoProviderAvailableError";
  }
}

export class NoVisionProviderError extends FatalOrchestrationError {
  constructor() {
    super("NO_VISION_PROVIDER", "No vision-capable LLM provider available");
    this.name = "NoVisionProviderError";
  }
}

export class ConversationNotFoundError extends FatalOrchestrationError {
  readonly conversationId: string;

  constructor(conversationId: string) {
    super("CONVERSATION_NOT_FOUND", `Conversation not found: ${conversationId}`);
    this.name = "ConversationNotFoundError";
    this.conversationId = conversationId;
  }
}

/** Wraps a vendor SDK failure, e.g. "Claude API error: 401 Unauthorized" */
export class ProviderError extends Error {
  readonly provider: string;

  constructor(provider: string, label: string, cause: unknown) {
    super(`${label} API error: ${errorMessage(cause)}`);
    this.name = "ProviderError";
    this.provider = provider;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isAbortError(error: unknown, signal?: AbortSignal): boolean {
  if (signal?.aborted) return true;
  return error instanceof Error && error.name === "AbortError";
}
