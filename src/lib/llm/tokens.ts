import type { Message, MessageRole, ToolCall } from "./types";

// ─── Token estimation ────────────────────────────────────────────────────────
// Calibrated heuristic, not a tokenizer. CJK-family scripts run close to one
// token per character; everything else is treated like English (~4 chars/token).

const ENGLISH_TOKENS_PER_CHAR = 0.25;
const CJK_TOKENS_PER_CHAR = 1.0;

// Hangul Jamo, CJK Unified Ideographs, CJK Symbols & Punctuation, Hiragana, Katakana
const CJK_PATTERN = /[\u1100-\u11FF\u4E00-\u9FFF\u3000-\u303F\u3040-\u309F\u30A0-\u30FF]/;

const ROLE_OVERHEAD: Record<MessageRole, number> = {
  system: 4,
  user: 4,
  assistant: 4,
  tool: 10,
};

const TOOL_CALL_OVERHEAD = 10;
const TOOL_RESPONSE_OVERHEAD = 10;
const CONVERSATION_OVERHEAD = 3;

export function estimateTextTokens(text: string | null | undefined): number {
  if (!text) return 0;
  const ratio = CJK_PATTERN.test(text) ? CJK_TOKENS_PER_CHAR : ENGLISH_TOKENS_PER_CHAR;
  return Math.ceil(text.length * ratio);
}

export function estimateMessageTokens(message: Message): number {
  return estimateTextTokens(message.content) + ROLE_OVERHEAD[message.role];
}

export function estimateConversationTokens(messages: readonly Message[]): number {
  let total = CONVERSATION_OVERHEAD;
  for (const message of messages) {
    total += estimateMessageTokens(message);
  }
  return total;
}

export function estimateToolCallTokens(call: ToolCall): number {
  return estimateTextTokens(call.name) + estimateTextTokens(call.arguments) + TOOL_CALL_OVERHEAD;
}

export function estimateToolResponseTokens(content: string): number {
  return estimateTextTokens(content) + TOOL_RESPONSE_OVERHEAD;
}

// ─── Trimming ────────────────────────────────────────────────────────────────

/**
 * Shrinks a history to fit `maxTokens`, keeping the newest messages.
 *
 * Returns the input array itself when it already fits. Otherwise the result is
 * the first system message (when `preserveSystem`) followed by the longest
 * suffix of the remaining messages that fits. A single message is never cut;
 * if the system message alone overflows, it is returned by itself.
 */
export function trimConversation(
  messages: Message[],
  maxTokens: number,
  preserveSystem = true
): Message[] {
  if (estimateConversationTokens(messages) <= maxTokens) {
    return messages;
  }

  const systemMessage = preserveSystem
    ? messages.find((m) => m.role === "system")
    : undefined;

  let total = CONVERSATION_OVERHEAD;
  if (systemMessage) total += estimateMessageTokens(systemMessage);

  const kept: Message[] = [];
  for (let i = messages.length - 1; i >= 0; i--) {
    const message = messages[i];
    if (preserveSystem && message.role === "system") continue;

    const cost = estimateMessageTokens(message);
    if (total + cost > maxTokens) break;

    kept.push(message);
    total += cost;
  }

  kept.reverse();
  return systemMessage ? [systemMessage, ...kept] : kept;
}
