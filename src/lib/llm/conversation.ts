import { randomUUID } from "crypto";
import type {
  Conversation,
  ConversationRepository,
  Message,
  MessageRole,
  NewConversationOptions,
  SystemPrompt,
  SystemPromptProvider,
} from "./types";

export const DEFAULT_SYSTEM_PROMPT =
  "You are a helpful assistant. Answer clearly and concisely. " +
  "When a tool would help, request it with a fenced block: ```tool <name>\\n<arguments>```.";

export function createMessage(role: MessageRole, content: string, toolName?: string): Message {
  const message: Message = { role, content, timestamp: new Date().toISOString() };
  if (toolName) message.toolName = toolName;
  return message;
}

/** A new conversation always opens with exactly one system message */
export function newConversation(
  systemPrompt: string,
  options: NewConversationOptions = {}
): Conversation {
  const now = new Date().toISOString();
  return {
    id: randomUUID(),
    classId: options.classId,
    date: options.date ?? now.slice(0, 10),
    timeSlot: options.timeSlot,
    messages: [createMessage("system", systemPrompt)],
    createdAt: now,
    updatedAt: now,
  };
}

export function appendMessages(conversation: Conversation, messages: Message[]): void {
  conversation.messages.push(...messages);
  conversation.updatedAt = new Date().toISOString();
}

/**
 * Process-local repository. Reads and writes copy, so each caller works on
 * its own snapshot and the last write wins.
 */
export class InMemoryConversationRepository implements ConversationRepository {
  private readonly conversations = new Map<string, Conversation>();

  async get(id: string): Promise<Conversation | null> {
    const stored = this.conversations.get(id);
    return stored ? structuredClone(stored) : null;
  }

  async add(conversation: Conversation): Promise<string> {
    this.conversations.set(conversation.id, structuredClone(conversation));
    return conversation.id;
  }

  async update(conversation: Conversation): Promise<void> {
    this.conversations.set(conversation.id, structuredClone(conversation));
  }

  async delete(id: string): Promise<void> {
    this.conversations.delete(id);
  }

  get size(): number {
    return this.conversations.size;
  }
}

export class StaticSystemPromptProvider implements SystemPromptProvider {
  private readonly prompt: SystemPrompt;

  constructor(content: string = DEFAULT_SYSTEM_PROMPT) {
    this.prompt = { content };
  }

  async getDefaultPrompt(): Promise<SystemPrompt> {
    return { ...this.prompt };
  }
}
