import { z } from "zod";
import { createLogger, type Logger } from "../logger";
import { errorMessage, isAbortError } from "./errors";
import type { LLMResponse, ToolArguments, ToolCall, ToolExecutor, ToolResult } from "./types";

/**
 * A tool invocation found in a model response. Structured calls come from the
 * provider's native tool-use channel; inline calls are fenced blocks in the
 * response text:
 *
 *     ```tool get_weather
 *     {"location": "Paris"}
 *     ```
 */
export type DetectedToolInvocation =
  | { kind: "structured"; call: ToolCall }
  | { kind: "inline"; name: string; rawArgs: string; start: number; end: number };

const INLINE_TOOL_PATTERN = /```tool\s+(\w+)\s+([\s\S]*?)```/g;

const JsonArgumentsSchema = z.record(z.unknown());

// ─── Argument parsing ────────────────────────────────────────────────────────

/** JSON object first, then `key: value` lines */
export function parseToolArguments(raw: string): ToolArguments {
  const trimmed = raw.trim();
  if (trimmed.length === 0) return {};

  try {
    const parsed = JsonArgumentsSchema.safeParse(JSON.parse(trimmed));
    if (parsed.success) return parsed.data;
  } catch {
    // not JSON
  }
  return parseKeyValuePairs(trimmed);
}

/** Values coerce to integer, then float, then boolean, else stay strings */
export function parseKeyValuePairs(input: string): ToolArguments {
  const args: ToolArguments = {};
  for (const line of input.split("\n")) {
    const colon = line.indexOf(":");
    if (colon === -1) continue;

    const key = line.slice(0, colon).trim();
    const value = line.slice(colon + 1).trim();
    if (!key) continue;
    args[key] = coerceValue(value);
  }
  return args;
}

function coerceValue(value: string): unknown {
  if (/^[+-]?\d+$/.test(value)) {
    const n = Number(value);
    if (Number.isSafeInteger(n)) return n;
  }
  if (/^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/.test(value)) {
    return Number(value);
  }
  const lower = value.toLowerCase();
  if (lower === "true") return true;
  if (lower === "false") return false;
  return value;
}

export function formatToolResult(result: ToolResult): string {
  if (!result.success) return `Error: ${result.errorMessage}`;
  if (typeof result.data === "string") return result.data;
  return JSON.stringify(result.data, null, 2) ?? "null";
}

// ─── Detection ───────────────────────────────────────────────────────────────

export function detectToolInvocations(response: LLMResponse): DetectedToolInvocation[] {
  if (response.toolCalls.length > 0) {
    return response.toolCalls.map((call) => ({ kind: "structured" as const, call }));
  }
  return detectInlineToolCalls(response.content);
}

export function detectInlineToolCalls(text: string): DetectedToolInvocation[] {
  const found: DetectedToolInvocation[] = [];
  for (const match of text.matchAll(INLINE_TOOL_PATTERN)) {
    const start = match.index ?? 0;
    found.push({
      kind: "inline",
      name: match[1].trim(),
      rawArgs: match[2].trim(),
      start,
      end: start + match[0].length,
    });
  }
  return found;
}

// ─── Processor ───────────────────────────────────────────────────────────────

export interface ProcessedResponse {
  response: LLMResponse;
  trailing: string;
}

function resultBlock(invocation: DetectedToolInvocation, result: string): string {
  if (invocation.kind === "structured") {
    return `\n\nTool: ${invocation.call.name}\nResult: ${result}`;
  }
  return `\n\n**Tool Result (${invocation.name}):**\n\`\`\`json\n${result}\n\`\`\``;
}

/**
 * Executes the tool invocations in a response and folds their results back
 * into the response text. A failing tool becomes "Error: ..." text; it never
 * stops the remaining calls and never throws out of `process`. The only thing
 * that propagates is cancellation.
 */
export class ToolCallProcessor {
  private readonly executor: ToolExecutor;
  private readonly logger: Logger;

  constructor(executor: ToolExecutor, logger?: Logger) {
    this.executor = executor;
    this.logger = logger ?? createLogger("tool-calls");
  }

  async process(response: LLMResponse, signal?: AbortSignal): Promise<LLMResponse> {
    return (await this.processStreamed(response, signal)).response;
  }

  /**
   * Same as `process`, plus `trailing`: what a caller that has already
   * streamed `response.content` still needs to show for every tool result to
   * be seen.
   */
  async processStreamed(response: LLMResponse, signal?: AbortSignal): Promise<ProcessedResponse> {
    const invocations = detectToolInvocations(response);
    if (invocations.length === 0) return { response, trailing: "" };

    const results: string[] = [];
    for (const invocation of invocations) {
      results.push(await this.run(invocation, signal));
    }

    const content = this.render(response.content, invocations, results);
    const trailing = content.startsWith(response.content)
      ? content.slice(response.content.length)
      : invocations.map((invocation, i) => resultBlock(invocation, results[i])).join("");
    return { response: { ...response, content }, trailing };
  }

  private async run(invocation: DetectedToolInvocation, signal?: AbortSignal): Promise<string> {
    const name = invocation.kind === "structured" ? invocation.call.name : invocation.name;
    const raw = invocation.kind === "structured" ? invocation.call.arguments : invocation.rawArgs;

    try {
      const result = await this.executor.execute(name, parseToolArguments(raw), signal);
      if (!result.success) {
        this.logger.warn({ tool: name, err: result.errorMessage }, "Tool returned an error");
      }
      return formatToolResult(result);
    } catch (error) {
      if (isAbortError(error, signal)) throw error;
      this.logger.error({ tool: name, err: errorMessage(error) }, "Error executing tool");
      return `Error: ${errorMessage(error)}`;
    }
  }

  private render(
    content: string,
    invocations: DetectedToolInvocation[],
    results: string[]
  ): string {
    let output = "";
    let cursor = 0;

    invocations.forEach((invocation, i) => {
      if (invocation.kind === "structured") {
        output += resultBlock(invocation, results[i]);
        return;
      }
      output +=
        content.slice(cursor, invocation.start) +
        `\`\`\`tool ${invocation.name}\n${invocation.rawArgs}\n\`\`\`` +
        `\n\n**Tool Result:**\n\`\`\`json\n${results[i]}\n\`\`\``;
      cursor = invocation.end;
    });

    // Structured results are appended; inline ones were spliced into place
    return cursor === 0 ? content + output : output + content.slice(cursor);
  }
}
