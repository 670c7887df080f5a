import type { z } from "zod";
import { createLogger, type Logger } from "../logger";
import { errorMessage, isAbortError } from "../llm/errors";
import type { ToolArguments, ToolDefinition, ToolExecutor, ToolResult } from "../llm/types";

export interface ToolSpec<S extends z.ZodTypeAny> {
  name: string;
  description: string;
  /** Validates the arguments before the handler runs */
  schema: S;
  /** JSON schema advertised to providers for native tool use */
  parameters: Record<string, unknown>;
  handler: (args: z.infer<S>, signal?: AbortSignal) => unknown;
}

export interface RegisteredTool {
  readonly definition: ToolDefinition;
  invoke(args: ToolArguments, signal?: AbortSignal): Promise<ToolResult>;
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

export function defineTool<S extends z.ZodTypeAny>(spec: ToolSpec<S>): RegisteredTool {
  return {
    definition: { name: spec.name, description: spec.description, parameters: spec.parameters },
    async invoke(args, signal) {
      const parsed = spec.schema.safeParse(args);
      if (!parsed.success) {
        return { success: false, errorMessage: `Invalid arguments for ${spec.name}: ${formatIssues(parsed.error)}` };
      }
      return { success: true, data: await spec.handler(parsed.data, signal) };
    },
  };
}

/** In-process tool executor keyed by tool name */
export class ToolRegistry implements ToolExecutor {
  private readonly tools = new Map<string, RegisteredTool>();
  private readonly logger: Logger;

  constructor(tools: RegisteredTool[] = [], logger?: Logger) {
    this.logger = logger ?? createLogger("tools");
    for (const tool of tools) this.register(tool);
  }

  register(tool: RegisteredTool): void {
    if (this.tools.has(tool.definition.name)) {
      throw new Error(`Tool already registered: ${tool.definition.name}`);
    }
    this.tools.set(tool.definition.name, tool);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  definitions(): ToolDefinition[] {
    return [...this.tools.values()].map((tool) => tool.definition);
  }

  async execute(toolName: string, args: ToolArguments, signal?: AbortSignal): Promise<ToolResult> {
    const tool = this.tools.get(toolName);
    if (!tool) {
      return { success: false, errorMessage: `Unknown tool: ${toolName}` };
    }

    try {
      const result = await tool.invoke(args, signal);
      this.logger.debug({ tool: toolName, success: result.success }, "Tool executed");
      return result;
    } catch (error) {
      if (isAbortError(error, signal)) throw error;
      return { success: false, errorMessage: errorMessage(error) };
    }
  }
}
