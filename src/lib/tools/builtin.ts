import { z } from "zod";
import { defineTool, type RegisteredTool } from "./registry";

export interface BuiltinToolOptions {
  now?: () => Date;
}

export function currentTimeTool(options: BuiltinToolOptions = {}): RegisteredTool {
  const now = options.now ?? (() => new Date());
  return defineTool({
    name: "current_time",
    description: "Returns the current date and time, optionally in a given IANA time zone.",
    schema: z.object({ timeZone: z.string().min(1).optional() }),
    parameters: {
      type: "object",
      properties: {
        timeZone: { type: "string", description: "IANA time zone, e.g. Europe/Paris" },
      },
    },
    handler: ({ timeZone }) => {
      const date = now();
      const zone = timeZone ?? "UTC";
      // Throws RangeError for unknown zones
      const formatted = new Intl.DateTimeFormat("en-US", {
        timeZone: zone,
        dateStyle: "full",
        timeStyle: "long",
      }).format(date);
      return { iso: date.toISOString(), timeZone: zone, formatted };
    },
  });
}

export function echoTool(): RegisteredTool {
  return defineTool({
    name: "echo",
    description: "Returns the given text unchanged.",
    schema: z.object({ text: z.string() }),
    parameters: {
      type: "object",
      properties: { text: { type: "string" } },
      required: ["text"],
    },
    handler: ({ text }) => text,
  });
}

export function builtinTools(options: BuiltinToolOptions = {}): RegisteredTool[] {
  return [currentTimeTool(options), echoTool()];
}
