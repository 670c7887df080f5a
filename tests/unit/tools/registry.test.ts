import { z } from "zod";
import { builtinTools, currentTimeTool, echoTool } from "@/lib/tools/builtin";
import { ToolRegistry, defineTool } from "@/lib/tools/registry";

const FIXED_NOW = new Date("2024-03-01T12:00:00.000Z");

describe("ToolRegistry", () => {
  it("advertises the built-in tools", () => {
    const registry = new ToolRegistry(builtinTools());

    expect(registry.definitions().map((d) => d.name)).toEqual(["current_time", "echo"]);
    expect(registry.has("echo")).toBe(true);
    expect(registry.definitions()[1].parameters).toEqual({
      type: "object",
      properties: { text: { type: "string" } },
      required: ["text"],
    });
  });

  it("rejects duplicate registrations", () => {
    const registry = new ToolRegistry([echoTool()]);

    expect(() => registry.register(echoTool())).toThrow("Tool already registered: echo");
  });

  it("executes a tool with validated arguments", async () => {
    const registry = new ToolRegistry([echoTool()]);

    await expect(registry.execute("echo", { text: "hello" })).resolves.toEqual({ success: true, data: "hello" });
  });

  it("reports invalid arguments without running the handler", async () => {
    const handler = jest.fn();
    const registry = new ToolRegistry([
      defineTool({
        name: "add",
        description: "Adds two numbers",
        schema: z.object({ a: z.number(), b: z.number() }),
        parameters: { type: "object" },
        handler,
      }),
    ]);

    const result = await registry.execute("add", { a: 1 });

    expect(result).toEqual({ success: false, errorMessage: "Invalid arguments for add: b: Required" });
    expect(handler).not.toHaveBeenCalled();
  });

  it("reports unknown tools and handler errors as failures", async () => {
    const registry = new ToolRegistry([
      defineTool({
        name: "explode",
        description: "Always throws",
        schema: z.object({}),
        parameters: { type: "object" },
        handler: () => {
          throw new Error("kaboom");
        },
      }),
    ]);

    await expect(registry.execute("missing", {})).resolves.toEqual({
      success: false,
      errorMessage: "Unknown tool: missing",
    });
    await expect(registry.execute("explode", {})).resolves.toEqual({ success: false, errorMessage: "kaboom" });
  });
});

describe("current_time", () => {
  it("returns the time in UTC by default", async () => {
    const registry = new ToolRegistry([currentTimeTool({ now: () => FIXED_NOW })]);

    const result = await registry.execute("current_time", {});

    expect(result).toEqual({
      success: true,
      data: {
        iso: "2024-03-01T12:00:00.000Z",
        timeZone: "UTC",
        formatted: new Intl.DateTimeFormat("en-US", {
          timeZone: "UTC",
          dateStyle: "full",
          timeStyle: "long",
        }).format(FIXED_NOW),
      },
    });
  });

  it("fails for an unknown time zone", async () => {
    const registry = new ToolRegistry([currentTimeTool({ now: () => FIXED_NOW })]);

    const result = await registry.execute("current_time", { timeZone: "Mars/Olympus" });

    expect(result.success).toBe(false);
  });
});
