import {
  ToolCallProcessor,
  detectInlineToolCalls,
  detectToolInvocations,
  formatToolResult,
  parseKeyValuePairs,
  parseToolArguments,
} from "@/lib/llm/tool-calls";
import type { ToolArguments, ToolExecutor, ToolResult } from "@/lib/llm/types";
import { makeResponse } from "../../helpers/mock-provider";

function createExecutor(
  impl: (name: string, args: ToolArguments) => Promise<ToolResult>
): ToolExecutor & { execute: jest.Mock } {
  return { execute: jest.fn(impl) };
}

describe("parseToolArguments", () => {
  it("parses a JSON object", () => {
    expect(parseToolArguments('{"location": "Paris", "days": [1, 2]}')).toEqual({
      location: "Paris",
      days: [1, 2],
    });
  });

  it("falls back to key: value lines", () => {
    expect(parseToolArguments("location: Paris\ndays: 3")).toEqual({ location: "Paris", days: 3 });
  });

  it("treats JSON that is not an object as key: value text", () => {
    expect(parseToolArguments("[1, 2]")).toEqual({});
  });

  it("returns no arguments for blank input", () => {
    expect(parseToolArguments("   ")).toEqual({});
  });
});

describe("parseKeyValuePairs", () => {
  it("coerces integers, floats and booleans and keeps other values as strings", () => {
    const input = [
      "count: 42",
      "ratio: 0.5",
      "flag: True",
      "off: false",
      "name: Ada Lovelace",
      "url: http://example.test/a",
      "not a pair",
    ].join("\n");

    expect(parseKeyValuePairs(input)).toEqual({
      count: 42,
      ratio: 0.5,
      flag: true,
      off: false,
      name: "Ada Lovelace",
      url: "http://example.test/a",
    });
  });
});

describe("formatToolResult", () => {
  it("renders strings as-is and other data as indented JSON", () => {
    expect(formatToolResult({ success: true, data: "18C" })).toBe("18C");
    expect(formatToolResult({ success: true, data: { a: 1 } })).toBe('{\n  "a": 1\n}');
    expect(formatToolResult({ success: true, data: undefined })).toBe("null");
  });

  it("renders failures as error text", () => {
    expect(formatToolResult({ success: false, errorMessage: "nope" })).toBe("Error: nope");
  });
});

describe("detection", () => {
  it("finds fenced tool blocks with their positions", () => {
    const text = "Hi ```tool echo\ntext: yo\n``` bye";

    expect(detectInlineToolCalls(text)).toEqual([
      { kind: "inline", name: "echo", rawArgs: "text: yo", start: 3, end: 28 },
    ]);
  });

  it("prefers structured calls over inline blocks", () => {
    const call = { id: "call_1", name: "echo", arguments: "{}" };
    const response = makeResponse("a", "```tool other\nx: 1\n```", { toolCalls: [call] });

    expect(detectToolInvocations(response)).toEqual([{ kind: "structured", call }]);
  });
});

describe("ToolCallProcessor", () => {
  it("returns the response untouched when there are no tool calls", async () => {
    const executor = createExecutor(async () => ({ success: true, data: "unused" }));
    const response = makeResponse("a", "plain answer");

    await expect(new ToolCallProcessor(executor).process(response)).resolves.toBe(response);
    expect(executor.execute).not.toHaveBeenCalled();
  });

  it("appends structured tool results to the response text", async () => {
    const executor = createExecutor(async () => ({ success: true, data: "18C" }));
    const response = makeResponse("a", "Let me check.", {
      toolCalls: [{ id: "call_1", name: "get_weather", arguments: '{"location":"Paris"}' }],
    });

    const result = await new ToolCallProcessor(executor).process(response);

    expect(executor.execute).toHaveBeenCalledWith("get_weather", { location: "Paris" }, undefined);
    expect(result.content).toBe("Let me check.\n\nTool: get_weather\nResult: 18C");
    expect(response.content).toBe("Let me check.");
  });

  it("replaces an inline block with malformed JSON by a result block", async () => {
    const executor = createExecutor(async () => ({ success: true, data: { temp: "18C" } }));
    const response = makeResponse("a", 'Checking.\n```tool get_weather\n{"location": "Paris"\n```\nDone.');

    const result = await new ToolCallProcessor(executor).process(response);

    expect(executor.execute).toHaveBeenCalledWith("get_weather", { '{"location"': '"Paris"' }, undefined);
    expect(result.content).toBe(
      'Checking.\n```tool get_weather\n{"location": "Paris"\n```' +
        '\n\n**Tool Result:**\n```json\n{\n  "temp": "18C"\n}\n```' +
        "\nDone."
    );
  });

  it("reports what streamed output is still missing", async () => {
    const executor = createExecutor(async () => ({ success: true, data: "18C" }));
    const processor = new ToolCallProcessor(executor);

    const inline = await processor.processStreamed(
      makeResponse("a", "Checking.\n```tool get_weather\ncity: Paris\n```\nDone.")
    );
    expect(inline.trailing).toBe("\n\n**Tool Result (get_weather):**\n```json\n18C\n```");

    const structured = await processor.processStreamed(
      makeResponse("a", "Let me check.", {
        toolCalls: [{ id: "call_1", name: "get_weather", arguments: '{"city":"Paris"}' }],
      })
    );
    expect(structured.trailing).toBe("\n\nTool: get_weather\nResult: 18C");

    const plain = await processor.processStreamed(makeResponse("a", "no tools"));
    expect(plain.trailing).toBe("");
  });

  it("keeps running the remaining calls when one throws or fails", async () => {
    const executor = createExecutor(async (name) => {
      if (name === "a") throw new Error("boom");
      if (name === "b") return { success: false, errorMessage: "bad input" };
      return { success: true, data: "ok" };
    });
    const response = makeResponse("p", "", {
      toolCalls: [
        { id: "1", name: "a", arguments: "{}" },
        { id: "2", name: "b", arguments: "{}" },
        { id: "3", name: "c", arguments: "{}" },
      ],
    });

    const result = await new ToolCallProcessor(executor).process(response);

    expect(executor.execute).toHaveBeenCalledTimes(3);
    expect(result.content).toBe(
      "\n\nTool: a\nResult: Error: boom" + "\n\nTool: b\nResult: Error: bad input" + "\n\nTool: c\nResult: ok"
    );
  });

  it("propagates cancellation", async () => {
    const executor = createExecutor(async () => {
      const error = new Error("The operation was aborted");
      error.name = "AbortError";
      throw error;
    });
    const response = makeResponse("p", "```tool echo\ntext: hi\n```");

    await expect(new ToolCallProcessor(executor).process(response)).rejects.toThrow(
      "The operation was aborted"
    );
  });
});
