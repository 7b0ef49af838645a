import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { rejection } from "../../test/helpers.js";
import { RemoteToolError, ToolPairingError, TransportClosed } from "../mcp/errors.js";
import { firstContentValue } from "../mcp/parseContent.js";
import type { JsonObject, ToolSchema } from "../mcp/types.js";
import type { MessageRequest, MessageResponse, ModelClient, OutputBlock, ToolUseBlock } from "./model.js";
import { pairToolResults, runConversation, type LoopState } from "./run.js";
import type { ToolExecutor } from "./tools/invoke.js";

/** Model stand-in that replays scripted turns and keeps every request. */
class ScriptedModel implements ModelClient {
  readonly requests: MessageRequest[] = [];

  constructor(private readonly turns: Array<OutputBlock[] | ((n: number) => OutputBlock[])>) {}

  async createMessage(request: MessageRequest): Promise<MessageResponse> {
    this.requests.push(structuredClone(request));
    const n = this.requests.length;
    const turn = this.turns[Math.min(n, this.turns.length) - 1];
    if (!turn) throw new Error("no scripted turn");
    return { content: typeof turn === "function" ? turn(n) : turn };
  }
}

class RecordingExecutor implements ToolExecutor {
  readonly calls: Array<{ name: string; args: JsonObject }> = [];

  constructor(private readonly impl: (name: string, args: JsonObject) => Promise<unknown> = async () => "ok") {}

  async callTool(name: string, args: JsonObject): Promise<unknown> {
    this.calls.push({ name, args });
    return this.impl(name, args);
  }
}

const text = (t: string): OutputBlock => ({ type: "text", text: t });
const toolUse = (id: string, name: string, input: JsonObject = {}): ToolUseBlock => ({ type: "tool_use", id, name, input });

const toolSchemas: ToolSchema[] = [
  {
    name: "browser_navigate",
    description: "Navigate to a URL",
    input_schema: { type: "object", properties: { url: { type: "string" } }, required: ["url"] },
  },
];

function run(model: ModelClient, tools: ToolExecutor, extra: { maxIterations?: number; onState?: (s: LoopState, i: number) => void } = {}) {
  return runConversation({
    model,
    modelName: "test-model",
    tools,
    toolSchemas,
    task: "Open example.com and report the heading",
    system: "You control a browser.",
    maxTokens: 1024,
    ...extra,
  });
}

beforeEach(() => {
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("runConversation", () => {
  it("finishes on the first turn without tool calls", async () => {
    const model = new ScriptedModel([[text("The heading is "), text("Example Domain")]]);
    const tools = new RecordingExecutor();

    const result = await run(model, tools);

    expect(result.status).toBe("done");
    expect(result.text).toBe("The heading is Example Domain");
    expect(result.iterations).toBe(1);
    expect(model.requests).toHaveLength(1);
    expect(tools.calls).toEqual([]);
  });

  it("sends the seeded history, system prompt and tool catalog", async () => {
    const model = new ScriptedModel([[text("done")]]);

    await run(model, new RecordingExecutor());

    expect(model.requests[0]).toEqual({
      model: "test-model",
      max_tokens: 1024,
      system: "You control a browser.",
      messages: [{ role: "user", content: "Open example.com and report the heading" }],
      tools: toolSchemas,
    });
  });

  it("feeds a tool result back and asks the model again", async () => {
    const call = toolUse("toolu_01", "navigate", { url: "https://example.com" });
    const model = new ScriptedModel([[call], [text("Navigated.")]]);
    const tools = new RecordingExecutor(async () => firstContentValue({ content: [{ text: "ok" }] }));

    const result = await run(model, tools);

    expect(tools.calls).toEqual([{ name: "navigate", args: { url: "https://example.com" } }]);
    expect(model.requests).toHaveLength(2);
    expect(model.requests[1]?.messages).toEqual([
      { role: "user", content: "Open example.com and report the heading" },
      { role: "assistant", content: [call] },
      { role: "user", content: [{ type: "tool_result", tool_use_id: "toolu_01", content: "ok" }] },
    ]);
    expect(result).toMatchObject({ status: "done", text: "Navigated.", iterations: 2 });
  });

  it("stringifies non-text tool results", async () => {
    const model = new ScriptedModel([[toolUse("t1", "browser_take_screenshot")], [text("seen")]]);
    const tools = new RecordingExecutor(async () => ({ type: "image", mimeType: "image/png" }));

    await run(model, tools);

    expect(model.requests[1]?.messages[2]).toEqual({
      role: "user",
      content: [{ type: "tool_result", tool_use_id: "t1", content: '{"type":"image","mimeType":"image/png"}' }],
    });
  });

  it("runs a turn's tool calls sequentially and answers them in one message", async () => {
    const events: string[] = [];
    const model = new ScriptedModel([
      [text("Filling the form."), toolUse("a", "browser_type"), toolUse("b", "browser_click")],
      [text("Submitted.")],
    ]);
    const tools = new RecordingExecutor(async (name) => {
      events.push(`start ${name}`);
      await new Promise((r) => setTimeout(r, 5));
      events.push(`end ${name}`);
      return `${name} ok`;
    });

    await run(model, tools);

    expect(events).toEqual(["start browser_type", "end browser_type", "start browser_click", "end browser_click"]);
    expect(model.requests[1]?.messages[2]).toEqual({
      role: "user",
      content: [
        { type: "tool_result", tool_use_id: "a", content: "browser_type ok" },
        { type: "tool_result", tool_use_id: "b", content: "browser_click ok" },
      ],
    });
  });

  it("reports tool failures to the model as error results and keeps going", async () => {
    const model = new ScriptedModel([[toolUse("a", "browser_click"), toolUse("b", "browser_snapshot")], [text("Recovered.")]]);
    const tools = new RecordingExecutor(async (name) => {
      if (name === "browser_click") throw new RemoteToolError({ code: -1, message: "bad args" });
      return "snapshot";
    });

    const result = await run(model, tools);

    expect(model.requests[1]?.messages[2]).toEqual({
      role: "user",
      content: [
        { type: "tool_result", tool_use_id: "a", content: "Error: Tool server error: -1 bad args", is_error: true },
        { type: "tool_result", tool_use_id: "b", content: "snapshot" },
      ],
    });
    expect(result.status).toBe("done");
  });

  it("completes a turn whose calls reuse one id", async () => {
    const model = new ScriptedModel([[toolUse("call_0", "browser_type"), toolUse("call_0", "browser_click")], [text("ok")]]);
    const tools = new RecordingExecutor(async (name) => `${name} done`);

    const result = await run(model, tools);

    expect(result.status).toBe("done");
    expect(model.requests[1]?.messages[2]).toEqual({
      role: "user",
      content: [
        { type: "tool_result", tool_use_id: "call_0", content: "browser_type done" },
        { type: "tool_result", tool_use_id: "call_0", content: "browser_click done" },
      ],
    });
  });

  it("propagates transport failures", async () => {
    const model = new ScriptedModel([[toolUse("a", "browser_navigate")], [text("unreachable")]]);
    const tools = new RecordingExecutor(async () => {
      throw new TransportClosed();
    });

    await rejection(run(model, tools), TransportClosed);
    expect(model.requests).toHaveLength(1);
  });

  it("stops at the iteration ceiling without another model call", async () => {
    const model = new ScriptedModel([(n) => [text(`step ${n}`), toolUse(`call_${n}`, "browser_snapshot")]]);
    const tools = new RecordingExecutor();

    const result = await run(model, tools);

    expect(result.status).toBe("max_iterations");
    expect(result.iterations).toBe(30);
    expect(result.text).toBe("step 30");
    expect(model.requests).toHaveLength(30);
    expect(tools.calls).toHaveLength(30);
    // the 30th turn's tool still ran and was answered
    expect(result.messages.at(-1)).toEqual({
      role: "user",
      content: [{ type: "tool_result", tool_use_id: "call_30", content: "ok" }],
    });
  });

  it("returns empty text when the last turn at the ceiling had none", async () => {
    const model = new ScriptedModel([(n) => [toolUse(`call_${n}`, "browser_wait_for")]]);

    const result = await run(model, new RecordingExecutor(), { maxIterations: 3 });

    expect(result).toMatchObject({ status: "max_iterations", text: "", iterations: 3 });
    expect(model.requests).toHaveLength(3);
  });

  it("ends in done when the tool-free turn is exactly the last allowed one", async () => {
    const model = new ScriptedModel([[toolUse("1", "browser_navigate")], [toolUse("2", "browser_snapshot")], [text("fin")]]);

    const result = await run(model, new RecordingExecutor(), { maxIterations: 3 });

    expect(result).toMatchObject({ status: "done", text: "fin", iterations: 3 });
  });

  it("reports state transitions", async () => {
    const states: string[] = [];
    const model = new ScriptedModel([[toolUse("1", "browser_navigate")], [text("fin")]]);

    await run(model, new RecordingExecutor(), { onState: (s, i) => states.push(`${i}:${s}`) });

    expect(states).toEqual([
      "1:awaiting_model",
      "1:model_responded",
      "1:executing_tools",
      "2:awaiting_model",
      "2:model_responded",
      "2:done",
    ]);
  });
});

describe("pairToolResults", () => {
  const calls = [toolUse("a", "x"), toolUse("b", "y")];

  it("orders results by the calls they answer", () => {
    const results = [
      { type: "tool_result" as const, tool_use_id: "b", content: "B" },
      { type: "tool_result" as const, tool_use_id: "a", content: "A" },
    ];

    expect(pairToolResults(calls, results).map((r) => r.content)).toEqual(["A", "B"]);
  });

  it("answers calls that share an id by position", () => {
    const twins = [toolUse("dup", "browser_type"), toolUse("dup", "browser_click")];
    const results = [
      { type: "tool_result" as const, tool_use_id: "dup", content: "typed" },
      { type: "tool_result" as const, tool_use_id: "dup", content: "clicked" },
    ];

    expect(pairToolResults(twins, results).map((r) => r.content)).toEqual(["typed", "clicked"]);
  });

  it("rejects an unanswered call", () => {
    const attempt = () => pairToolResults(calls, [{ type: "tool_result", tool_use_id: "a", content: "A" }]);

    expect(attempt).toThrow(ToolPairingError);
    expect(attempt).toThrow("Tool call b (y) has no result");
  });

  it("rejects results for unknown calls", () => {
    expect(() =>
      pairToolResults(calls, [
        { type: "tool_result", tool_use_id: "a", content: "A" },
        { type: "tool_result", tool_use_id: "b", content: "B" },
        { type: "tool_result", tool_use_id: "c", content: "C" },
      ]),
    ).toThrow("Tool results reference unknown tool calls");
  });
});
