import { describe, it, expect, vi } from "vitest";
import { StreamConverter, convertStream } from "../src/services/streamConverter.js";
import type { StreamOutcome } from "../src/services/streamConverter.js";
import { createEnvelope, PipelineError } from "../src/services/errorTranslator.js";
import type { ClaudeStreamEvent } from "../src/types/anthropic.js";
import type { BackendChunk } from "../src/types/openai.js";
import { chunk, fromArray, toolCallChunk, usage, usageChunk } from "./helpers/backend-fixtures.js";

function run(chunks: BackendChunk[], finish: "end" | "none" = "end"): {
  events: ClaudeStreamEvent[];
  converter: StreamConverter;
} {
  const converter = new StreamConverter({ clientModel: "claude-3-5-sonnet-20241022" });
  const events = chunks.flatMap((c) => converter.push(c));
  if (finish === "end") events.push(...converter.end());
  return { events, converter };
}

function types(events: ClaudeStreamEvent[]): string[] {
  return events.map((e) => (e.type.startsWith("content_block") && "index" in e ? `${e.type}:${e.index}` : e.type));
}

/** Structural checks every emitted sequence must pass. */
function expectWellFormed(events: ClaudeStreamEvent[]): void {
  expect(events[0]?.type).toBe("message_start");
  const open = new Set<number>();
  const closed = new Set<number>();
  let lastIndex = -1;
  let terminal = false;

  for (const event of events) {
    expect(terminal).toBe(false);
    switch (event.type) {
      case "content_block_start":
        expect(event.index).toBeGreaterThan(lastIndex);
        expect(open.size).toBe(0);
        lastIndex = event.index;
        open.add(event.index);
        break;
      case "content_block_delta":
        expect(open.has(event.index)).toBe(true);
        break;
      case "content_block_stop":
        expect(open.has(event.index)).toBe(true);
        open.delete(event.index);
        closed.add(event.index);
        break;
      case "message_delta":
        expect(open.size).toBe(0);
        break;
      case "message_stop":
      case "error":
        terminal = true;
        break;
    }
  }
  expect(open.size).toBe(0);
  expect(terminal).toBe(true);
}

// ─── Text streams ───────────────────────────────────────────────────────────

describe("StreamConverter — text", () => {
  it("emits the full event sequence for a text stream with trailing usage", () => {
    const { events, converter } = run([
      chunk({ role: "assistant", content: "" }),
      chunk({ content: "Hel" }),
      chunk({ content: "lo" }),
      chunk({}, "stop"),
      usageChunk(10, 2),
    ]);

    expect(types(events)).toEqual([
      "message_start",
      "content_block_start:0",
      "content_block_delta:0",
      "content_block_delta:0",
      "content_block_stop:0",
      "message_delta",
      "message_stop",
    ]);
    expect(events[0]).toEqual({
      type: "message_start",
      message: {
        id: "chatcmpl-test",
        type: "message",
        role: "assistant",
        content: [],
        model: "claude-3-5-sonnet-20241022",
        stop_reason: null,
        stop_sequence: null,
        usage: { input_tokens: 0, output_tokens: 0 },
      },
    });
    expect(events[1]).toEqual({
      type: "content_block_start",
      index: 0,
      content_block: { type: "text", text: "" },
    });
    expect(events[5]).toEqual({
      type: "message_delta",
      delta: { stop_reason: "end_turn", stop_sequence: null },
      usage: { input_tokens: 10, output_tokens: 2 },
    });
    expect(converter.finalized).toBe(true);
    expect(converter.stopReason).toBe("end_turn");
    expectWellFormed(events);
  });

  it("finalizes immediately when the finishing fragment carries usage", () => {
    const converter = new StreamConverter({ clientModel: "m" });
    converter.push(chunk({ content: "Hi" }));
    const events = converter.push(chunk({}, "length", { usage: usage(4, 9) }));

    expect(types(events)).toEqual(["content_block_stop:0", "message_delta", "message_stop"]);
    expect(events[1]).toEqual({
      type: "message_delta",
      delta: { stop_reason: "max_tokens", stop_sequence: null },
      usage: { input_tokens: 4, output_tokens: 9 },
    });
    expect(converter.end()).toEqual([]);
  });

  it("waits for the usage fragment before finalizing", () => {
    const converter = new StreamConverter({ clientModel: "m" });
    converter.push(chunk({ content: "Hi" }));
    expect(types(converter.push(chunk({}, "stop")))).toEqual(["content_block_stop:0"]);
    expect(converter.finalized).toBe(false);

    const events = converter.push(usageChunk(7, 1));
    expect(types(events)).toEqual(["message_delta", "message_stop"]);
  });

  it("reports a matched stop string as stop_sequence", () => {
    const choice = { index: 0, delta: {}, finish_reason: "stop" as const, stop_reason: "###" };
    const finishing: BackendChunk = { ...chunk({}), choices: [choice], usage: usage(1, 1) };
    const { events } = run([chunk({ content: "a" }), finishing]);

    const delta = events.find((e) => e.type === "message_delta");
    expect(delta).toEqual({
      type: "message_delta",
      delta: { stop_reason: "stop_sequence", stop_sequence: "###" },
      usage: { input_tokens: 1, output_tokens: 1 },
    });
  });

  it("estimates output tokens from emitted characters when no usage arrives", () => {
    const { events, converter } = run([chunk({ content: "abcdefghij" })]);
    expect(converter.usage).toEqual({ input_tokens: 0, output_tokens: 3 });
    expect(events.find((e) => e.type === "message_delta")).toEqual({
      type: "message_delta",
      delta: { stop_reason: "end_turn", stop_sequence: null },
      usage: { input_tokens: 0, output_tokens: 3 },
    });
  });

  it("carries cached prompt tokens into the final usage", () => {
    const { events } = run([chunk({ content: "x" }, "stop", { usage: usage(100, 3, 64) })]);
    expect(events.find((e) => e.type === "message_delta")).toMatchObject({
      usage: { input_tokens: 100, output_tokens: 3, cache_read_input_tokens: 64 },
    });
  });
});

// ─── Tool calls ─────────────────────────────────────────────────────────────

describe("StreamConverter — tool calls", () => {
  it("streams argument fragments and parses them once the block closes", () => {
    const { events, converter } = run([
      chunk({ content: "Checking." }),
      toolCallChunk(0, { name: "get_weather", arguments: "" }, "call_1"),
      toolCallChunk(0, { arguments: '{"a":' }),
      toolCallChunk(0, { arguments: "1}" }),
      chunk({}, "tool_calls", { usage: usage(20, 8) }),
    ]);

    expect(types(events)).toEqual([
      "message_start",
      "content_block_start:0",
      "content_block_delta:0",
      "content_block_stop:0",
      "content_block_start:1",
      "content_block_delta:1",
      "content_block_delta:1",
      "content_block_stop:1",
      "message_delta",
      "message_stop",
    ]);
    expect(events[4]).toEqual({
      type: "content_block_start",
      index: 1,
      content_block: { type: "tool_use", id: "call_1", name: "get_weather", input: {} },
    });
    expect(events[5]).toEqual({
      type: "content_block_delta",
      index: 1,
      delta: { type: "input_json_delta", partial_json: '{"a":' },
    });
    expect(converter.toolCalls).toEqual([
      { index: 1, id: "call_1", name: "get_weather", arguments: '{"a":1}', input: { a: 1 } },
    ]);
    expect(converter.stopReason).toBe("tool_use");
    expectWellFormed(events);
  });

  it("opens one block per backend tool-call index", () => {
    const { events, converter } = run([
      toolCallChunk(0, { name: "first", arguments: "{}" }, "call_a"),
      toolCallChunk(1, { name: "second", arguments: '{"x":2}' }, "call_b"),
      chunk({}, "tool_calls"),
    ]);

    expect(types(events)).toEqual([
      "message_start",
      "content_block_start:0",
      "content_block_delta:0",
      "content_block_stop:0",
      "content_block_start:1",
      "content_block_delta:1",
      "content_block_stop:1",
      "message_delta",
      "message_stop",
    ]);
    expect(converter.toolCalls.map((c) => c.input)).toEqual([{}, { x: 2 }]);
    expectWellFormed(events);
  });

  it("generates a tool_use id when the backend omits one", () => {
    const { events } = run([toolCallChunk(0, { name: "lookup" })]);
    const start = events.find((e) => e.type === "content_block_start");
    expect(start).toMatchObject({ content_block: { type: "tool_use", name: "lookup" } });
    if (start?.type === "content_block_start" && start.content_block.type === "tool_use") {
      expect(start.content_block.id).toMatch(/^toolu_[0-9a-f]{32}$/);
    }
  });

  it("keeps unparseable arguments as raw text", () => {
    const { converter } = run([toolCallChunk(0, { name: "f", arguments: "{not json" }, "call_1")]);
    expect(converter.toolCalls[0]?.input).toBe("{not json");
  });

  it("treats a closed tool-call index reappearing as a decode error", () => {
    const { events, converter } = run(
      [
        toolCallChunk(0, { name: "a", arguments: "{}" }, "call_a"),
        toolCallChunk(1, { name: "b", arguments: "{}" }, "call_b"),
        toolCallChunk(0, { arguments: "{}" }),
      ],
      "none",
    );

    expect(types(events).slice(-2)).toEqual(["content_block_stop:1", "error"]);
    expect(events[events.length - 1]).toEqual({
      type: "error",
      error: { type: "api_error", message: "Tool call 0 continued after its block was closed" },
    });
    expect(converter.failure?.kind).toBe("decode-error");
    expect(converter.finalized).toBe(true);
    expectWellFormed(events);
  });
});

// ─── Premature end, failure, cancellation ──────────────────────────────────

describe("StreamConverter — termination", () => {
  it("closes the open block and finalizes with end_turn when the stream ends early", () => {
    const { events } = run([chunk({ content: "Hi" })]);
    expect(types(events)).toEqual([
      "message_start",
      "content_block_start:0",
      "content_block_delta:0",
      "content_block_stop:0",
      "message_delta",
      "message_stop",
    ]);
    expect(events[4]).toEqual({
      type: "message_delta",
      delta: { stop_reason: "end_turn", stop_sequence: null },
      usage: { input_tokens: 0, output_tokens: 1 },
    });
  });

  it("produces a complete message for an empty stream", () => {
    const { events } = run([]);
    expect(types(events)).toEqual(["message_start", "message_delta", "message_stop"]);
    const start = events[0];
    if (start?.type === "message_start") {
      expect(start.message.id).toMatch(/^msg_[0-9a-f]{32}$/);
    }
  });

  it("ends a failed stream with an error event and nothing after it", () => {
    const converter = new StreamConverter({ clientModel: "m" });
    converter.push(chunk({ content: "partial" }));
    const events = converter.fail(createEnvelope("upstream-error", "connection reset", { status: 500 }));

    expect(events).toEqual([
      { type: "content_block_stop", index: 0 },
      { type: "error", error: { type: "api_error", message: "connection reset" } },
    ]);
    expect(converter.push(chunk({ content: "late" }))).toEqual([]);
    expect(converter.end()).toEqual([]);
    expect(converter.stopReason).toBeNull();
  });

  it("finalizes a cancelled stream cleanly with end_turn", () => {
    const converter = new StreamConverter({ clientModel: "m" });
    converter.push(toolCallChunk(0, { name: "f", arguments: '{"q":1}' }, "call_1"));
    const events = converter.fail(createEnvelope("cancelled", "Request cancelled by client"));

    expect(types(events)).toEqual(["content_block_stop:0", "message_delta", "message_stop"]);
    expect(converter.stopReason).toBe("end_turn");
    expect(converter.toolCalls[0]?.input).toEqual({ q: 1 });
  });

  it("ignores content after the finish reason", () => {
    const { events } = run([chunk({ content: "a" }, "stop"), chunk({ content: "ignored" }), usageChunk(1, 1)]);
    expect(types(events)).toEqual([
      "message_start",
      "content_block_start:0",
      "content_block_delta:0",
      "content_block_stop:0",
      "message_delta",
      "message_stop",
    ]);
  });
});

// ─── Driver ─────────────────────────────────────────────────────────────────

describe("convertStream", () => {
  async function collect(source: AsyncIterable<ClaudeStreamEvent>): Promise<ClaudeStreamEvent[]> {
    const events: ClaudeStreamEvent[] = [];
    for await (const event of source) events.push(event);
    return events;
  }

  it("reports success once the sequence completes", async () => {
    const onComplete = vi.fn<(outcome: StreamOutcome) => void>();
    const converter = new StreamConverter({ clientModel: "m" });
    const events = await collect(
      convertStream(fromArray([chunk({ content: "ok" }, "stop"), usageChunk(3, 1)]), converter, onComplete),
    );

    expect(events[events.length - 1]).toEqual({ type: "message_stop" });
    expect(onComplete).toHaveBeenCalledWith({ status: "success" });
  });

  it("turns an upstream failure mid-stream into a terminal error event", async () => {
    async function* failing(): AsyncGenerator<BackendChunk> {
      yield chunk({ content: "par" });
      throw new PipelineError(createEnvelope("upstream-error", "Backend went away", { status: 502 }));
    }
    const onComplete = vi.fn<(outcome: StreamOutcome) => void>();
    const events = await collect(convertStream(failing(), new StreamConverter({ clientModel: "m" }), onComplete));

    expect(types(events)).toEqual([
      "message_start",
      "content_block_start:0",
      "content_block_delta:0",
      "content_block_stop:0",
      "error",
    ]);
    expect(events[4]).toEqual({ type: "error", error: { type: "api_error", message: "Backend went away" } });
    expect(onComplete).toHaveBeenCalledWith({
      status: "error",
      error: { kind: "upstream-error", message: "Backend went away", status: 502 },
    });
  });

  it("stops reading once a fragment fails to decode", async () => {
    const read = vi.fn();
    async function* source(): AsyncGenerator<BackendChunk> {
      yield toolCallChunk(0, { name: "a" }, "call_a");
      yield toolCallChunk(1, { name: "b" }, "call_b");
      yield toolCallChunk(0, { arguments: "{}" });
      read();
      yield chunk({ content: "never" });
    }
    const onComplete = vi.fn<(outcome: StreamOutcome) => void>();
    const events = await collect(convertStream(source(), new StreamConverter({ clientModel: "m" }), onComplete));

    expect(events[events.length - 1]?.type).toBe("error");
    expect(read).not.toHaveBeenCalled();
    expect(onComplete.mock.calls[0]?.[0].status).toBe("error");
  });

  it("reports cancellation as its own outcome", async () => {
    async function* cancelled(): AsyncGenerator<BackendChunk> {
      yield chunk({ content: "a" });
      throw new PipelineError(createEnvelope("cancelled", "Request cancelled by client"));
    }
    const onComplete = vi.fn<(outcome: StreamOutcome) => void>();
    const events = await collect(convertStream(cancelled(), new StreamConverter({ clientModel: "m" }), onComplete));

    expect(events[events.length - 1]).toEqual({ type: "message_stop" });
    expect(onComplete).toHaveBeenCalledWith({ status: "cancelled" });
  });
});

// ─── Malformed fragments ────────────────────────────────────────────────────

describe("StreamConverter — malformed fragments", () => {
  // Goes through JSON the way the SDK hands fragments over: typed, never checked.
  function decoded(delta: Record<string, unknown>): BackendChunk {
    return JSON.parse(JSON.stringify({ ...chunk({}), choices: [{ index: 0, delta, finish_reason: null }] }));
  }

  it("ends the stream with a decode error when tool arguments are not text", () => {
    const converter = new StreamConverter({ clientModel: "m" });
    const events = [
      ...converter.push(toolCallChunk(0, { name: "f", arguments: "" }, "call_1")),
      ...converter.push(decoded({ tool_calls: [{ index: 0, function: { arguments: { a: 1 } } }] })),
    ];

    expect(types(events)).toEqual(["message_start", "content_block_start:0", "content_block_stop:0", "error"]);
    expect(events[3]).toEqual({
      type: "error",
      error: { type: "api_error", message: "Tool call 0 arguments is not a string" },
    });
    expect(converter.failure?.kind).toBe("decode-error");
    expect(converter.toolCalls[0]?.arguments).toBe("");
    expect(converter.usage).toEqual({ input_tokens: 0, output_tokens: 0 });
    expectWellFormed(events);
  });

  it("ends the stream with a decode error when content is not text", () => {
    const converter = new StreamConverter({ clientModel: "m" });
    converter.push(chunk({ content: "ok" }));
    const events = converter.push(decoded({ content: { text: "nope" } }));

    expect(events).toEqual([
      { type: "content_block_stop", index: 0 },
      { type: "error", error: { type: "api_error", message: "Stream fragment content is not a string" } },
    ]);
    expect(converter.usage.output_tokens).toBe(1);
  });

  it("rejects a tool call whose function is not an object", () => {
    const converter = new StreamConverter({ clientModel: "m" });
    const events = converter.push(decoded({ tool_calls: [{ index: 2, function: "f" }] }));

    expect(events[events.length - 1]).toEqual({
      type: "error",
      error: { type: "api_error", message: "Tool call 2 function is not an object" },
    });
  });
});
