import type {
  ClaudeStreamEvent,
  ClaudeUsage,
  StopReason,
} from "../types/anthropic.js";
import type { BackendChunk } from "../types/openai.js";
import {
  PipelineError,
  decodeError,
  isRecord,
  toClaudeError,
  translateBackendError,
} from "./errorTranslator.js";
import { generateMessageId, generateToolUseId } from "./ids.js";
import type { ErrorEnvelope } from "./errorTranslator.js";
import {
  convertUsage,
  mapFinishReason,
  matchedStopSequence,
  parseToolArguments,
} from "./responseConverter.js";
import type { MappedStop } from "./responseConverter.js";

// ── Fragment checks ─────────────────────────────────────────────────────────
// The SDK types fragments but does not validate them.

interface ToolCallDelta {
  index: number;
  id: string | undefined;
  name: string | undefined;
  arguments: string | undefined;
}

function optionalString(value: unknown, what: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw decodeError(`${what} is not a string`);
  }
  return value;
}

function readToolCallDeltas(value: unknown): ToolCallDelta[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw decodeError("Stream fragment tool_calls is not an array");
  }
  return value.map((call: unknown): ToolCallDelta => {
    if (!isRecord(call)) {
      throw decodeError("Stream fragment tool call is not an object");
    }
    const index = call.index ?? 0;
    if (typeof index !== "number") {
      throw decodeError("Stream fragment tool call index is not a number");
    }
    const fn = call.function ?? {};
    if (!isRecord(fn)) {
      throw decodeError(`Tool call ${index} function is not an object`);
    }
    return {
      index,
      id: optionalString(call.id, `Tool call ${index} id`),
      name: optionalString(fn.name, `Tool call ${index} name`),
      arguments: optionalString(fn.arguments, `Tool call ${index} arguments`),
    };
  });
}

// ── State ───────────────────────────────────────────────────────────────────

type ChunkDelta = BackendChunk["choices"][number]["delta"];

type OpenBlock =
  | { kind: "none" }
  | { kind: "text"; index: number }
  | { kind: "tool"; index: number; callIndex: number; id: string; name: string; args: string };

type Phase =
  | { name: "idle" }
  | { name: "started" }
  | { name: "finishing"; stop: MappedStop }
  | { name: "finalized"; stop: MappedStop | null };

export type StreamInput =
  | { type: "fragment"; chunk: BackendChunk }
  | { type: "end" }
  | { type: "failure"; error: ErrorEnvelope };

export interface CompletedToolCall {
  index: number;
  id: string;
  name: string;
  /** Argument text exactly as concatenated from the fragments. */
  arguments: string;
  input: unknown;
}

export interface StreamConverterOptions {
  clientModel: string;
}

const CHARS_PER_TOKEN = 4;
const END_TURN: MappedStop = { stopReason: "end_turn", stopSequence: null };

/**
 * Turns Chat Completions stream fragments into Claude stream events.
 *
 * Every input goes through {@link transition}. Block indices only grow, each block is
 * started before its deltas and stopped exactly once, and nothing is emitted after
 * `message_stop` (or a terminal `error` event).
 */
export class StreamConverter {
  private phase: Phase = { name: "idle" };
  private block: OpenBlock = { kind: "none" };
  private nextIndex = 0;
  private readonly closedCalls = new Set<number>();
  private emittedChars = 0;
  private reportedUsage: ClaudeUsage | null = null;
  private pending: ClaudeStreamEvent[] = [];
  private failureEnvelope: ErrorEnvelope | null = null;
  readonly toolCalls: CompletedToolCall[] = [];

  constructor(private readonly options: StreamConverterOptions) {}

  get finalized(): boolean {
    return this.phase.name === "finalized";
  }

  get stopReason(): StopReason | null {
    return this.phase.name === "finalized" ? this.phase.stop?.stopReason ?? null : null;
  }

  get failure(): ErrorEnvelope | null {
    return this.failureEnvelope;
  }

  /** Backend-reported usage, or the running estimate when the backend sent none. */
  get usage(): ClaudeUsage {
    return this.reportedUsage ?? {
      input_tokens: 0,
      output_tokens: Math.ceil(this.emittedChars / CHARS_PER_TOKEN),
    };
  }

  push(chunk: BackendChunk): ClaudeStreamEvent[] {
    return this.transition({ type: "fragment", chunk });
  }

  end(): ClaudeStreamEvent[] {
    return this.transition({ type: "end" });
  }

  fail(error: ErrorEnvelope): ClaudeStreamEvent[] {
    return this.transition({ type: "failure", error });
  }

  transition(input: StreamInput): ClaudeStreamEvent[] {
    this.pending = [];
    if (this.finalized) return this.pending;

    try {
      switch (input.type) {
        case "fragment":
          this.onFragment(input.chunk);
          break;
        case "end":
          this.onEnd();
          break;
        case "failure":
          this.onFailure(input.error);
          break;
        default: {
          const unreachable: never = input;
          throw new Error(`Unknown stream input: ${JSON.stringify(unreachable)}`);
        }
      }
    } catch (err) {
      // Malformed fragments end the stream; broken invariants propagate.
      if (!(err instanceof PipelineError) || this.finalized) throw err;
      this.onFailure(err.envelope);
    }
    return this.pending;
  }

  // ── Transitions ─────────────────────────────────────────────────────────

  private onFragment(chunk: BackendChunk): void {
    if (chunk.usage) {
      this.reportedUsage = convertUsage(chunk.usage);
    }

    const choice = chunk.choices?.[0];
    if (!choice) {
      // usage-only fragment sent after the finish reason
      if (this.phase.name === "finishing" && chunk.usage) {
        this.finalize(this.phase.stop);
      }
      return;
    }

    if (this.phase.name === "idle") {
      this.start(chunk.id || generateMessageId());
    }
    if (this.phase.name === "finishing") return;

    const delta: ChunkDelta = choice.delta ?? {};
    const content = optionalString(delta.content, "Stream fragment content");

    if (content) {
      this.appendText(content);
    }

    for (const call of readToolCallDeltas(delta.tool_calls)) {
      this.appendToolCall(call.index, call.id, call.name, call.arguments);
    }

    if (choice.finish_reason) {
      this.closeBlock();
      const stop = mapFinishReason(choice.finish_reason, matchedStopSequence(choice));
      if (chunk.usage) {
        this.finalize(stop);
      } else {
        this.phase = { name: "finishing", stop };
      }
    }
  }

  private onEnd(): void {
    if (this.phase.name === "idle") {
      this.start(generateMessageId());
    }
    this.finalize(this.phase.name === "finishing" ? this.phase.stop : END_TURN);
  }

  private onFailure(error: ErrorEnvelope): void {
    this.failureEnvelope = error;
    if (error.kind === "cancelled") {
      this.onEnd();
      return;
    }
    this.closeBlock();
    this.emit({ type: "error", error: toClaudeError(error).body.error });
    this.phase = { name: "finalized", stop: null };
  }

  // ── Emission helpers ────────────────────────────────────────────────────

  private emit(event: ClaudeStreamEvent): void {
    if (this.phase.name === "finalized") {
      throw new Error(`Stream already finalized; refusing to emit ${event.type}`);
    }
    this.pending.push(event);
  }

  private start(id: string): void {
    this.emit({
      type: "message_start",
      message: {
        id,
        type: "message",
        role: "assistant",
        content: [],
        model: this.options.clientModel,
        stop_reason: null,
        stop_sequence: null,
        usage: { input_tokens: 0, output_tokens: 0 },
      },
    });
    this.phase = { name: "started" };
  }

  private appendText(text: string): void {
    let block = this.block;
    if (block.kind !== "text") {
      this.closeBlock();
      block = { kind: "text", index: this.nextIndex++ };
      this.block = block;
      this.emit({ type: "content_block_start", index: block.index, content_block: { type: "text", text: "" } });
    }
    this.emit({ type: "content_block_delta", index: block.index, delta: { type: "text_delta", text } });
    this.emittedChars += text.length;
  }

  private appendToolCall(
    callIndex: number,
    id: string | undefined,
    name: string | undefined,
    args: string | undefined,
  ): void {
    let block = this.block;
    if (block.kind !== "tool" || block.callIndex !== callIndex) {
      if (this.closedCalls.has(callIndex)) {
        throw decodeError(`Tool call ${callIndex} continued after its block was closed`);
      }
      this.closeBlock();
      block = {
        kind: "tool",
        index: this.nextIndex++,
        callIndex,
        id: id || generateToolUseId(),
        name: name ?? "",
        args: "",
      };
      this.block = block;
      this.emit({
        type: "content_block_start",
        index: block.index,
        content_block: { type: "tool_use", id: block.id, name: block.name, input: {} },
      });
    }

    if (args) {
      block.args += args;
      this.emit({
        type: "content_block_delta",
        index: block.index,
        delta: { type: "input_json_delta", partial_json: args },
      });
      this.emittedChars += args.length;
    }
  }

  private closeBlock(): void {
    const block = this.block;
    if (block.kind === "none") return;

    this.emit({ type: "content_block_stop", index: block.index });
    if (block.kind === "tool") {
      this.closedCalls.add(block.callIndex);
      this.toolCalls.push({
        index: block.index,
        id: block.id,
        name: block.name,
        arguments: block.args,
        input: parseToolArguments(block.args),
      });
    }
    this.block = { kind: "none" };
  }

  private finalize(stop: MappedStop): void {
    this.closeBlock();
    this.emit({
      type: "message_delta",
      delta: { stop_reason: stop.stopReason, stop_sequence: stop.stopSequence },
      usage: this.usage,
    });
    this.emit({ type: "message_stop" });
    this.phase = { name: "finalized", stop };
  }
}

// ── Driver ──────────────────────────────────────────────────────────────────

export type StreamOutcome =
  | { status: "success" }
  | { status: "cancelled" }
  | { status: "error"; error: ErrorEnvelope };

/**
 * Feeds fragments through a converter in arrival order. Whatever happens upstream the
 * resulting sequence ends with `message_stop` or a terminal `error` event.
 */
export async function* convertStream(
  fragments: AsyncIterable<BackendChunk>,
  converter: StreamConverter,
  onComplete?: (outcome: StreamOutcome) => void,
): AsyncGenerator<ClaudeStreamEvent> {
  try {
    for await (const chunk of fragments) {
      yield* converter.push(chunk);
      if (converter.failure) break;
    }
    yield* converter.end();
  } catch (err) {
    yield* converter.fail(translateBackendError(err));
  } finally {
    onComplete?.(outcomeOf(converter));
  }
}

function outcomeOf(converter: StreamConverter): StreamOutcome {
  const failure = converter.failure;
  if (failure === null) return { status: "success" };
  if (failure.kind === "cancelled") return { status: "cancelled" };
  return { status: "error", error: failure };
}
