import type {
  ClaudeMessagesResponse,
  ClaudeUsage,
  ResponseContentBlock,
  StopReason,
} from "../types/anthropic.js";
import type { BackendResponse, BackendUsage } from "../types/openai.js";
import { decodeError, isRecord } from "./errorTranslator.js";
import { generateToolUseId } from "./ids.js";

export interface MappedStop {
  stopReason: StopReason;
  stopSequence: string | null;
}

/**
 * Some OpenAI-compatible servers (vLLM among them) report the matched stop string on the
 * choice as `stop_reason`. OpenAI itself never does.
 */
export function matchedStopSequence(choice: object): string | null {
  if ("stop_reason" in choice && typeof choice.stop_reason === "string" && choice.stop_reason) {
    return choice.stop_reason;
  }
  return null;
}

export function mapFinishReason(
  finishReason: string | null | undefined,
  matchedStop: string | null = null,
): MappedStop {
  switch (finishReason) {
    case "stop":
      return matchedStop !== null
        ? { stopReason: "stop_sequence", stopSequence: matchedStop }
        : { stopReason: "end_turn", stopSequence: null };
    case "length":
      return { stopReason: "max_tokens", stopSequence: null };
    case "tool_calls":
    case "function_call":
      return { stopReason: "tool_use", stopSequence: null };
    default:
      return { stopReason: "end_turn", stopSequence: null };
  }
}

export function convertUsage(usage: BackendUsage | null | undefined): ClaudeUsage {
  if (!usage) {
    return { input_tokens: 0, output_tokens: 0 };
  }
  const cached = usage.prompt_tokens_details?.cached_tokens ?? 0;
  return {
    input_tokens: usage.prompt_tokens ?? 0,
    output_tokens: usage.completion_tokens ?? 0,
    ...(cached > 0 && { cache_read_input_tokens: cached }),
  };
}

/** Parses tool-call arguments; keeps the raw text when it is not valid JSON. */
export function parseToolArguments(raw: string): unknown {
  if (raw.trim() === "") return {};
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}

/** Checks one backend tool call; the SDK types it but does not validate it. */
function readToolCall(call: unknown, position: number): { id: string; name: string; arguments: string } {
  if (!isRecord(call) || !isRecord(call.function)) {
    throw decodeError(`Tool call ${position} has no function`);
  }
  const { name, arguments: args } = call.function;
  if (typeof name !== "string") {
    throw decodeError(`Tool call ${position} has no function name`);
  }
  if (args !== undefined && args !== null && typeof args !== "string") {
    throw decodeError(`Tool call ${position} arguments are not a string`);
  }
  return {
    id: typeof call.id === "string" && call.id ? call.id : generateToolUseId(),
    name,
    arguments: args ?? "",
  };
}

export function convertResponse(
  response: BackendResponse,
  clientModel: string,
): ClaudeMessagesResponse {
  if (!Array.isArray(response.choices) || response.choices.length === 0) {
    throw decodeError("Backend response has no choices");
  }
  const choice = response.choices[0];
  if (!choice?.message) {
    throw decodeError("Backend response choice has no message");
  }

  const rawText: unknown = choice.message.content;
  if (rawText !== null && rawText !== undefined && typeof rawText !== "string") {
    throw decodeError("Backend message content is not a string");
  }
  const text = typeof rawText === "string" ? rawText : "";
  const calls: unknown = choice.message.tool_calls ?? [];
  if (!Array.isArray(calls)) {
    throw decodeError("Backend message tool_calls is not an array");
  }

  const content: ResponseContentBlock[] = [];
  if (text) {
    content.push({ type: "text", text });
  }

  calls.forEach((raw: unknown, position) => {
    const call = readToolCall(raw, position);
    content.push({
      type: "tool_use",
      id: call.id,
      name: call.name,
      input: parseToolArguments(call.arguments),
    });
  });

  if (content.length === 0) {
    content.push({ type: "text", text: "" });
  }

  const { stopReason, stopSequence } = mapFinishReason(choice.finish_reason, matchedStopSequence(choice));

  const result: ClaudeMessagesResponse = {
    id: response.id,
    type: "message",
    role: "assistant",
    content: Object.freeze(content),
    model: clientModel,
    stop_reason: stopReason,
    stop_sequence: stopSequence,
    usage: Object.freeze(convertUsage(response.usage)),
  };
  return Object.freeze(result);
}
