import type {
  ClaudeMessage,
  ClaudeMessagesRequest,
  ClaudeTool,
  ClaudeToolChoice,
  ContentBlock,
  ImageBlock,
  TextBlock,
  ToolResultBlock,
} from "../types/anthropic.js";
import type {
  BackendContentPart,
  BackendMessage,
  BackendRequest,
  BackendTool,
  BackendToolCall,
  BackendToolChoice,
} from "../types/openai.js";
import { validationError } from "./errorTranslator.js";

export interface RequestConversionOptions {
  backendModel: string;
  defaultMaxTokens: number;
  maxTokensLimit?: number;
}

// ── Helpers ─────────────────────────────────────────────────────────────────

function toBlocks(content: string | ContentBlock[]): ContentBlock[] {
  return typeof content === "string" ? [{ type: "text", text: content }] : content;
}

export function systemPromptText(system: string | TextBlock[] | undefined): string {
  if (system === undefined) return "";
  if (typeof system === "string") return system;
  return system.map((block) => block.text).join("\n\n");
}

function imagePart(block: ImageBlock): BackendContentPart {
  const url = block.source.type === "base64"
    ? `data:${block.source.media_type};base64,${block.source.data}`
    : block.source.url;
  return { type: "image_url", image_url: { url } };
}

export function toolResultText(block: ToolResultBlock): string {
  if (block.content === undefined) return "";
  if (typeof block.content === "string") return block.content;
  return block.content
    .flatMap((part) => (part.type === "text" ? [part.text] : []))
    .join("\n");
}

/** Chat Completions has no error flag on tool messages, so failures are marked in the text. */
function toolMessageContent(block: ToolResultBlock): string {
  const text = toolResultText(block);
  return block.is_error ? `Error: ${text}` : text;
}

// ── Messages ────────────────────────────────────────────────────────────────

/** Tool-call ids issued so far in the conversation; tool results must reference one of them. */
type IssuedCalls = Set<string>;

function convertUserMessage(
  message: ClaudeMessage,
  position: number,
  issued: IssuedCalls,
): BackendMessage[] {
  const out: BackendMessage[] = [];
  const parts: BackendContentPart[] = [];
  let hasImage = false;

  for (const block of toBlocks(message.content)) {
    switch (block.type) {
      case "text":
        parts.push({ type: "text", text: block.text });
        break;
      case "image":
        hasImage = true;
        parts.push(imagePart(block));
        break;
      case "tool_result":
        if (!issued.has(block.tool_use_id)) {
          throw validationError(
            `messages.${position}: tool_result references unknown tool_use id "${block.tool_use_id}"`,
          );
        }
        // Tool messages must directly follow the assistant message that issued the call.
        out.push({ role: "tool", tool_call_id: block.tool_use_id, content: toolMessageContent(block) });
        break;
      case "tool_use":
        throw validationError(`messages.${position}: tool_use blocks are only allowed in assistant messages`);
      default: {
        const unreachable: never = block;
        throw validationError(`messages.${position}: unsupported content block ${JSON.stringify(unreachable)}`);
      }
    }
  }

  if (parts.length === 0) return out;

  if (hasImage) {
    out.push({ role: "user", content: parts });
  } else {
    const text = parts.map((part) => (part.type === "text" ? part.text : "")).join("\n");
    out.push({ role: "user", content: text });
  }
  return out;
}

function convertAssistantMessage(
  message: ClaudeMessage,
  position: number,
  issued: IssuedCalls,
): BackendMessage {
  const texts: string[] = [];
  const toolCalls: BackendToolCall[] = [];

  for (const block of toBlocks(message.content)) {
    switch (block.type) {
      case "text":
        texts.push(block.text);
        break;
      case "tool_use":
        if (issued.has(block.id)) {
          throw validationError(`messages.${position}: duplicate tool_use id "${block.id}"`);
        }
        issued.add(block.id);
        toolCalls.push({
          id: block.id,
          type: "function",
          function: { name: block.name, arguments: JSON.stringify(block.input ?? {}) },
        });
        break;
      case "image":
      case "tool_result":
        throw validationError(`messages.${position}: ${block.type} blocks are not allowed in assistant messages`);
      default: {
        const unreachable: never = block;
        throw validationError(`messages.${position}: unsupported content block ${JSON.stringify(unreachable)}`);
      }
    }
  }

  const text = texts.join("");
  if (toolCalls.length === 0) {
    return { role: "assistant", content: text };
  }
  return { role: "assistant", content: text || null, tool_calls: toolCalls };
}

export function convertMessages(messages: ClaudeMessage[]): BackendMessage[] {
  const issued: IssuedCalls = new Set();
  const out: BackendMessage[] = [];

  messages.forEach((message, position) => {
    if (message.role === "assistant") {
      out.push(convertAssistantMessage(message, position, issued));
    } else {
      out.push(...convertUserMessage(message, position, issued));
    }
  });

  return out;
}

// ── Tools ───────────────────────────────────────────────────────────────────

export function convertTools(tools: ClaudeTool[]): BackendTool[] {
  return tools.map((tool): BackendTool => ({
    type: "function",
    function: {
      name: tool.name,
      ...(tool.description !== undefined && { description: tool.description }),
      parameters: tool.input_schema,
    },
  }));
}

export function convertToolChoice(choice: ClaudeToolChoice | undefined): BackendToolChoice {
  if (!choice) return "auto";
  switch (choice.type) {
    case "auto":
      return "auto";
    case "any":
      return "required";
    case "tool":
      return { type: "function", function: { name: choice.name } };
    case "none":
      return "none";
  }
}

function resolveMaxTokens(requested: number | undefined, options: RequestConversionOptions): number {
  const maxTokens = requested ?? options.defaultMaxTokens;
  return options.maxTokensLimit !== undefined ? Math.min(maxTokens, options.maxTokensLimit) : maxTokens;
}

// ── Entry point ─────────────────────────────────────────────────────────────

export function convertRequest(
  request: ClaudeMessagesRequest,
  options: RequestConversionOptions,
): BackendRequest {
  if (request.messages.length === 0) {
    throw validationError("messages must be a non-empty array");
  }

  const messages: BackendMessage[] = [];
  const system = systemPromptText(request.system);
  if (system) {
    messages.push({ role: "system", content: system });
  }
  messages.push(...convertMessages(request.messages));

  const body: BackendRequest = {
    model: options.backendModel,
    messages,
    max_tokens: resolveMaxTokens(request.max_tokens, options),
    ...(request.temperature !== undefined && { temperature: request.temperature }),
    ...(request.top_p !== undefined && { top_p: request.top_p }),
    ...(request.stop_sequences && request.stop_sequences.length > 0 && { stop: request.stop_sequences }),
  };

  if (request.tools && request.tools.length > 0) {
    body.tools = convertTools(request.tools);
    body.tool_choice = convertToolChoice(request.tool_choice);
    if (request.tool_choice && "disable_parallel_tool_use" in request.tool_choice && request.tool_choice.disable_parallel_tool_use) {
      body.parallel_tool_calls = false;
    }
  }

  return body;
}
