// ── Claude Messages API request/response types ─────────────────────────────
// Client-facing contract of the bridge.

export interface TextBlock {
  type: "text";
  text: string;
}

export interface Base64ImageSource {
  type: "base64";
  media_type: string;
  data: string;
}

export interface UrlImageSource {
  type: "url";
  url: string;
}

export interface ImageBlock {
  type: "image";
  source: Base64ImageSource | UrlImageSource;
}

export interface ToolUseBlock {
  type: "tool_use";
  id: string;
  name: string;
  input: unknown;
}

export interface ToolResultBlock {
  type: "tool_result";
  tool_use_id: string;
  content?: string | Array<TextBlock | ImageBlock>;
  is_error?: boolean;
}

export type ContentBlock = TextBlock | ImageBlock | ToolUseBlock | ToolResultBlock;

export interface ClaudeMessage {
  role: "user" | "assistant";
  content: string | ContentBlock[];
}

export interface ClaudeTool {
  name: string;
  description?: string;
  input_schema: Record<string, unknown>;
}

export type ClaudeToolChoice =
  | { type: "auto"; disable_parallel_tool_use?: boolean }
  | { type: "any"; disable_parallel_tool_use?: boolean }
  | { type: "tool"; name: string; disable_parallel_tool_use?: boolean }
  | { type: "none" };

export interface ClaudeMessagesRequest {
  model: string;
  messages: ClaudeMessage[];
  max_tokens?: number;
  system?: string | TextBlock[];
  tools?: ClaudeTool[];
  tool_choice?: ClaudeToolChoice;
  stream?: boolean;
  temperature?: number;
  top_p?: number;
  top_k?: number;
  stop_sequences?: string[];
  metadata?: { user_id?: string };
}

export interface ClaudeTokenCountRequest {
  model: string;
  messages: ClaudeMessage[];
  system?: string | TextBlock[];
  tools?: ClaudeTool[];
}

// ── Responses ──────────────────────────────────────────────────────────────

export type StopReason = "end_turn" | "max_tokens" | "stop_sequence" | "tool_use";

export interface ClaudeUsage {
  input_tokens: number;
  output_tokens: number;
  cache_read_input_tokens?: number;
}

export type ResponseContentBlock = TextBlock | ToolUseBlock;

export interface ClaudeMessagesResponse {
  readonly id: string;
  readonly type: "message";
  readonly role: "assistant";
  readonly content: readonly ResponseContentBlock[];
  readonly model: string;
  readonly stop_reason: StopReason;
  readonly stop_sequence: string | null;
  readonly usage: Readonly<ClaudeUsage>;
}

// ── Streaming events ───────────────────────────────────────────────────────

export interface MessageStartEvent {
  type: "message_start";
  message: {
    id: string;
    type: "message";
    role: "assistant";
    content: [];
    model: string;
    stop_reason: null;
    stop_sequence: null;
    usage: ClaudeUsage;
  };
}

export interface ContentBlockStartEvent {
  type: "content_block_start";
  index: number;
  content_block: TextBlock | { type: "tool_use"; id: string; name: string; input: Record<string, never> };
}

export interface ContentBlockDeltaEvent {
  type: "content_block_delta";
  index: number;
  delta: { type: "text_delta"; text: string } | { type: "input_json_delta"; partial_json: string };
}

export interface ContentBlockStopEvent {
  type: "content_block_stop";
  index: number;
}

export interface MessageDeltaEvent {
  type: "message_delta";
  delta: { stop_reason: StopReason; stop_sequence: string | null };
  usage: ClaudeUsage;
}

export interface MessageStopEvent {
  type: "message_stop";
}

export interface ErrorEvent {
  type: "error";
  error: ClaudeErrorBody["error"];
}

export type ClaudeStreamEvent =
  | MessageStartEvent
  | ContentBlockStartEvent
  | ContentBlockDeltaEvent
  | ContentBlockStopEvent
  | MessageDeltaEvent
  | MessageStopEvent
  | ErrorEvent;

// ── Errors ─────────────────────────────────────────────────────────────────

export type ClaudeErrorType =
  | "invalid_request_error"
  | "authentication_error"
  | "permission_error"
  | "not_found_error"
  | "request_too_large"
  | "rate_limit_error"
  | "api_error"
  | "overloaded_error";

export interface ClaudeErrorBody {
  type: "error";
  error: {
    type: ClaudeErrorType;
    message: string;
  };
}
