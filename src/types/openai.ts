// ── OpenAI Chat Completions types (backend side) ───────────────────────────
// Aliases over the SDK's own definitions so the converters read in domain terms.

export type {
  ChatCompletion as BackendResponse,
  ChatCompletionChunk as BackendChunk,
  ChatCompletionCreateParamsNonStreaming as BackendRequest,
  ChatCompletionCreateParamsStreaming as BackendStreamRequest,
  ChatCompletionMessageParam as BackendMessage,
  ChatCompletionContentPart as BackendContentPart,
  ChatCompletionMessageToolCall as BackendToolCall,
  ChatCompletionTool as BackendTool,
  ChatCompletionToolChoiceOption as BackendToolChoice,
} from "openai/resources/chat/completions";

export type { CompletionUsage as BackendUsage } from "openai/resources/completions";
