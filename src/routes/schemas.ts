import { z } from "zod";
import type {
  ClaudeMessagesRequest,
  ClaudeTokenCountRequest,
} from "../types/anthropic.js";

// ── Inbound body schemas for /v1/messages ───────────────────────────────────
// Unknown keys (cache_control and the like) are stripped.

const textBlock = z.object({
  type: z.literal("text"),
  text: z.string(),
});

const imageBlock = z.object({
  type: z.literal("image"),
  source: z.discriminatedUnion("type", [
    z.object({ type: z.literal("base64"), media_type: z.string().min(1), data: z.string().min(1) }),
    z.object({ type: z.literal("url"), url: z.string().url() }),
  ]),
});

const toolUseBlock = z.object({
  type: z.literal("tool_use"),
  id: z.string().min(1),
  name: z.string().min(1),
  input: z.record(z.unknown()),
});

const toolResultBlock = z.object({
  type: z.literal("tool_result"),
  tool_use_id: z.string().min(1),
  content: z.union([z.string(), z.array(z.discriminatedUnion("type", [textBlock, imageBlock]))]).optional(),
  is_error: z.boolean().optional(),
});

const contentBlock = z.discriminatedUnion("type", [textBlock, imageBlock, toolUseBlock, toolResultBlock]);

const message = z.object({
  role: z.enum(["user", "assistant"]),
  content: z.union([z.string(), z.array(contentBlock)]),
});

const system = z.union([z.string(), z.array(textBlock)]);

const tool = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  input_schema: z.record(z.unknown()),
});

const toolChoice = z.discriminatedUnion("type", [
  z.object({ type: z.literal("auto"), disable_parallel_tool_use: z.boolean().optional() }),
  z.object({ type: z.literal("any"), disable_parallel_tool_use: z.boolean().optional() }),
  z.object({ type: z.literal("tool"), name: z.string().min(1), disable_parallel_tool_use: z.boolean().optional() }),
  z.object({ type: z.literal("none") }),
]);

export const messagesRequestSchema: z.ZodType<ClaudeMessagesRequest> = z.object({
  model: z.string(),
  messages: z.array(message).min(1, "messages must be a non-empty array"),
  max_tokens: z.number().int().positive().optional(),
  system: system.optional(),
  tools: z.array(tool).optional(),
  tool_choice: toolChoice.optional(),
  stream: z.boolean().optional(),
  temperature: z.number().min(0).optional(),
  top_p: z.number().min(0).max(1).optional(),
  top_k: z.number().int().positive().optional(),
  stop_sequences: z.array(z.string()).optional(),
  metadata: z.object({ user_id: z.string().optional() }).optional(),
});

export const tokenCountRequestSchema: z.ZodType<ClaudeTokenCountRequest> = z.object({
  model: z.string(),
  messages: z.array(message).min(1, "messages must be a non-empty array"),
  system: system.optional(),
  tools: z.array(tool).optional(),
});
