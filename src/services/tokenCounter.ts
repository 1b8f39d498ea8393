import type { ClaudeTokenCountRequest, ContentBlock } from "../types/anthropic.js";
import { systemPromptText, toolResultText } from "./requestConverter.js";

const CHARS_PER_TOKEN = 4;

function blockChars(block: ContentBlock): number {
  switch (block.type) {
    case "text":
      return block.text.length;
    case "tool_use":
      return block.name.length + JSON.stringify(block.input ?? {}).length;
    case "tool_result":
      return toolResultText(block).length;
    case "image":
      // Image cost depends on the backend's tiling; not estimated here.
      return 0;
  }
}

/** Rough input-token estimate: one token per four characters, at least one. */
export function estimateInputTokens(request: ClaudeTokenCountRequest): number {
  let chars = systemPromptText(request.system).length;

  for (const message of request.messages) {
    if (typeof message.content === "string") {
      chars += message.content.length;
    } else {
      for (const block of message.content) {
        chars += blockChars(block);
      }
    }
  }

  for (const tool of request.tools ?? []) {
    chars += tool.name.length + (tool.description?.length ?? 0) + JSON.stringify(tool.input_schema).length;
  }

  return Math.max(1, Math.floor(chars / CHARS_PER_TOKEN));
}
