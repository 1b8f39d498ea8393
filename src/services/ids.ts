import { v4 as uuidv4 } from "uuid";

export function generateMessageId(): string {
  return `msg_${uuidv4().replace(/-/g, "")}`;
}

export function generateToolUseId(): string {
  return `toolu_${uuidv4().replace(/-/g, "")}`;
}
