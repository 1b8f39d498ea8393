export type * from "./anthropic.js";
export type * from "./common.js";
export type * from "./openai.js";
