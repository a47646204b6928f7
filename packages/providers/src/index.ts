export { ChatCompletionsBackend } from "./openai/chat-completions-backend.js";
export type { ChatCompletionsBackendConfig } from "./openai/chat-completions-backend.js";

export { ResponsesBackend } from "./openai/responses-backend.js";
export type { ResponsesBackendConfig } from "./openai/responses-backend.js";

export { normalizeError } from "./openai/errors.js";

export { createBackend } from "./factory.js";
export type { BackendConfig } from "./factory.js";
