// === Types ===
export type {
  ChatRole,
  ChatMessage,
  ResponseInputMessage,
  ModelRecord,
  ChatCompletionRequest,
  ResponseRequest,
  ResponseStatus,
  ResponseSnapshot,
  ResponseStreamEvent,
  InferenceGateway,
} from "./llm/types.js";
export { isPendingStatus } from "./llm/types.js";

// === Config ===
export { loadClientConfig, loadEnvFile, API_KEY_ENV, BASE_URL_ENV } from "./config/ClientConfig.js";
export type { ClientConfig } from "./config/ClientConfig.js";

// === Errors ===
export { CliError, UsageError, ConfigError, describeError } from "./core/errors.js";
export { ResponseDecodeError } from "./llm/errors.js";

// === Gateway ===
export { OpenAIInferenceGateway, createOpenAIGateway } from "./llm/OpenAIInferenceGateway.js";
export type { OpenAIGatewayOptions } from "./llm/OpenAIInferenceGateway.js";
export { decodeResponse, decodeStreamEvent, extractResponseText } from "./llm/ResponseDecoder.js";

// === Chat ===
export { runChatLoop, INTERRUPT_FAREWELL } from "./chat/ChatLoop.js";
export type { ChatMode, ChatLoopOptions, ChatLoopOutcome } from "./chat/ChatLoop.js";
export { CompletionsChat } from "./chat/CompletionsChat.js";
export type { CompletionsChatOptions } from "./chat/CompletionsChat.js";
export { ResponsesChat } from "./chat/ResponsesChat.js";
export type { ResponsesChatOptions, StreamOutcome } from "./chat/ResponsesChat.js";
export { BackgroundResponsePoller, DEFAULT_POLL_INTERVAL_MS } from "./chat/BackgroundResponsePoller.js";
export type { PollTick, BackgroundResponsePollerOptions } from "./chat/BackgroundResponsePoller.js";
export { parseSessionInput, EXIT_COMMANDS } from "./chat/SessionCommand.js";
export type { SessionCommand } from "./chat/SessionCommand.js";
export { StreamTerminal } from "./chat/Terminal.js";
export type { Terminal, TextSink, StreamTerminalOptions } from "./chat/Terminal.js";

// === Info ===
export { INFO_TEXT } from "./info/InfoText.js";

// === Observability ===
export { createLogger, resolveLoggerOptions, sanitizeForLog, summarizeForLog } from "./observability/Logger.js";
export type { Logger, LogLevel, LoggerOptions, ResolvedLoggerOptions } from "./observability/Logger.js";
