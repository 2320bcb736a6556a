export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

/** A message sent as input to the Responses API. */
export interface ResponseInputMessage {
  role: "system" | "user";
  content: string;
}

export interface ModelRecord {
  id: string;
  /** Unix timestamp (seconds) the model was created, when the endpoint reports it. */
  created?: number;
  ownedBy?: string;
}

export interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
}

export interface ResponseRequest {
  model: string;
  input: ResponseInputMessage[];
  previousResponseId?: string;
  background?: boolean;
}

/**
 * Status reported for a response. Known values are listed; endpoints may add more.
 */
export type ResponseStatus =
  | "queued"
  | "in_progress"
  | "completed"
  | "failed"
  | "cancelled"
  | "incomplete"
  | "unknown"
  | (string & {});

/** A response object decoded once at the SDK boundary. */
export interface ResponseSnapshot {
  id: string;
  status: ResponseStatus;
  text: string;
}

/**
 * Closed set of streamed Responses API events the chat loop acts on.
 */
export type ResponseStreamEvent =
  | { kind: "text_delta"; delta: string }
  | { kind: "completed"; responseId?: string }
  | { kind: "queued" }
  | { kind: "in_progress" }
  | { kind: "response_id"; id: string }
  | { kind: "ignored"; type?: string };

/**
 * Everything the CLI needs from an OpenAI-compatible endpoint.
 * Implemented over the openai SDK; tests substitute an in-process fake.
 */
export interface InferenceGateway {
  listModels(): Promise<ModelRecord[]>;
  completeChat(request: ChatCompletionRequest, signal?: AbortSignal): Promise<string>;
  /** Yields the text content deltas of a streamed completion, in arrival order. */
  streamChat(request: ChatCompletionRequest, signal?: AbortSignal): AsyncIterable<string>;
  createResponse(request: ResponseRequest, signal?: AbortSignal): Promise<ResponseSnapshot>;
  streamResponse(request: ResponseRequest, signal?: AbortSignal): AsyncIterable<ResponseStreamEvent>;
  retrieveResponse(id: string, signal?: AbortSignal): Promise<ResponseSnapshot>;
}

export function isPendingStatus(status: ResponseStatus): boolean {
  return status === "queued" || status === "in_progress";
}
