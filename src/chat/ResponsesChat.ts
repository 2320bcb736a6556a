import type {
  InferenceGateway,
  ResponseInputMessage,
  ResponseRequest,
  ResponseSnapshot,
  ResponseStreamEvent,
} from "../llm/types.js";
import { BackgroundResponsePoller } from "./BackgroundResponsePoller.js";
import type { ChatMode } from "./ChatLoop.js";
import type { Terminal } from "./Terminal.js";

export interface ResponsesChatOptions {
  gateway: InferenceGateway;
  terminal: Terminal;
  model: string;
  systemPrompt: string;
  stream: boolean;
  background: boolean;
  /** Wait between background polls. Defaults to one second. */
  pollIntervalMs?: number;
}

/** Print a progress dot every this many background polls. */
const DOT_EVERY_POLLS = 5;

export interface StreamOutcome {
  text: string;
  responseId?: string;
}

/**
 * Chat over the stateful Responses API. Only the id of the last response is
 * kept locally; the endpoint holds the conversation.
 */
export class ResponsesChat implements ChatMode {
  private readonly gateway: InferenceGateway;
  private readonly terminal: Terminal;
  private readonly model: string;
  private readonly systemPrompt: string;
  private readonly stream: boolean;
  private readonly background: boolean;
  private readonly poller: BackgroundResponsePoller;
  private previousResponseId: string | undefined;

  constructor(options: ResponsesChatOptions) {
    this.gateway = options.gateway;
    this.terminal = options.terminal;
    this.model = options.model;
    this.systemPrompt = options.systemPrompt;
    this.stream = options.stream;
    this.background = options.background;
    this.poller = new BackgroundResponsePoller(options.gateway, { intervalMs: options.pollIntervalMs });
    this.poller.on("poll", ({ polls }) => {
      if (polls % DOT_EVERY_POLLS === 0) this.terminal.write(".");
    });
  }

  get lastResponseId(): string | undefined {
    return this.previousResponseId;
  }

  clear(): string {
    this.previousResponseId = undefined;
    return "Conversation cleared (stateful context reset).";
  }

  status(): string[] {
    return [
      "API: Responses (stateful)",
      `Model: ${this.model}`,
      `Background: ${this.background ? "enabled" : "disabled"}`,
      `Previous response ID: ${this.previousResponseId ?? "None (new conversation)"}`,
    ];
  }

  /** Request for one turn; the system prompt only opens a new conversation. */
  buildRequest(text: string): ResponseRequest {
    const input: ResponseInputMessage[] = [];
    if (this.previousResponseId === undefined) {
      input.push({ role: "system", content: this.systemPrompt });
    }
    input.push({ role: "user", content: text });

    const request: ResponseRequest = { model: this.model, input };
    if (this.previousResponseId !== undefined) request.previousResponseId = this.previousResponseId;
    if (this.background) request.background = true;
    return request;
  }

  async send(text: string, signal?: AbortSignal): Promise<void> {
    const request = this.buildRequest(text);

    if (this.stream) {
      const { responseId } = await this.printStream(this.gateway.streamResponse(request, signal));
      if (responseId) this.previousResponseId = responseId;
      return;
    }

    if (this.background) {
      await this.awaitBackground(request, signal);
      return;
    }

    const response = await this.gateway.createResponse(request, signal);
    this.terminal.line(response.text);
    this.previousResponseId = response.id;
  }

  /**
   * Echo a response event stream as it arrives. Returns the accumulated text and
   * the id of the finished response, if the stream reported one.
   */
  async printStream(events: AsyncIterable<ResponseStreamEvent>): Promise<StreamOutcome> {
    let text = "";
    let responseId: string | undefined;

    for await (const event of events) {
      switch (event.kind) {
        case "text_delta":
          this.terminal.write(event.delta);
          text += event.delta;
          break;
        case "completed":
          if (event.responseId) responseId = event.responseId;
          break;
        case "queued":
          this.terminal.write("[Queued...]");
          break;
        case "in_progress":
          this.terminal.write("[Processing...]");
          break;
        case "response_id":
          responseId = event.id;
          break;
        case "ignored":
          break;
      }
    }

    this.terminal.line();
    return { text, responseId };
  }

  private async awaitBackground(request: ResponseRequest, signal?: AbortSignal): Promise<void> {
    const started = await this.gateway.createResponse(request, signal);

    this.terminal.write("[Background processing started...]");
    const finished = await this.poller.waitForCompletion(started, signal);
    this.terminal.line();
    this.terminal.write("Assistant: ");
    this.reportBackground(started.id, finished);
  }

  private reportBackground(responseId: string, response: ResponseSnapshot): void {
    switch (response.status) {
      case "completed":
        this.terminal.line(response.text);
        this.previousResponseId = responseId;
        break;
      case "failed":
        this.terminal.line(`[Background task failed: ${response.status}]`);
        break;
      case "cancelled":
        this.terminal.line("[Background task was cancelled]");
        break;
      default:
        this.terminal.line(`[Unexpected status: ${response.status}]`);
        break;
    }
  }
}
