import type { ChatMessage, InferenceGateway } from "../llm/types.js";
import type { ChatMode } from "./ChatLoop.js";
import type { Terminal } from "./Terminal.js";

export interface CompletionsChatOptions {
  gateway: InferenceGateway;
  terminal: Terminal;
  model: string;
  systemPrompt: string;
  stream: boolean;
}

/**
 * Chat over the stateless Chat Completions API. The full history is kept
 * locally and sent with every request.
 */
export class CompletionsChat implements ChatMode {
  private readonly gateway: InferenceGateway;
  private readonly terminal: Terminal;
  private readonly model: string;
  private readonly systemPrompt: string;
  private readonly stream: boolean;
  private messages: ChatMessage[];

  constructor(options: CompletionsChatOptions) {
    this.gateway = options.gateway;
    this.terminal = options.terminal;
    this.model = options.model;
    this.systemPrompt = options.systemPrompt;
    this.stream = options.stream;
    this.messages = this.initialHistory();
  }

  /** Copy of the current history, oldest first. */
  get history(): readonly ChatMessage[] {
    return [...this.messages];
  }

  clear(): string {
    this.messages = this.initialHistory();
    return "Conversation cleared.";
  }

  status(): string[] {
    return [
      "API: Chat Completions (stateless)",
      `Model: ${this.model}`,
      `Messages in history: ${this.messages.length}`,
    ];
  }

  async send(text: string, signal?: AbortSignal): Promise<void> {
    this.messages.push({ role: "user", content: text });
    const request = { model: this.model, messages: [...this.messages] };

    try {
      let reply: string;
      if (this.stream) {
        reply = "";
        for await (const delta of this.gateway.streamChat(request, signal)) {
          this.terminal.write(delta);
          reply += delta;
        }
        this.terminal.line();
      } else {
        reply = await this.gateway.completeChat(request, signal);
        this.terminal.line(reply);
      }
      this.messages.push({ role: "assistant", content: reply });
    } catch (err) {
      // The turn never happened as far as the history is concerned.
      this.messages.pop();
      throw err;
    }
  }

  private initialHistory(): ChatMessage[] {
    return [{ role: "system", content: this.systemPrompt }];
  }
}
