import OpenAI from "openai";
import type { ClientConfig } from "../config/ClientConfig.js";
import { createLogger, summarizeForLog, type Logger } from "../observability/Logger.js";
import { decodeResponse, decodeStreamEvent } from "./ResponseDecoder.js";
import type {
  ChatCompletionRequest,
  InferenceGateway,
  ModelRecord,
  ResponseRequest,
  ResponseSnapshot,
  ResponseStreamEvent,
} from "./types.js";

export interface OpenAIGatewayOptions {
  logger?: Logger;
}

/**
 * Gateway over the official openai SDK. The SDK owns transport, auth, retries
 * and SSE decoding; payloads are decoded into local types here and nowhere else.
 */
export class OpenAIInferenceGateway implements InferenceGateway {
  private readonly client: OpenAI;
  private readonly logger: Logger;

  constructor(config: ClientConfig, options: OpenAIGatewayOptions = {}) {
    this.client = new OpenAI({ apiKey: config.apiKey, baseURL: config.baseUrl });
    this.logger = options.logger ?? createLogger();
    this.logger.debug("gateway created", { baseUrl: config.baseUrl });
  }

  async listModels(): Promise<ModelRecord[]> {
    this.logger.debug("models.list");
    const page = await this.client.models.list();
    return page.data.map((model) => ({
      id: model.id,
      created: typeof model.created === "number" ? model.created : undefined,
      ownedBy: typeof model.owned_by === "string" ? model.owned_by : undefined,
    }));
  }

  async completeChat(request: ChatCompletionRequest, signal?: AbortSignal): Promise<string> {
    this.logger.debug("chat.completions.create", {
      model: request.model,
      messages: summarizeForLog(request.messages),
    });
    const completion = await this.client.chat.completions.create(
      { model: request.model, messages: request.messages },
      { signal },
    );
    return completion.choices[0]?.message.content ?? "";
  }

  async *streamChat(request: ChatCompletionRequest, signal?: AbortSignal): AsyncIterable<string> {
    this.logger.debug("chat.completions.create", {
      model: request.model,
      messages: summarizeForLog(request.messages),
      stream: true,
    });
    const stream = await this.client.chat.completions.create(
      { model: request.model, messages: request.messages, stream: true },
      { signal },
    );
    for await (const chunk of stream) {
      const content = chunk.choices[0]?.delta?.content;
      if (content != null) yield content;
    }
  }

  async createResponse(request: ResponseRequest, signal?: AbortSignal): Promise<ResponseSnapshot> {
    this.logger.debug("responses.create", this.describeRequest(request, false));
    const response = await this.client.responses.create(
      {
        model: request.model,
        input: request.input,
        previous_response_id: request.previousResponseId,
        background: request.background,
      },
      { signal },
    );
    const snapshot = decodeResponse(response);
    this.logger.trace("responses.create result", { id: snapshot.id, status: snapshot.status });
    return snapshot;
  }

  async *streamResponse(
    request: ResponseRequest,
    signal?: AbortSignal,
  ): AsyncIterable<ResponseStreamEvent> {
    this.logger.debug("responses.create", this.describeRequest(request, true));
    const stream = await this.client.responses.create(
      {
        model: request.model,
        input: request.input,
        previous_response_id: request.previousResponseId,
        background: request.background,
        stream: true,
      },
      { signal },
    );
    for await (const event of stream) {
      const decoded = decodeStreamEvent(event);
      if (decoded.kind === "ignored") this.logger.trace("stream event ignored", { type: decoded.type });
      yield decoded;
    }
  }

  async retrieveResponse(id: string, signal?: AbortSignal): Promise<ResponseSnapshot> {
    this.logger.trace("responses.retrieve", { id });
    const response = await this.client.responses.retrieve(id, {}, { signal });
    return decodeResponse(response);
  }

  private describeRequest(request: ResponseRequest, stream: boolean): Record<string, unknown> {
    return {
      model: request.model,
      input: summarizeForLog(request.input),
      previousResponseId: request.previousResponseId ?? null,
      background: request.background ?? false,
      stream,
    };
  }
}

export function createOpenAIGateway(config: ClientConfig, options?: OpenAIGatewayOptions): InferenceGateway {
  return new OpenAIInferenceGateway(config, options);
}
