/**
 * Ollama through its OpenAI-compatible endpoint. A local server holds one model
 * in VRAM and degrades badly under parallel vision requests, so requests made
 * through one provider instance run one after another.
 */

import type {
  ChatMessage,
  ChatRequestOptions,
  ChatResponse,
  ResponseFormat,
} from "../types.js";
import { GenericProvider } from "./generic.js";

export class OllamaProvider extends GenericProvider {
  name = "ollama";

  /** Settles when the last scheduled request has finished */
  private idle: Promise<void> = Promise.resolve();

  constructor(
    endpoint: string,
    defaultModel: string,
    protected numCtx: number,
  ) {
    super(endpoint, defaultModel, "");
  }

  protected buildBody(
    messages: readonly ChatMessage[],
    options?: ChatRequestOptions,
  ): Record<string, unknown> {
    return {
      ...super.buildBody(messages, options),
      stream: false,
      keep_alive: "5m",
      options: { num_ctx: this.numCtx },
    };
  }

  // Ollama takes a JSON schema (or "json") in its own `format` field
  protected formatFields(format: ResponseFormat): Record<string, unknown> {
    return {
      format:
        format.type === "json_schema" && format.json_schema
          ? format.json_schema.schema
          : "json",
    };
  }

  protected send(
    messages: readonly ChatMessage[],
    options?: ChatRequestOptions,
  ): Promise<ChatResponse> {
    const request = this.idle.then(() => super.send(messages, options));
    // The caller observes failures through `request`; the chain only waits for it
    this.idle = request.then(
      () => undefined,
      () => undefined,
    );
    return request;
  }
}
