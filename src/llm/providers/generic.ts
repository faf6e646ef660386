/**
 * OpenAI-compatible chat completions provider
 *
 * Works against any endpoint speaking the OpenAI chat completions protocol
 * with vision input, e.g.:
 * - OpenAI (gpt-4o, gpt-4.1)
 * - Mistral (mistral-small-latest)
 * - OVHcloud AI Endpoints (Mistral-Small-3.2-24B-Instruct-2506)
 */

import { DelegateClientError } from "../../errors.js";
import {
  coerceStructuredOutput,
  jsonSchemaResponseFormat,
  schemaInstructions,
} from "../structured-output.js";
import type {
  ChatMessage,
  ChatModel,
  ChatRequestOptions,
  ChatResponse,
  OutputSchema,
  ResponseFormat,
  StructuredChatModel,
} from "../types.js";

const DEFAULT_TEMPERATURE = 0.1;
const DEFAULT_MAX_TOKENS = 4096;

interface CompletionBody {
  choices?: Array<{ message?: { content?: string | null } }>;
  model?: string;
  usage?: {
    prompt_tokens: number;
    completion_tokens: number;
    total_tokens: number;
  };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class GenericProvider implements ChatModel {
  name = "generic";

  constructor(
    protected endpoint: string,
    protected defaultModel: string,
    protected apiKey: string,
  ) {}

  async ainvoke(
    messages: readonly ChatMessage[],
    options?: ChatRequestOptions,
  ): Promise<ChatResponse> {
    return this.send(messages, options);
  }

  withStructuredOutput<T>(schema: OutputSchema<T>): StructuredChatModel<T> {
    return {
      ainvoke: async (messages, options) => {
        const response = await this.send(
          [schemaInstructions(schema), ...messages],
          { ...options, responseFormat: jsonSchemaResponseFormat(schema) },
        );
        return coerceStructuredOutput(response.content, schema);
      },
    };
  }

  protected buildBody(
    messages: readonly ChatMessage[],
    options?: ChatRequestOptions,
  ): Record<string, unknown> {
    return {
      model: options?.model || this.defaultModel,
      messages,
      temperature: options?.temperature ?? DEFAULT_TEMPERATURE,
      max_tokens: options?.maxTokens ?? DEFAULT_MAX_TOKENS,
      ...(options?.responseFormat && this.formatFields(options.responseFormat)),
    };
  }

  /**
   * Request fields carrying the structured output format.
   */
  protected formatFields(format: ResponseFormat): Record<string, unknown> {
    return { response_format: format };
  }

  protected buildHeaders(): Record<string, string> {
    return this.apiKey
      ? {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.apiKey}`,
        }
      : { "Content-Type": "application/json" };
  }

  /**
   * Entry point for every request; subclasses may schedule it.
   */
  protected async send(
    messages: readonly ChatMessage[],
    options?: ChatRequestOptions,
  ): Promise<ChatResponse> {
    return this.post(messages, options);
  }

  private async post(
    messages: readonly ChatMessage[],
    options?: ChatRequestOptions,
  ): Promise<ChatResponse> {
    const model = options?.model || this.defaultModel;

    let response: Response;
    try {
      response = await fetch(this.endpoint, {
        method: "POST",
        headers: this.buildHeaders(),
        body: JSON.stringify(this.buildBody(messages, options)),
        signal: options?.signal,
      });
    } catch (error) {
      throw new DelegateClientError(
        this.name,
        undefined,
        errorMessage(error),
        error,
      );
    }

    if (!response.ok) {
      throw new DelegateClientError(
        this.name,
        response.status,
        await response.text(),
      );
    }

    let data: CompletionBody;
    try {
      data = (await response.json()) as CompletionBody;
    } catch (error) {
      throw new DelegateClientError(
        this.name,
        response.status,
        `invalid JSON body: ${errorMessage(error)}`,
        error,
      );
    }

    return {
      content: data.choices?.[0]?.message?.content || "",
      model: data.model || model,
      usage: data.usage && {
        promptTokens: data.usage.prompt_tokens,
        completionTokens: data.usage.completion_tokens,
        totalTokens: data.usage.total_tokens,
      },
    };
  }
}
