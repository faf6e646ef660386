/**
 * LLM Delegate Types
 *
 * The chat-model surface the invocation pipeline delegates to, plus the
 * configuration of the bundled providers (OpenAI-compatible endpoints, Ollama).
 */

import type { z } from "zod";

/**
 * Message content for vision requests
 */
export type VisionContent =
  | { type: "text"; text: string }
  | {
      type: "image_url";
      image_url: {
        url: string; // base64 data URL or HTTP URL
      };
    };

/**
 * Chat message format (OpenAI-compatible)
 */
export interface ChatMessage {
  readonly role: "system" | "user" | "assistant";
  readonly content: string | readonly VisionContent[];
}

/**
 * Requested reply format for structured outputs
 */
export interface ResponseFormat {
  type: "json_schema" | "json_object";
  json_schema?: {
    name: string;
    strict?: boolean;
    schema: unknown;
  };
}

/**
 * Chat request options
 */
export interface ChatRequestOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
  /** Aborts the underlying HTTP request */
  signal?: AbortSignal;
  responseFormat?: ResponseFormat;
}

/**
 * Chat response
 */
export interface ChatResponse {
  content: string;
  model: string;
  usage?: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
}

/**
 * Schema a structured reply is parsed into.
 */
export type OutputSchema<T> = z.ZodType<T>;

/**
 * A chat model bound to an output schema.
 */
export interface StructuredChatModel<T> {
  ainvoke(
    messages: readonly ChatMessage[],
    options?: ChatRequestOptions,
  ): Promise<T>;
  invoke?(messages: readonly ChatMessage[], options?: ChatRequestOptions): T;
}

/**
 * Delegate chat client.
 *
 * `ainvoke` is required. `invoke` (blocking call) and `withStructuredOutput`
 * are capabilities a client may or may not offer.
 */
export interface ChatModel {
  readonly name: string;

  ainvoke(
    messages: readonly ChatMessage[],
    options?: ChatRequestOptions,
  ): Promise<ChatResponse>;

  invoke?(
    messages: readonly ChatMessage[],
    options?: ChatRequestOptions,
  ): ChatResponse;

  withStructuredOutput?<T>(schema: OutputSchema<T>): StructuredChatModel<T>;
}

/**
 * Bundled provider configuration
 */
export interface ModelConfig {
  provider: "generic" | "ollama";
  endpoint: string;
  model: string;
  apiKey?: string;
  numCtx: number;
}

/**
 * Get default model configuration from environment
 */
export function getDefaultModelConfig(): ModelConfig {
  const provider = process.env.LLM_PROVIDER === "ollama" ? "ollama" : "generic";
  const numCtx = parseInt(process.env.LLM_NUM_CTX || "8192", 10);

  const model =
    process.env.LLM_MODEL ||
    (provider === "ollama" ? "mistral-small3.2" : "gpt-4o");
  const endpoint =
    process.env.LLM_ENDPOINT ||
    (provider === "ollama"
      ? "http://localhost:11434/v1/chat/completions"
      : "https://api.openai.com/v1/chat/completions");

  return {
    provider,
    endpoint,
    model,
    apiKey: process.env.LLM_API_KEY || undefined,
    numCtx: Number.isNaN(numCtx) ? 8192 : numCtx,
  };
}
