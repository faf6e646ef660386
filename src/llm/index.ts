/**
 * Factory for the bundled chat-model providers, configured from the environment.
 */

import { ConfigurationError } from "../errors.js";
import { GenericProvider } from "./providers/generic.js";
import { OllamaProvider } from "./providers/ollama.js";
import type { ChatModel, ModelConfig } from "./types.js";
import { getDefaultModelConfig } from "./types.js";

/**
 * Instantiates the provider named by the configuration.
 */
export function createChatModel(config?: Partial<ModelConfig>): ChatModel {
  const modelConfig = { ...getDefaultModelConfig(), ...config };

  switch (modelConfig.provider) {
    case "ollama":
      return new OllamaProvider(
        modelConfig.endpoint,
        modelConfig.model,
        modelConfig.numCtx,
      );
    case "generic":
    default:
      if (!modelConfig.apiKey) {
        throw new ConfigurationError(
          "LLM_API_KEY is required for the generic provider",
        );
      }
      return new GenericProvider(
        modelConfig.endpoint,
        modelConfig.model,
        modelConfig.apiKey,
      );
  }
}

export { GenericProvider } from "./providers/generic.js";
export { OllamaProvider } from "./providers/ollama.js";
export { baseOutputSchema } from "./schemas/base-output.js";
export type { BaseOutput } from "./schemas/base-output.js";
export { zodToTs, toJsonSchema } from "./schemas/utils.js";
export {
  coerceStructuredOutput,
  parseJsonContent,
} from "./structured-output.js";
export type {
  ChatMessage,
  ChatModel,
  ChatRequestOptions,
  ChatResponse,
  ModelConfig,
  OutputSchema,
  ResponseFormat,
  StructuredChatModel,
  VisionContent,
} from "./types.js";
export { getDefaultModelConfig } from "./types.js";
