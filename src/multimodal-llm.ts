/**
 * Invocation Facade
 *
 * Runs the shared synchronous pipeline (resolve → rasterize → encode → build) and
 * hands the resulting message to the delegate chat model, either with a blocking
 * call (`invoke`) or an awaited one (`ainvoke`). Invalid input fails before the
 * delegate is ever called; delegate errors propagate unchanged.
 */

import { CapabilityNotSupportedError } from "./errors.js";
import { validateAndEncode } from "./image-codec.js";
import { resolveDocumentInput } from "./input-resolver.js";
import type {
  ChatMessage,
  ChatModel,
  ChatRequestOptions,
  ChatResponse,
  OutputSchema,
} from "./llm/types.js";
import { buildPayload, type MultimodalPayload } from "./payload-builder.js";
import type { DocumentInput, PipelineConfig } from "./types.js";
import { resolvePipelineConfig } from "./types.js";

export interface InvokeRequest extends DocumentInput {
  prompt: string;
  /** Passed through to the delegate (model override, temperature, abort signal) */
  options?: ChatRequestOptions;
}

export interface StructuredInvokeRequest<T> extends InvokeRequest {
  outputSchema: OutputSchema<T>;
}

type AnyInvokeRequest<T> = InvokeRequest & { outputSchema?: OutputSchema<T> };

export class MultiModalLLM {
  private config: PipelineConfig;

  constructor(
    private model: ChatModel,
    config?: Partial<PipelineConfig>,
  ) {
    this.config = resolvePipelineConfig(config);
  }

  /**
   * Builds the multimodal message for a request without calling the model.
   */
  prepare(request: InvokeRequest): MultimodalPayload {
    const rawImages = resolveDocumentInput(request, this.config.render);
    const images = rawImages.map((raw, index) =>
      validateAndEncode(raw, this.config.allowedMimeTypes, index),
    );
    return buildPayload(request.prompt, images, {
      allowBlankPrompt: this.config.allowBlankPrompt,
    });
  }

  /**
   * Invokes the model with a blocking call. Requires a delegate that supports
   * synchronous invocation.
   */
  invoke<T>(request: StructuredInvokeRequest<T>): T;
  invoke(request: InvokeRequest): ChatResponse;
  invoke<T>(request: AnyInvokeRequest<T>): T | ChatResponse {
    const messages = this.prepareMessages(request);

    if (request.outputSchema) {
      const structured = this.bindSchema(request.outputSchema);
      if (!structured.invoke) {
        throw new CapabilityNotSupportedError(this.model.name, "invoke");
      }
      return structured.invoke(messages, request.options);
    }

    if (!this.model.invoke) {
      throw new CapabilityNotSupportedError(this.model.name, "invoke");
    }
    return this.model.invoke(messages, request.options);
  }

  /**
   * Invokes the model asynchronously.
   */
  ainvoke<T>(request: StructuredInvokeRequest<T>): Promise<T>;
  ainvoke(request: InvokeRequest): Promise<ChatResponse>;
  async ainvoke<T>(request: AnyInvokeRequest<T>): Promise<T | ChatResponse> {
    const messages = this.prepareMessages(request);

    if (request.outputSchema) {
      return this.bindSchema(request.outputSchema).ainvoke(
        messages,
        request.options,
      );
    }
    return this.model.ainvoke(messages, request.options);
  }

  private prepareMessages(request: InvokeRequest): ChatMessage[] {
    const payload = this.prepare(request);
    console.log(
      `[MultiModalLLM] Invoking ${this.model.name} with ${payload.content.length - 1} image(s)`,
    );
    return [payload];
  }

  private bindSchema<T>(schema: OutputSchema<T>) {
    if (!this.model.withStructuredOutput) {
      throw new CapabilityNotSupportedError(
        this.model.name,
        "withStructuredOutput",
      );
    }
    return this.model.withStructuredOutput(schema);
  }
}
