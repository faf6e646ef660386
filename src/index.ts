export { MultiModalLLM } from "./multimodal-llm.js";
export type {
  InvokeRequest,
  StructuredInvokeRequest,
} from "./multimodal-llm.js";
export {
  detectImageMimeType,
  toDataUrl,
  validateAndEncode,
} from "./image-codec.js";
export {
  resolveDocumentInput,
  toImageSource,
  toPdfSource,
} from "./input-resolver.js";
export { buildPayload } from "./payload-builder.js";
export type { MultimodalPayload } from "./payload-builder.js";
export {
  DEFAULT_RENDER_OPTIONS,
  isPdfBytes,
  rasterize,
} from "./pdf/rasterizer.js";
export {
  imagesToPdf,
  saveImagesToPdf,
  savePdfToImages,
} from "./pdf/converter.js";
export { getDefaultConfig, resolvePipelineConfig } from "./types.js";
export type {
  DocumentInput,
  ImageInput,
  ImageSource,
  NormalizedImage,
  PageImageFormat,
  PdfInput,
  PdfSource,
  PipelineConfig,
  RenderOptions,
} from "./types.js";
export { DEFAULT_IMAGE_MIME_TYPES } from "./utils/mime-types.js";
export * from "./errors.js";
export * from "./llm/index.js";
