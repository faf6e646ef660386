/**
 * Pipeline Types
 *
 * Input shapes accepted from callers, the normalized forms the pipeline produces,
 * and the pipeline configuration.
 */

import { ConfigurationError } from "./errors.js";
import {
  DEFAULT_IMAGE_MIME_TYPES,
  parseMimeTypeList,
} from "./utils/mime-types.js";

/**
 * A validated image ready to be sent to a vision model.
 */
export interface NormalizedImage {
  data: Buffer;
  mimeType: string;
  /** File extension without dot (e.g., "png") */
  extension: string;
  base64: string;
}

export type PathSource = { kind: "path"; path: string };
export type BytesSource = { kind: "bytes"; data: Uint8Array };

/**
 * Tagged image input. `image` carries an image the codec already validated.
 */
export type ImageSource =
  | PathSource
  | BytesSource
  | { kind: "image"; image: NormalizedImage };

export type PdfSource = PathSource | BytesSource;

/**
 * Caller-facing shapes: bare paths, file URLs and byte arrays are accepted
 * alongside the tagged sources.
 */
export type ImageInput = string | URL | Uint8Array | ImageSource;
export type PdfInput = string | URL | Uint8Array | PdfSource;

/**
 * Exactly one of `pdf` or `images` must be set.
 */
export interface DocumentInput {
  pdf?: PdfInput | null;
  images?: readonly ImageInput[] | null;
}

export type PageImageFormat = "png" | "jpeg";

export interface RenderOptions {
  /** Scale applied to each page (1 = 72 dpi) */
  zoom: number;
  format: PageImageFormat;
}

/**
 * Pipeline configuration
 */
export interface PipelineConfig {
  allowedMimeTypes: ReadonlySet<string>;
  render: RenderOptions;
  /** Accept empty or whitespace-only prompts */
  allowBlankPrompt: boolean;
}

function readAllowedMimeTypes(): ReadonlySet<string> {
  const allowedMimeTypes = process.env.IMAGE_ALLOWED_MIME_TYPES
    ? parseMimeTypeList(process.env.IMAGE_ALLOWED_MIME_TYPES)
    : new Set(DEFAULT_IMAGE_MIME_TYPES);
  if (allowedMimeTypes.size === 0) {
    throw new ConfigurationError(
      "IMAGE_ALLOWED_MIME_TYPES must list at least one MIME type",
    );
  }
  return allowedMimeTypes;
}

function readRenderOptions(): RenderOptions {
  const zoom = parseFloat(process.env.PDF_RENDER_ZOOM || "0.2");
  if (!Number.isFinite(zoom) || zoom <= 0) {
    throw new ConfigurationError(
      `PDF_RENDER_ZOOM must be a positive number, got "${process.env.PDF_RENDER_ZOOM}"`,
    );
  }

  const format = process.env.PDF_RENDER_FORMAT || "png";
  if (format !== "png" && format !== "jpeg") {
    throw new ConfigurationError(
      `PDF_RENDER_FORMAT must be "png" or "jpeg", got "${format}"`,
    );
  }

  return { zoom, format };
}

/**
 * Get default pipeline configuration from environment
 */
export function getDefaultConfig(): PipelineConfig {
  return resolvePipelineConfig();
}

/**
 * Completes a caller-supplied configuration. The environment is only consulted
 * for the fields left out.
 */
export function resolvePipelineConfig(
  config: Partial<PipelineConfig> = {},
): PipelineConfig {
  return {
    allowedMimeTypes: config.allowedMimeTypes ?? readAllowedMimeTypes(),
    render: config.render ?? readRenderOptions(),
    allowBlankPrompt:
      config.allowBlankPrompt ?? process.env.ALLOW_BLANK_PROMPT === "true",
  };
}
