/**
 * Input Resolver
 *
 * Turns the caller's `pdf` / `images` arguments into an ordered list of raw image
 * buffers. Mutual exclusivity is checked before any file is touched.
 */

import {
  AmbiguousInputError,
  EmptyImageListError,
  InvalidInputTypeError,
  MissingInputError,
} from "./errors.js";
import { rasterize } from "./pdf/rasterizer.js";
import type {
  DocumentInput,
  ImageSource,
  NormalizedImage,
  PdfSource,
  RenderOptions,
} from "./types.js";
import { readFileBytes, toPath } from "./utils/files.js";

function describeType(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (typeof value === "object") {
    return value.constructor?.name ?? "object";
  }
  return typeof value;
}

function isTaggedSource(
  value: object,
): value is { kind: unknown } & Record<string, unknown> {
  return "kind" in value;
}

function isNormalizedImage(value: unknown): value is NormalizedImage {
  return (
    typeof value === "object" &&
    value !== null &&
    "data" in value &&
    value.data instanceof Uint8Array &&
    "mimeType" in value &&
    typeof value.mimeType === "string" &&
    "extension" in value &&
    typeof value.extension === "string" &&
    "base64" in value &&
    typeof value.base64 === "string"
  );
}

/**
 * Converts a bare path, file URL or byte array into its tagged form.
 */
export function toImageSource(value: unknown): ImageSource {
  if (typeof value === "string" || value instanceof URL) {
    return { kind: "path", path: toPath(value, "images") };
  }
  if (value instanceof Uint8Array) {
    return { kind: "bytes", data: value };
  }
  if (typeof value === "object" && value !== null && isTaggedSource(value)) {
    if (value.kind === "path" && typeof value.path === "string") {
      return { kind: "path", path: value.path };
    }
    if (value.kind === "bytes" && value.data instanceof Uint8Array) {
      return { kind: "bytes", data: value.data };
    }
    if (value.kind === "image" && isNormalizedImage(value.image)) {
      return { kind: "image", image: value.image };
    }
  }
  throw new InvalidInputTypeError("images", describeType(value));
}

export function toPdfSource(value: unknown): PdfSource {
  if (typeof value === "string" || value instanceof URL) {
    return { kind: "path", path: toPath(value, "pdf") };
  }
  if (value instanceof Uint8Array) {
    return { kind: "bytes", data: value };
  }
  if (typeof value === "object" && value !== null && isTaggedSource(value)) {
    if (value.kind === "path" && typeof value.path === "string") {
      return { kind: "path", path: value.path };
    }
    if (value.kind === "bytes" && value.data instanceof Uint8Array) {
      return { kind: "bytes", data: value.data };
    }
  }
  throw new InvalidInputTypeError("pdf", describeType(value));
}

function sourceBytes(source: PdfSource | ImageSource): Uint8Array {
  switch (source.kind) {
    case "path":
      return readFileBytes(source.path);
    case "bytes":
      return source.data;
    case "image":
      return source.image.data;
  }
}

/**
 * Resolves a document input into raw image buffers.
 *
 * @returns Buffers in the caller's image order, or in page order for a PDF
 */
export function resolveDocumentInput(
  input: DocumentInput,
  renderOptions?: Partial<RenderOptions>,
): Uint8Array[] {
  const hasPdf = input.pdf !== undefined && input.pdf !== null;
  const hasImages = input.images !== undefined && input.images !== null;

  if (hasPdf && hasImages) {
    throw new AmbiguousInputError();
  }

  if (hasPdf) {
    const source = toPdfSource(input.pdf);
    return rasterize(sourceBytes(source), renderOptions);
  }

  if (hasImages && input.images) {
    if (input.images.length === 0) {
      throw new EmptyImageListError();
    }
    // Convert every element first so a bad shape fails before any file is read
    const sources = input.images.map((image) => toImageSource(image));
    return sources.map((source) => sourceBytes(source));
  }

  throw new MissingInputError();
}
