/**
 * MIME type sets and helpers shared by the codec, the rasterizer and the converter.
 */

import mimeTypes from "mime-types";

/**
 * Image formats forwarded to vision models unless configured otherwise.
 */
export const DEFAULT_IMAGE_MIME_TYPES: ReadonlySet<string> = new Set([
  "image/png",
  "image/jpeg",
  "image/webp",
  "image/gif",
]);

/**
 * Formats pdf-lib can embed as a page.
 */
export const PDF_EMBEDDABLE_MIME_TYPES: ReadonlySet<string> = new Set([
  "image/png",
  "image/jpeg",
]);

export const PDF_MIME_TYPE = "application/pdf";

export function isPdf(mimeType: string): boolean {
  return mimeType === PDF_MIME_TYPE;
}

/**
 * Gets the file extension for a MIME type, or "bin" if unknown.
 */
export function getExtensionForMime(mimeType: string): string {
  return mimeTypes.extension(mimeType) || "bin";
}

/**
 * Guesses a MIME type from a file name. Only used to route local files,
 * never to trust their content.
 */
export function lookupMimeType(filename: string): string | undefined {
  return mimeTypes.lookup(filename) || undefined;
}

/**
 * Parses a comma separated allow-list such as "image/png,image/jpeg".
 */
export function parseMimeTypeList(value: string): Set<string> {
  return new Set(
    value
      .split(",")
      .map((entry) => entry.trim().toLowerCase())
      .filter((entry) => entry.length > 0),
  );
}
