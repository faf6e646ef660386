/**
 * Image Codec
 *
 * Determines the true image format from magic bytes (never from a file name or
 * a caller-supplied label), checks it against the allow-list and base64-encodes it.
 */

import { filetypemime } from "magic-bytes.js";
import { EmptyImageDataError, UnsupportedImageTypeError } from "./errors.js";
import type { NormalizedImage } from "./types.js";
import {
  DEFAULT_IMAGE_MIME_TYPES,
  getExtensionForMime,
} from "./utils/mime-types.js";

// Header sizes of the BMP DIB variants (core, info, v2 to v5)
const BMP_DIB_HEADER_SIZES = new Set([12, 40, 52, 56, 64, 108, 124]);

/**
 * "BM" alone is too weak a signature: also require zeroed reserved bytes and a
 * known DIB header size.
 */
function isBitmap(raw: Uint8Array): boolean {
  if (raw.length < 18) return false;
  const header = Buffer.from(raw.buffer, raw.byteOffset, raw.byteLength);
  return (
    header.readUInt32LE(6) === 0 &&
    BMP_DIB_HEADER_SIZES.has(header.readUInt32LE(14))
  );
}

/**
 * Detects an image MIME type from the leading bytes.
 *
 * @returns The MIME type, or undefined when the content is not a known image
 */
export function detectImageMimeType(raw: Uint8Array): string | undefined {
  const mimeType = filetypemime(raw).find((candidate) =>
    candidate.startsWith("image/"),
  );
  if (mimeType === "image/bmp" && !isBitmap(raw)) {
    return undefined;
  }
  return mimeType;
}

/**
 * Validates raw image bytes and encodes them for a multimodal payload.
 *
 * @param index - Position in the caller's input, used in error messages
 */
export function validateAndEncode(
  raw: Uint8Array,
  allowedMimeTypes: ReadonlySet<string> = DEFAULT_IMAGE_MIME_TYPES,
  index?: number,
): NormalizedImage {
  if (raw.length === 0) {
    throw new EmptyImageDataError(index);
  }

  const mimeType = detectImageMimeType(raw);
  if (!mimeType || !allowedMimeTypes.has(mimeType)) {
    throw new UnsupportedImageTypeError(mimeType, index);
  }

  const data = Buffer.from(raw);
  return {
    data,
    mimeType,
    extension: getExtensionForMime(mimeType),
    base64: data.toString("base64"),
  };
}

export function toDataUrl(image: NormalizedImage): string {
  return `data:${image.mimeType};base64,${image.base64}`;
}
