/**
 * Minimal byte sequences carrying real format signatures.
 */

// PNG magic bytes + 1x1 IHDR/IDAT/IEND structure
export const PNG_BYTES = new Uint8Array([
  // Magic bytes
  0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a,
  // IHDR chunk (length 13 = 0D)
  0x00, 0x00, 0x00, 0x0d, 0x49, 0x48, 0x44, 0x52, 0x00, 0x00, 0x00, 0x01, 0x00,
  0x00, 0x00, 0x01, 0x08, 0x06, 0x00, 0x00, 0x00, 0x1f, 0x15, 0xc4, 0x89,
  // IDAT chunk (1x1 pixel)
  0x00, 0x00, 0x00, 0x0d, 0x49, 0x44, 0x41, 0x54, 0x08, 0xd7, 0x63, 0xfc, 0xcf,
  0xc0, 0x00, 0x00, 0x03, 0x01, 0x01, 0x00, 0x18, 0xdd, 0x8d, 0xb0,
  // IEND chunk
  0x00, 0x00, 0x00, 0x00, 0x49, 0x45, 0x4e, 0x44, 0xae, 0x42, 0x60, 0x82,
]);

// JPEG SOI marker + JFIF APP0 header start
export const JPEG_BYTES = new Uint8Array([
  0xff, 0xd8, 0xff, 0xe0, 0x00, 0x10, 0x4a, 0x46, 0x49, 0x46, 0x00,
]);

// "GIF89a" + logical screen descriptor
export const GIF_BYTES = new Uint8Array([
  0x47, 0x49, 0x46, 0x38, 0x39, 0x61, 0x01, 0x00, 0x01, 0x00, 0x00, 0x00, 0x00,
]);

// "RIFF" + size + "WEBP" + "VP8 "
export const WEBP_BYTES = new Uint8Array([
  0x52, 0x49, 0x46, 0x46, 0x1a, 0x00, 0x00, 0x00, 0x57, 0x45, 0x42, 0x50, 0x56,
  0x50, 0x38, 0x20,
]);

// "BM" file header (size 58, reserved, pixel offset 54) + BITMAPINFOHEADER size
export const BMP_BYTES = new Uint8Array([
  0x42, 0x4d, 0x3a, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x36, 0x00, 0x00,
  0x00, 0x28, 0x00, 0x00, 0x00,
]);

// Little-endian TIFF header
export const TIFF_BYTES = new Uint8Array([
  0x49, 0x49, 0x2a, 0x00, 0x08, 0x00, 0x00, 0x00,
]);

export const UNKNOWN_BYTES = new Uint8Array([0x00, 0x01, 0x02, 0x03]);

export const PDF_BYTES = Buffer.from("%PDF-1.7\n%test document\n", "latin1");

/**
 * A PNG-signed buffer with a distinguishing trailing byte, for order checks.
 */
export function taggedPng(tag: number): Uint8Array {
  return new Uint8Array([...PNG_BYTES, tag]);
}
