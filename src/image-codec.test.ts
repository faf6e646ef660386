/**
 * Tests for magic-byte detection and image encoding.
 */

import { describe, it, expect } from "vitest";
import {
  detectImageMimeType,
  toDataUrl,
  validateAndEncode,
} from "./image-codec.js";
import {
  EmptyImageDataError,
  UnsupportedImageTypeError,
} from "./errors.js";
import {
  BMP_BYTES,
  GIF_BYTES,
  JPEG_BYTES,
  PNG_BYTES,
  TIFF_BYTES,
  UNKNOWN_BYTES,
  WEBP_BYTES,
} from "./test/fixtures.js";

describe("image-codec", () => {
  describe("detectImageMimeType", () => {
    it.each([
      ["image/png", PNG_BYTES],
      ["image/jpeg", JPEG_BYTES],
      ["image/gif", GIF_BYTES],
      ["image/webp", WEBP_BYTES],
      ["image/bmp", BMP_BYTES],
      ["image/tiff", TIFF_BYTES],
    ])("should detect %s from magic bytes", (mimeType, bytes) => {
      expect(detectImageMimeType(bytes)).toBe(mimeType);
    });

    it("should return undefined for unknown bytes", () => {
      expect(detectImageMimeType(UNKNOWN_BYTES)).toBeUndefined();
    });

    it("should not match a RIFF container that is not WEBP", () => {
      const wav = new Uint8Array([
        0x52, 0x49, 0x46, 0x46, 0x1a, 0x00, 0x00, 0x00, 0x57, 0x41, 0x56, 0x45,
      ]);
      expect(detectImageMimeType(wav)).toBeUndefined();
    });

    it("should not take text starting with BM for a bitmap", () => {
      expect(
        detectImageMimeType(Buffer.from("BMW service invoice, page 1 of 2")),
      ).toBeUndefined();
    });
  });

  describe("validateAndEncode", () => {
    it("should return the detected type and a reversible base64 string", () => {
      const result = validateAndEncode(PNG_BYTES);

      expect(result.mimeType).toBe("image/png");
      expect(result.extension).toBe("png");
      expect(Buffer.from(result.base64, "base64").equals(Buffer.from(PNG_BYTES))).toBe(
        true,
      );
      expect(result.data.equals(Buffer.from(PNG_BYTES))).toBe(true);
    });

    it.each([
      ["image/gif", "gif", GIF_BYTES],
      ["image/webp", "webp", WEBP_BYTES],
    ])("should accept %s by default", (mimeType, extension, bytes) => {
      const result = validateAndEncode(bytes);

      expect(result.mimeType).toBe(mimeType);
      expect(result.extension).toBe(extension);
    });

    it("should copy the input bytes", () => {
      const input = new Uint8Array(PNG_BYTES);
      const result = validateAndEncode(input);

      input[0] = 0x00;

      expect(result.data[0]).toBe(0x89);
    });

    it("should throw EmptyImageDataError for an empty buffer", () => {
      expect(() => validateAndEncode(new Uint8Array(0))).toThrow(
        EmptyImageDataError,
      );
      expect(() => validateAndEncode(new Uint8Array(0))).toThrow(
        "Image data is empty",
      );
    });

    it("should name the index of an empty image", () => {
      expect(() =>
        validateAndEncode(new Uint8Array(0), undefined, 2),
      ).toThrow("Image at index 2 is empty");
    });

    it("should reject a recognized format outside the allow-list", () => {
      let caught: unknown;
      try {
        validateAndEncode(BMP_BYTES);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(UnsupportedImageTypeError);
      expect(caught).toMatchObject({
        code: "UNSUPPORTED_IMAGE_TYPE",
        detectedMimeType: "image/bmp",
      });
      expect(String(caught)).toBe(
        "UnsupportedImageTypeError: Image has unsupported format: image/bmp",
      );
    });

    it("should reject unknown bytes", () => {
      expect(() => validateAndEncode(UNKNOWN_BYTES, undefined, 1)).toThrow(
        "Image at index 1 is not a recognized image format",
      );
    });

    it("should honour a custom allow-list", () => {
      const allowed = new Set(["image/bmp"]);

      expect(validateAndEncode(BMP_BYTES, allowed).mimeType).toBe("image/bmp");
      expect(() => validateAndEncode(PNG_BYTES, allowed)).toThrow(
        UnsupportedImageTypeError,
      );
    });
  });

  describe("toDataUrl", () => {
    it("should build a base64 data URL", () => {
      const image = validateAndEncode(GIF_BYTES);

      expect(toDataUrl(image)).toBe(
        `data:image/gif;base64,${Buffer.from(GIF_BYTES).toString("base64")}`,
      );
    });
  });
});
