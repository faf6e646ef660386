/**
 * Validation Suite: types
 * Tests the environment-driven pipeline configuration.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { ConfigurationError } from "./errors.js";
import { getDefaultConfig, resolvePipelineConfig } from "./types.js";

const CONFIG_KEYS = [
  "IMAGE_ALLOWED_MIME_TYPES",
  "PDF_RENDER_ZOOM",
  "PDF_RENDER_FORMAT",
  "ALLOW_BLANK_PROMPT",
];

describe("types", () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    for (const key of CONFIG_KEYS) {
      delete process.env[key];
    }
  });

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  describe("getDefaultConfig", () => {
    it("should use defaults when nothing is set", () => {
      const config = getDefaultConfig();

      expect([...config.allowedMimeTypes]).toEqual([
        "image/png",
        "image/jpeg",
        "image/webp",
        "image/gif",
      ]);
      expect(config.render).toEqual({ zoom: 0.2, format: "png" });
      expect(config.allowBlankPrompt).toBe(false);
    });

    it("should read overrides from the environment", () => {
      process.env.IMAGE_ALLOWED_MIME_TYPES = "image/png, image/bmp";
      process.env.PDF_RENDER_ZOOM = "1.5";
      process.env.PDF_RENDER_FORMAT = "jpeg";
      process.env.ALLOW_BLANK_PROMPT = "true";

      const config = getDefaultConfig();

      expect([...config.allowedMimeTypes]).toEqual(["image/png", "image/bmp"]);
      expect(config.render).toEqual({ zoom: 1.5, format: "jpeg" });
      expect(config.allowBlankPrompt).toBe(true);
    });

    it("should reject an empty allow-list", () => {
      process.env.IMAGE_ALLOWED_MIME_TYPES = " , ";

      expect(() => getDefaultConfig()).toThrow(ConfigurationError);
    });

    it("should reject a non-positive zoom", () => {
      process.env.PDF_RENDER_ZOOM = "0";

      expect(() => getDefaultConfig()).toThrow(
        'PDF_RENDER_ZOOM must be a positive number, got "0"',
      );
    });

    it("should reject an unknown page format", () => {
      process.env.PDF_RENDER_FORMAT = "tiff";

      expect(() => getDefaultConfig()).toThrow(
        'PDF_RENDER_FORMAT must be "png" or "jpeg", got "tiff"',
      );
    });
  });

  describe("resolvePipelineConfig", () => {
    it("should not read the environment for fields the caller set", () => {
      process.env.IMAGE_ALLOWED_MIME_TYPES = ",";
      process.env.PDF_RENDER_ZOOM = "abc";
      process.env.ALLOW_BLANK_PROMPT = "true";

      const config = resolvePipelineConfig({
        allowedMimeTypes: new Set(["image/png"]),
        render: { zoom: 1, format: "png" },
        allowBlankPrompt: false,
      });

      expect([...config.allowedMimeTypes]).toEqual(["image/png"]);
      expect(config.render).toEqual({ zoom: 1, format: "png" });
      expect(config.allowBlankPrompt).toBe(false);
    });

    it("should fill in only the missing fields from the environment", () => {
      process.env.PDF_RENDER_ZOOM = "abc";
      process.env.PDF_RENDER_FORMAT = "jpeg";

      const config = resolvePipelineConfig({
        render: { zoom: 0.5, format: "png" },
      });

      expect(config.render).toEqual({ zoom: 0.5, format: "png" });
      expect(config.allowedMimeTypes.has("image/webp")).toBe(true);
    });

    it("should still validate the fields read from the environment", () => {
      process.env.PDF_RENDER_ZOOM = "-1";

      expect(() =>
        resolvePipelineConfig({ allowedMimeTypes: new Set(["image/png"]) }),
      ).toThrow(ConfigurationError);
    });
  });
});
