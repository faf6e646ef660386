/**
 * Payload Builder
 *
 * Assembles the single user message sent to the delegate: the prompt as one text
 * block, followed by one image block per image in input order.
 */

import { EmptyPromptError } from "./errors.js";
import { toDataUrl } from "./image-codec.js";
import type { VisionContent } from "./llm/types.js";
import type { NormalizedImage } from "./types.js";

export interface MultimodalPayload {
  readonly role: "user";
  readonly content: readonly VisionContent[];
}

export function buildPayload(
  prompt: string,
  images: readonly NormalizedImage[],
  options: { allowBlankPrompt?: boolean } = {},
): MultimodalPayload {
  if (!options.allowBlankPrompt && prompt.trim().length === 0) {
    throw new EmptyPromptError();
  }

  const content: VisionContent[] = [
    { type: "text", text: prompt },
    ...images.map(
      (image): VisionContent => ({
        type: "image_url",
        image_url: { url: toDataUrl(image) },
      }),
    ),
  ];

  return Object.freeze({
    role: "user",
    content: Object.freeze(content),
  });
}
