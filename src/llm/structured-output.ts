/**
 * Structured output helpers shared by the bundled providers: the schema
 * instructions sent with a request and the coercion of the reply.
 */

import { z } from "zod";
import { StructuredOutputError } from "../errors.js";
import {
  ENVELOPE_FIELD,
  hasObjectRoot,
  toJsonSchema,
  zodToTs,
} from "./schemas/utils.js";
import type { ChatMessage, OutputSchema, ResponseFormat } from "./types.js";

export const STRUCTURED_OUTPUT_NAME = "Output";

/**
 * Parse LLM response content as JSON (handles JSON in markdown code blocks)
 */
export function parseJsonContent(content: string): unknown {
  const jsonMatch = content.match(/```(?:json|typescript)?\s*([\s\S]*?)```/);
  const jsonStr = jsonMatch ? jsonMatch[1].trim() : content.trim();

  try {
    return JSON.parse(jsonStr);
  } catch (e) {
    throw new StructuredOutputError(
      `Failed to parse LLM response as JSON: ${e instanceof Error ? e.message : e}`,
      content,
      [],
      e,
    );
  }
}

// Models occasionally drop the envelope and answer with the bare value
function unwrapEnvelope(parsed: unknown): unknown {
  if (
    typeof parsed === "object" &&
    parsed !== null &&
    ENVELOPE_FIELD in parsed
  ) {
    return Reflect.get(parsed, ENVELOPE_FIELD);
  }
  return parsed;
}

/**
 * Parses and validates a reply against the requested schema.
 */
export function coerceStructuredOutput<T>(
  content: string,
  schema: OutputSchema<T>,
): T {
  const parsed = parseJsonContent(content);
  const reply = hasObjectRoot(schema) ? parsed : unwrapEnvelope(parsed);
  const result = schema.safeParse(reply);
  if (!result.success) {
    throw new StructuredOutputError(
      `LLM response does not match the output schema: ${result.error.message}`,
      content,
      result.error.issues,
      result.error,
    );
  }
  return result.data;
}

/**
 * System message describing the expected reply as a TypeScript interface.
 */
export function schemaInstructions<T>(schema: OutputSchema<T>): ChatMessage {
  return {
    role: "system",
    content: [
      "Respond only with a JSON object matching this TypeScript interface:",
      "",
      zodToTs(schema, STRUCTURED_OUTPUT_NAME).trim(),
    ].join("\n"),
  };
}

export function jsonSchemaResponseFormat<T>(
  schema: OutputSchema<T>,
): ResponseFormat {
  const replySchema = hasObjectRoot(schema)
    ? schema
    : z.object({ [ENVELOPE_FIELD]: schema });
  return {
    type: "json_schema",
    json_schema: {
      name: STRUCTURED_OUTPUT_NAME,
      strict: false,
      schema: toJsonSchema(replySchema),
    },
  };
}
