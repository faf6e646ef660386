import { z } from "zod";
import prettier from "@prettier/sync";

type JsonSchemaNode = Record<string, unknown>;

function isNode(value: unknown): value is JsonSchemaNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Converts a zod schema to a JSON Schema document for `response_format`.
 * Types JSON Schema cannot express (dates, transforms) become unconstrained.
 */
export function toJsonSchema(schema: z.ZodType): JsonSchemaNode {
  const json: unknown = z.toJSONSchema(schema, { unrepresentable: "any" });
  return isNode(json) ? json : {};
}

/**
 * Replies are always JSON objects. A schema whose root is not an object with
 * named fields is carried in this field instead.
 */
export const ENVELOPE_FIELD = "value";

export function hasObjectRoot(schema: z.ZodType): boolean {
  const root = toJsonSchema(schema);
  return root.type === "object" && isNode(root.properties);
}

/**
 * Convert Zod Schema to TypeScript Interface definition string with JSDoc comments.
 * Used for System Prompts.
 */
export function zodToTs(schema: z.ZodType, name: string): string {
  const root = toJsonSchema(schema);
  const body = hasObjectRoot(schema)
    ? printNode(root)
    : `{ ${ENVELOPE_FIELD}: ${printNode(root)} }`;
  return prettier.format(`interface ${name} ${body}`, {
    parser: "typescript",
  });
}

function printUnion(members: unknown[], indent: number): string {
  return members.map((member) => printNode(member, indent)).join(" | ");
}

function printNode(node: unknown, indent = 0): string {
  if (!isNode(node)) {
    return "unknown";
  }
  const pad = "  ".repeat(indent);

  if ("const" in node) {
    return JSON.stringify(node.const);
  }
  if (Array.isArray(node.enum)) {
    return node.enum.map((value) => JSON.stringify(value)).join(" | ");
  }
  if (Array.isArray(node.anyOf)) {
    return printUnion(node.anyOf, indent);
  }
  if (Array.isArray(node.oneOf)) {
    return printUnion(node.oneOf, indent);
  }
  if (Array.isArray(node.type)) {
    return printUnion(
      node.type.map((type) => ({ type })),
      indent,
    );
  }

  switch (node.type) {
    case "string":
      return "string";
    case "number":
    case "integer":
      return "number";
    case "boolean":
      return "boolean";
    case "null":
      return "null";
    case "array": {
      const itemType = printNode(node.items, indent);
      return itemType.includes(" | ") ? `(${itemType})[]` : `${itemType}[]`;
    }
    case "object": {
      if (!isNode(node.properties)) {
        return isNode(node.additionalProperties)
          ? `Record<string, ${printNode(node.additionalProperties, indent)}>`
          : "Record<string, unknown>";
      }
      const required = new Set(
        Array.isArray(node.required) ? node.required : [],
      );
      const lines = Object.entries(node.properties).map(([key, value]) => {
        const description =
          isNode(value) && typeof value.description === "string"
            ? value.description
            : undefined;
        const fieldDesc = description ? `${pad}  /** ${description} */\n` : "";
        const optional = required.has(key) ? "" : "?";
        return `${fieldDesc}${pad}  ${key}${optional}: ${printNode(value, indent + 1)};`;
      });
      return `{\n${lines.join("\n")}\n${pad}}`;
    }
    default:
      return "unknown";
  }
}
