import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { FileAccessError, InvalidInputTypeError } from "../errors.js";

/**
 * Converts a file URL or path string to a filesystem path. Remote URLs are not
 * fetched.
 */
export function toPath(
  value: string | URL,
  field: "pdf" | "images",
): string {
  if (typeof value === "string") {
    return value;
  }
  if (value.protocol !== "file:") {
    throw new InvalidInputTypeError(field, `${value.protocol} URL`);
  }
  return fileURLToPath(value);
}

/**
 * Reads a whole file synchronously, raising FileAccessError when it is unreadable.
 */
export function readFileBytes(path: string): Buffer {
  try {
    return readFileSync(path);
  } catch (error) {
    throw new FileAccessError(path, error);
  }
}
