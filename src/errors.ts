/**
 * Error taxonomy for the invocation pipeline.
 *
 * Every failure the library raises itself is a `DocumentInvokeError` with a stable
 * `code`, so callers can branch on `instanceof` or on the code string.
 */

export type DocumentInvokeErrorCode =
  | "AMBIGUOUS_INPUT"
  | "MISSING_INPUT"
  | "EMPTY_IMAGE_LIST"
  | "INVALID_INPUT_TYPE"
  | "FILE_ACCESS"
  | "PDF_DECODE"
  | "EMPTY_IMAGE_DATA"
  | "UNSUPPORTED_IMAGE_TYPE"
  | "EMPTY_PROMPT"
  | "CAPABILITY_NOT_SUPPORTED"
  | "DELEGATE_CLIENT"
  | "STRUCTURED_OUTPUT"
  | "CONFIGURATION";

export class DocumentInvokeError extends Error {
  constructor(
    readonly code: DocumentInvokeErrorCode,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class AmbiguousInputError extends DocumentInvokeError {
  constructor() {
    super("AMBIGUOUS_INPUT", "Provide only one of pdf or images");
  }
}

export class MissingInputError extends DocumentInvokeError {
  constructor() {
    super("MISSING_INPUT", "Either pdf or images must be provided");
  }
}

export class EmptyImageListError extends DocumentInvokeError {
  constructor() {
    super("EMPTY_IMAGE_LIST", "images must contain at least one image");
  }
}

export class InvalidInputTypeError extends DocumentInvokeError {
  constructor(
    readonly field: "pdf" | "images",
    received: string,
  ) {
    super(
      "INVALID_INPUT_TYPE",
      `Unsupported ${field} input of type ${received}; expected a path, file URL or byte array`,
    );
  }
}

export class FileAccessError extends DocumentInvokeError {
  constructor(
    readonly path: string,
    cause: unknown,
  ) {
    super(
      "FILE_ACCESS",
      `Failed to read ${path}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
  }
}

export class PdfDecodeError extends DocumentInvokeError {
  constructor(reason: string, cause?: unknown) {
    super("PDF_DECODE", `Failed to open pdf: ${reason}`, { cause });
  }
}

export class EmptyImageDataError extends DocumentInvokeError {
  constructor(readonly index?: number) {
    super(
      "EMPTY_IMAGE_DATA",
      index === undefined
        ? "Image data is empty"
        : `Image at index ${index} is empty`,
    );
  }
}

export class UnsupportedImageTypeError extends DocumentInvokeError {
  constructor(
    readonly detectedMimeType: string | undefined,
    readonly index?: number,
  ) {
    const subject = index === undefined ? "Image" : `Image at index ${index}`;
    super(
      "UNSUPPORTED_IMAGE_TYPE",
      detectedMimeType
        ? `${subject} has unsupported format: ${detectedMimeType}`
        : `${subject} is not a recognized image format`,
    );
  }
}

export class EmptyPromptError extends DocumentInvokeError {
  constructor() {
    super("EMPTY_PROMPT", "Prompt must not be empty");
  }
}

export class CapabilityNotSupportedError extends DocumentInvokeError {
  constructor(
    readonly modelName: string,
    readonly capability: "invoke" | "withStructuredOutput",
  ) {
    super(
      "CAPABILITY_NOT_SUPPORTED",
      capability === "invoke"
        ? `Model ${modelName} does not support synchronous invocation, use ainvoke instead`
        : `Model ${modelName} does not support structured output`,
    );
  }
}

export class DelegateClientError extends DocumentInvokeError {
  constructor(
    readonly provider: string,
    readonly status: number | undefined,
    message: string,
    cause?: unknown,
  ) {
    super(
      "DELEGATE_CLIENT",
      status === undefined
        ? `${provider} API error: ${message}`
        : `${provider} API error (${status}): ${message}`,
      { cause },
    );
  }
}

export class StructuredOutputError extends DocumentInvokeError {
  constructor(
    message: string,
    readonly content: string,
    readonly issues: readonly unknown[] = [],
    cause?: unknown,
  ) {
    super("STRUCTURED_OUTPUT", message, { cause });
  }
}

export class ConfigurationError extends DocumentInvokeError {
  constructor(message: string) {
    super("CONFIGURATION", message);
  }
}
