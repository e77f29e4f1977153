import { inspect } from "node:util";

export type ConversionErrorCode =
  | "ERR_USAGE"
  | "ERR_UNKNOWN_FORMAT"
  | "ERR_READ_INPUT"
  | "ERR_METADATA_BLOCK_MISSING"
  | "ERR_INVALID_TABLE";

export interface ConversionErrorDetails {
  name: string;
  message: string;
  code?: string | number;
  originalError?: ConversionErrorDetails;
}

/**
 * Error raised when a document cannot be converted at all.
 *
 * Problems confined to one annotation (an unmapped glyph, an odd heading) are
 * logged and skipped instead; see the transforms under `utils/`.
 */
export class ConversionError extends Error {
  /** A specific error code (e.g., ERR_UNKNOWN_FORMAT, ERR_READ_INPUT). */
  public readonly code: ConversionErrorCode;
  /** The original error object, if available. */
  public readonly originalError?: Error;

  /**
   * Creates an instance of ConversionError.
   * @param message The error message.
   * @param code Error code string.
   * @param originalError Optional original error.
   */
  constructor(message: string, code: ConversionErrorCode, originalError?: Error) {
    super(message);
    this.name = "ConversionError";
    this.code = code;
    this.originalError = originalError;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConversionError);
    }
  }

  /**
   * Returns a plain object representation with only useful metadata for logging.
   */
  toObject(): ConversionErrorDetails {
    const descriptor: ConversionErrorDetails = {
      name: this.name,
      message: this.message,
      code: this.code,
    };

    const original = serializeError(this.originalError);
    if (original) {
      descriptor.originalError = original;
    }

    return descriptor;
  }

  toJSON(): ConversionErrorDetails {
    return this.toObject();
  }

  /**
   * Makes `console.error` print the cleaned payload without stack noise.
   */
  [inspect.custom](): ConversionErrorDetails {
    return this.toObject();
  }
}

/**
 * Flattens an error and its `cause` chain into plain details.
 */
export function serializeError(error: unknown): ConversionErrorDetails | undefined {
  if (error instanceof ConversionError) {
    return error.toObject();
  }
  if (!(error instanceof Error)) {
    return undefined;
  }

  const descriptor: ConversionErrorDetails = {
    name: error.name || "Error",
    message: error.message,
  };

  // fs errors carry ENOENT, EACCES, ... here
  if ("code" in error && (typeof error.code === "string" || typeof error.code === "number")) {
    descriptor.code = error.code;
  }

  const nested = serializeError(error.cause);
  if (nested) {
    descriptor.originalError = nested;
  }

  return descriptor;
}

/**
 * Wraps whatever a caught exception turned out to be.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
