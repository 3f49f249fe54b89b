/**
 * Error classes raised by the collection helpers
 */

export type CollectionsErrorCode =
  | "MAP_SIZE_MISMATCH"
  | "KEYSET_MISMATCH"
  | "INVALID_LOG_LEVEL";

/**
 * Base error class for all toolkit errors
 */
export class CollectionsError extends Error {
  constructor(
    message: string,
    public readonly code: CollectionsErrorCode,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "CollectionsError";

    // maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Error thrown when the arguments of a call violate its precondition,
 * e.g. combining two maps whose keysets differ
 */
export class ArgumentError extends CollectionsError {
  constructor(
    message: string,
    code: CollectionsErrorCode,
    context?: Record<string, unknown>,
  ) {
    super(message, code, context);
    this.name = "ArgumentError";
  }

  static sizeMismatch(leftSize: number, rightSize: number): ArgumentError {
    return new ArgumentError(
      "Maps do not have the same number of elements",
      "MAP_SIZE_MISMATCH",
      { leftSize, rightSize },
    );
  }

  static keysetMismatch(key: unknown): ArgumentError {
    return new ArgumentError(
      "Keysets of the maps do not match",
      "KEYSET_MISMATCH",
      { key },
    );
  }
}

export const isArgumentError = (value: unknown): value is ArgumentError =>
  value instanceof ArgumentError;
