export type ExtractErrorCode =
  | "INVALID_TYPE" // Target type is not a constructor
  | "INVALID_RECT"; // Rectangle has a non-finite component

/**
 * Error thrown when an extractor or rectangle is built from bad input.
 */
export class ExtractError extends Error {
  readonly code: ExtractErrorCode;

  constructor(message: string, code: ExtractErrorCode) {
    super(message);
    this.name = "ExtractError";
    this.code = code;
  }
}
