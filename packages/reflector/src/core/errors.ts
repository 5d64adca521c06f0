/**
 * Error taxonomy. Each error carries a stable `code` that survives into
 * tool responses.
 */

export class NotFoundError extends Error {
  readonly code = "NOT_FOUND";

  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

export class InvalidParameterError extends Error {
  readonly code = "INVALID_PARAMETER";

  constructor(message: string) {
    super(message);
    this.name = "InvalidParameterError";
  }
}

/** A source file that cannot be read or tokenized. */
export class MalformedInputError extends Error {
  readonly code = "MALFORMED_INPUT";

  constructor(message: string) {
    super(message);
    this.name = "MalformedInputError";
  }
}

export type ScanError = NotFoundError | InvalidParameterError | MalformedInputError;
