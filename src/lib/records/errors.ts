/**
 * Raised when a workspace record is too malformed to use at all (not a
 * mapping, no designs, unknown design name). Problems with individual
 * catalog items are collected and reported instead of thrown.
 */
export class RecordValidationError extends Error {
  readonly details: string[];

  constructor(message: string, details: string[] = []) {
    super(message);
    this.name = "RecordValidationError";
    this.details = details;
  }
}
