/**
 * Raised when a request cannot be scored at all. Missing optional fields never
 * raise; they only lower the score.
 */
export class ValidationFailure extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = "ValidationFailure";
    this.field = field;
  }
}
