export type ValidationFailureReason =
  | 'missing_field'
  | 'wrong_type'
  | 'invalid_value'
  | 'bad_date'
  | 'unknown_attribute'
  | 'bad_data';

/** Raised when an untyped payload cannot be turned into a Recommendation. */
export class DataValidationError extends Error {
  constructor(
    message: string,
    readonly reason: ValidationFailureReason,
    readonly field?: string,
  ) {
    super(message);
    this.name = 'DataValidationError';
  }
}
