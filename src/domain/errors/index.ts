export { DataValidationError } from './data-validation.error';
export type { ValidationFailureReason } from './data-validation.error';
export { MissingIdError } from './missing-id.error';
