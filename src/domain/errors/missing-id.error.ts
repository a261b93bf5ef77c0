/** Raised when an update is attempted on a record that was never persisted. */
export class MissingIdError extends Error {
  constructor(message = 'Update called with empty ID field') {
    super(message);
    this.name = 'MissingIdError';
  }
}
