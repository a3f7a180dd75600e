/**
 * Raised when a record could not be durably appended to the store.
 *
 * The underlying I/O or lock error is kept as `cause`.
 */
export class PersistenceError extends Error {
  readonly code = 'PERSISTENCE_FAILED';

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'PersistenceError';
  }
}
