/**
 * Raised synchronously for programming errors: empty instruction,
 * malformed shape declaration, out-of-range call options.
 */
export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}
