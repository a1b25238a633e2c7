/**
 * Raised for malformed indicator or detector arguments: a period that is not a
 * positive integer, input sequences of different lengths, or detection params
 * that fail validation.
 */
export class InvalidParameterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidParameterError';
  }
}
