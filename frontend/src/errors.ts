/** Raised when geometry helpers receive data that is not a numeric point. */
export class InvalidInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidInputError';
  }
}
