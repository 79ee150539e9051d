// Raised when a payload or lookup argument cannot become a valid Product.
export class DataValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DataValidationError';
  }
}
