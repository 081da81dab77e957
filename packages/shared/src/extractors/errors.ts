/**
 * Boundary Errors
 *
 * Raised only for structurally invalid input at the edges of the core.
 * A label missing from a page is never an error.
 */

export class TokenDataError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TokenDataError';
  }
}

export class FieldConfigError extends Error {
  readonly errors: string[];

  constructor(message: string, errors: string[] = []) {
    super(errors.length > 0 ? `${message}: ${errors.join('; ')}` : message);
    this.name = 'FieldConfigError';
    this.errors = errors;
  }
}

export class OcrError extends Error {
  readonly imagePath: string;

  constructor(message: string, imagePath: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'OcrError';
    this.imagePath = imagePath;
  }
}
