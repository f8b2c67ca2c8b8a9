/**
 * Raised when the document tree breaks the layout the filter relies on.
 * Malformed attribute blocks in caption text are not errors; they are left
 * as caption text.
 */
export class FilterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FilterError';
  }
}
