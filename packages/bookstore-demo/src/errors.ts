/**
 * Domain errors for the bookstore
 */

export class BookstoreError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'BookstoreError';
  }
}

/**
 * Error thrown when a book id does not exist
 */
export class BookNotFoundError extends BookstoreError {
  public readonly bookId: string;

  constructor(bookId: string, options?: ErrorOptions) {
    super(`Book ${bookId} not found`, options);
    this.name = 'BookNotFoundError';
    this.bookId = bookId;
  }
}

/**
 * Error thrown when a request body is not a valid book
 */
export class BookValidationError extends BookstoreError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'BookValidationError';
  }
}
