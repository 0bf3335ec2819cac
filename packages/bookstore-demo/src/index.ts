/**
 * Main entry point for @joinpoint/bookstore-demo
 *
 * A small book catalogue whose repository, service and controller are all
 * reached through proxies from @joinpoint/core.
 */

export * from './types.js';
export { BookstoreError, BookNotFoundError, BookValidationError } from './errors.js';
export { BookRepository } from './bookRepository.js';
export { BookService } from './bookService.js';
export { BookController } from './bookController.js';
export {
  assembleBookstore,
  BOOKSTORE_PACKAGES,
  LIBRARIAN_ROLE,
  type Bookstore,
  type BookstoreOptions,
} from './assembly.js';
export { createBookstoreApp, startBookstoreServer, DEFAULT_PORT } from './app.js';
