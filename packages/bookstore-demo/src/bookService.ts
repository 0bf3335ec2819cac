import type { BookRepository } from './bookRepository.js';
import { BookNotFoundError, BookValidationError } from './errors.js';
import type { Actor, Book, NewBook } from './types.js';

export class BookService {
  constructor(private readonly repository: BookRepository) {}

  addBook(input: NewBook, actor: Actor): Book {
    const title = input.title.trim();
    const author = input.author.trim();
    if (title === '' || author === '') {
      throw new BookValidationError('Title and author must not be empty');
    }
    return this.repository.save({ title, author, addedBy: actor.name });
  }

  getBook(id: string): Book {
    const book = this.repository.findById(id);
    if (!book) {
      throw new BookNotFoundError(id);
    }
    return book;
  }

  listBooks(): Book[] {
    return this.repository.findAll();
  }

  // `actor` is checked by the access guard before this runs
  removeBook(id: string, _actor: Actor): Book {
    const book = this.getBook(id);
    this.repository.deleteById(id);
    return book;
  }
}
