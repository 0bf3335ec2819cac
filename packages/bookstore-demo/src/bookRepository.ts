import type { Book } from './types.js';

/**
 * In-memory book store. Ids are assigned sequentially: book-1, book-2, ...
 */
export class BookRepository {
  private readonly books = new Map<string, Book>();
  private nextId = 1;

  save(book: Omit<Book, 'id'>): Book {
    const saved: Book = { id: `book-${this.nextId++}`, ...book };
    this.books.set(saved.id, saved);
    return saved;
  }

  findById(id: string): Book | undefined {
    return this.books.get(id);
  }

  findAll(): Book[] {
    return [...this.books.values()];
  }

  deleteById(id: string): boolean {
    return this.books.delete(id);
  }
}
