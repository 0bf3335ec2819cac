/**
 * HTTP-facing layer: turns requests into service calls and failures into status codes
 */

import { AccessDeniedError } from '@joinpoint/core';
import type { BookService } from './bookService.js';
import { BookNotFoundError, BookValidationError } from './errors.js';
import type { Actor, HttpResult, NewBook } from './types.js';

function parseNewBook(body: unknown): NewBook {
  if (typeof body !== 'object' || body === null) {
    throw new BookValidationError('Request body must be a JSON object');
  }
  const title: unknown = Reflect.get(body, 'title');
  const author: unknown = Reflect.get(body, 'author');
  if (typeof title !== 'string' || typeof author !== 'string') {
    throw new BookValidationError('Fields "title" and "author" must be strings');
  }
  return { title, author };
}

function toFailure(error: unknown): HttpResult {
  if (error instanceof BookValidationError) {
    return { status: 400, body: { error: error.message } };
  }
  if (error instanceof AccessDeniedError) {
    return { status: 403, body: { error: error.message } };
  }
  if (error instanceof BookNotFoundError) {
    return { status: 404, body: { error: error.message } };
  }
  throw error;
}

export class BookController {
  constructor(private readonly service: BookService) {}

  create(body: unknown, actor: Actor): HttpResult {
    try {
      return { status: 201, body: this.service.addBook(parseNewBook(body), actor) };
    } catch (error) {
      return toFailure(error);
    }
  }

  show(id: string): HttpResult {
    try {
      return { status: 200, body: this.service.getBook(id) };
    } catch (error) {
      return toFailure(error);
    }
  }

  index(): HttpResult {
    return { status: 200, body: this.service.listBooks() };
  }

  destroy(id: string, actor: Actor): HttpResult {
    try {
      this.service.removeBook(id, actor);
      return { status: 204 };
    } catch (error) {
      return toFailure(error);
    }
  }
}
