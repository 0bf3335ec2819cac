import { describe, test, expect, beforeEach, jest } from '@jest/globals';
import type { EngineLogger } from '@joinpoint/core';
import { assembleBookstore, type Bookstore } from '../assembly.js';
import type { Actor } from '../types.js';

jest.mock('@redactpii/node', () => ({
  Redactor: class {
    redact(text: string): string {
      return text;
    }
  },
}));

interface CapturedLine {
  level: 'log' | 'warn' | 'error';
  message: string;
}

function createCaptureLogger(): { logger: EngineLogger; lines: CapturedLine[] } {
  const lines: CapturedLine[] = [];
  return {
    lines,
    logger: {
      log: (message) => lines.push({ level: 'log', message }),
      warn: (message) => lines.push({ level: 'warn', message }),
      error: (message) => lines.push({ level: 'error', message }),
    },
  };
}

const ann: Actor = { name: 'ann', roles: ['librarian'] };
const bob: Actor = { name: 'bob', roles: [] };

const DUNE = '{"id":"book-1","title":"Dune","author":"Frank Herbert","addedBy":"ann"}';

describe('Bookstore', () => {
  let bookstore: Bookstore;
  let lines: CapturedLine[];

  beforeEach(() => {
    const capture = createCaptureLogger();
    lines = capture.lines;
    bookstore = assembleBookstore({ logger: capture.logger, now: () => 0 });
  });

  function messages(level: CapturedLine['level']): string[] {
    return lines.filter(line => line.level === level).map(line => line.message);
  }

  describe('Assembly', () => {
    test('1.1 Should register the three layers and three aspects', () => {
      expect(bookstore.engine.listComponents()).toEqual([
        'bookstore.repository.BookRepository',
        'bookstore.service.BookService',
        'bookstore.controller.BookController',
      ]);
      expect(bookstore.engine.listAspects().map(aspect => [aspect.name, aspect.order])).toEqual([
        ['ControllerTiming', 0],
        ['CallLogging', 1],
        ['LibrarianOnly', 2],
      ]);
    });

    test('1.2 Should guard only writing service operations', () => {
      const { engine } = bookstore;

      expect(engine.describeChain(engine.getSignature('bookstore.service.BookService', 'addBook'))).toEqual([
        'CallLogging.before',
        'CallLogging.afterReturning',
        'CallLogging.afterThrowing',
        'LibrarianOnly.before',
      ]);
      expect(engine.describeChain(engine.getSignature('bookstore.service.BookService', 'getBook'))).toEqual([
        'CallLogging.before',
        'CallLogging.afterReturning',
        'CallLogging.afterThrowing',
      ]);
    });

    test('1.3 Should time controller calls outside the logging advice', () => {
      const { engine } = bookstore;

      expect(engine.describeChain(engine.getSignature('bookstore.controller.BookController', 'create'))).toEqual([
        'ControllerTiming.around',
        'CallLogging.before',
        'CallLogging.afterReturning',
        'CallLogging.afterThrowing',
      ]);
      expect(engine.describeChain(engine.getSignature('bookstore.repository.BookRepository', 'save'))).toEqual([
        'CallLogging.before',
        'CallLogging.afterReturning',
        'CallLogging.afterThrowing',
      ]);
    });
  });

  describe('Requests', () => {
    test('2.1 Should log every layer of a successful request', () => {
      const result = bookstore.controller.create({ title: ' Dune ', author: 'Frank Herbert' }, ann);

      expect(result).toEqual({
        status: 201,
        body: { id: 'book-1', title: 'Dune', author: 'Frank Herbert', addedBy: 'ann' },
      });
      expect(messages('log')).toEqual([
        '[Log] bookstore.controller.BookController.create(2) called with [{"title":" Dune ","author":"Frank Herbert"},{"name":"ann","roles":["librarian"]}]',
        '[Log] bookstore.service.BookService.addBook(2) called with [{"title":" Dune ","author":"Frank Herbert"},{"name":"ann","roles":["librarian"]}]',
        '[Log] bookstore.repository.BookRepository.save(1) called with [{"title":"Dune","author":"Frank Herbert","addedBy":"ann"}]',
        `[Log] bookstore.repository.BookRepository.save(1) returned ${DUNE}`,
        `[Log] bookstore.service.BookService.addBook(2) returned ${DUNE}`,
        `[Log] bookstore.controller.BookController.create(2) returned {"status":201,"body":${DUNE}}`,
        '[Timing] bookstore.controller.BookController.create(2) completed in 0ms',
      ]);
    });

    test('2.2 Should refuse writes from actors without the librarian role', () => {
      const result = bookstore.controller.create({ title: 'Emma', author: 'Jane Austen' }, bob);

      expect(result).toEqual({ status: 403, body: { error: 'bob may not call addBook' } });
      expect(messages('warn')).toEqual(['[Guard] bob may not call addBook']);
      expect(messages('error')).toEqual(['[Log] bookstore.service.BookService.addBook(2) threw bob may not call addBook']);
      expect(bookstore.controller.index()).toEqual({ status: 200, body: [] });
    });

    test('2.3 Should let anyone read', () => {
      bookstore.controller.create({ title: 'Dune', author: 'Frank Herbert' }, ann);

      expect(bookstore.controller.show('book-1')).toEqual({
        status: 200,
        body: { id: 'book-1', title: 'Dune', author: 'Frank Herbert', addedBy: 'ann' },
      });
      expect(bookstore.controller.index()).toEqual({
        status: 200,
        body: [{ id: 'book-1', title: 'Dune', author: 'Frank Herbert', addedBy: 'ann' }],
      });
      expect(messages('warn')).toEqual([]);
    });

    test('2.4 Should map validation and lookup failures to status codes', () => {
      expect(bookstore.controller.create('Dune', ann)).toEqual({
        status: 400,
        body: { error: 'Request body must be a JSON object' },
      });
      expect(bookstore.controller.create({ title: 'Dune' }, ann)).toEqual({
        status: 400,
        body: { error: 'Fields "title" and "author" must be strings' },
      });
      expect(bookstore.controller.create({ title: '  ', author: 'Frank Herbert' }, ann)).toEqual({
        status: 400,
        body: { error: 'Title and author must not be empty' },
      });
      expect(bookstore.controller.show('book-9')).toEqual({ status: 404, body: { error: 'Book book-9 not found' } });
    });

    test('2.5 Should not advise the service calling its own getBook', () => {
      bookstore.controller.create({ title: 'Dune', author: 'Frank Herbert' }, ann);
      lines.length = 0;

      expect(bookstore.controller.destroy('book-1', ann)).toEqual({ status: 204 });
      expect(messages('log').filter(message => message.includes('BookService.'))).toEqual([
        '[Log] bookstore.service.BookService.removeBook(2) called with ["book-1",{"name":"ann","roles":["librarian"]}]',
        `[Log] bookstore.service.BookService.removeBook(2) returned ${DUNE}`,
      ]);
      expect(messages('log').filter(message => message.includes('BookRepository.'))).toEqual([
        '[Log] bookstore.repository.BookRepository.findById(1) called with ["book-1"]',
        `[Log] bookstore.repository.BookRepository.findById(1) returned ${DUNE}`,
        '[Log] bookstore.repository.BookRepository.deleteById(1) called with ["book-1"]',
        '[Log] bookstore.repository.BookRepository.deleteById(1) returned true',
      ]);
      expect(bookstore.controller.show('book-1').status).toBe(404);
    });

    test('2.6 Should refuse deletes from readers and keep the book', () => {
      bookstore.controller.create({ title: 'Dune', author: 'Frank Herbert' }, ann);

      expect(bookstore.controller.destroy('book-1', bob)).toEqual({
        status: 403,
        body: { error: 'bob may not call removeBook' },
      });
      expect(bookstore.controller.show('book-1').status).toBe(200);
    });
  });
});
