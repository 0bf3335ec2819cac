/**
 * Bookstore assembly - wires repository, service and controller through the interception engine
 *
 * Aspects, by order:
 *
 * 0. `ControllerTiming` times every controller call
 * 1. `CallLogging` logs calls on all three layers (one rule combining the three packages)
 * 2. `LibrarianOnly` refuses `add*` / `remove*` service calls from actors without the librarian role
 *
 * Each layer receives the proxy of the layer below, never the raw instance.
 */

import {
  InterceptionEngine,
  allOf,
  anyOf,
  createGuardAspect,
  createLoggingAspect,
  createTimingAspect,
  named,
  withinPackage,
  type EngineLogger,
} from '@joinpoint/core';
import { BookController } from './bookController.js';
import { BookRepository } from './bookRepository.js';
import { BookService } from './bookService.js';
import type { Actor } from './types.js';

export const BOOKSTORE_PACKAGES = {
  repository: 'bookstore.repository',
  service: 'bookstore.service',
  controller: 'bookstore.controller',
} as const;

export const LIBRARIAN_ROLE = 'librarian';

export interface BookstoreOptions {
  logger?: EngineLogger;
  /** Log engine assembly events */
  verbose?: boolean;
  /** Clock for the timing aspect */
  now?: () => number;
}

export interface Bookstore {
  engine: InterceptionEngine;
  repository: BookRepository;
  service: BookService;
  controller: BookController;
}

function isActor(value: unknown): value is Actor {
  return typeof value === 'object'
    && value !== null
    && typeof Reflect.get(value, 'name') === 'string'
    && Array.isArray(Reflect.get(value, 'roles'));
}

export function assembleBookstore(options: BookstoreOptions = {}): Bookstore {
  const logger = options.logger ?? console;
  const engine = new InterceptionEngine({ logger, verbose: options.verbose });

  const applicationLayers = anyOf(
    withinPackage(BOOKSTORE_PACKAGES.repository),
    withinPackage(BOOKSTORE_PACKAGES.service),
    withinPackage(BOOKSTORE_PACKAGES.controller),
  );

  engine.registerAspect(createTimingAspect({
    name: 'ControllerTiming',
    order: 0,
    pointcut: withinPackage(BOOKSTORE_PACKAGES.controller),
    logger,
    now: options.now,
  }));

  engine.registerAspect(createLoggingAspect({
    name: 'CallLogging',
    order: 1,
    pointcut: applicationLayers,
    logger,
  }));

  engine.registerAspect(createGuardAspect({
    name: 'LibrarianOnly',
    order: 2,
    pointcut: allOf(
      withinPackage(BOOKSTORE_PACKAGES.service),
      anyOf(named('add*'), named('remove*')),
    ),
    check: (context) => {
      const actor = context.args[1];
      return isActor(actor) && actor.roles.includes(LIBRARIAN_ROLE);
    },
    describe: (context) => {
      const actor = context.args[1];
      const name = isActor(actor) ? actor.name : 'anonymous';
      return `${name} may not call ${context.signature.operationName}`;
    },
    logger,
  }));

  const repository = engine.registerComponent(
    `${BOOKSTORE_PACKAGES.repository}.BookRepository`,
    new BookRepository(),
  ).proxy;

  const service = engine.registerComponent(
    `${BOOKSTORE_PACKAGES.service}.BookService`,
    new BookService(repository),
  ).proxy;

  const controller = engine.registerComponent(
    `${BOOKSTORE_PACKAGES.controller}.BookController`,
    new BookController(service),
  ).proxy;

  return { engine, repository, service, controller };
}
