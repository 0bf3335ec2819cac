import type { Server } from 'node:http';
import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import { LOG_PREFIX } from '@joinpoint/core';
import type { BookController } from './bookController.js';
import type { Actor, HttpResult } from './types.js';

export const DEFAULT_PORT = 3001;

function actorFrom(req: Request): Actor {
  const role = req.header('x-role');
  return {
    name: req.header('x-user') ?? 'anonymous',
    roles: role ? role.split(',').map(value => value.trim()) : [],
  };
}

function send(res: Response, result: HttpResult): void {
  if (result.body === undefined) {
    res.status(result.status).end();
    return;
  }
  res.status(result.status).json(result.body);
}

/**
 * Express app exposing the (proxied) controller
 */
export function createBookstoreApp(controller: BookController): Express {
  const app = express();

  app.use(cors());
  app.use(express.json());

  app.get('/books', (_req: Request, res: Response) => {
    send(res, controller.index());
  });

  app.get('/books/:id', (req: Request, res: Response) => {
    send(res, controller.show(req.params.id));
  });

  app.post('/books', (req: Request, res: Response) => {
    send(res, controller.create(req.body, actorFrom(req)));
  });

  app.delete('/books/:id', (req: Request, res: Response) => {
    send(res, controller.destroy(req.params.id, actorFrom(req)));
  });

  // Error handling middleware
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    console.error(`${LOG_PREFIX.bookstore} ${err.message}`);
    res.status(500).json({ error: 'Internal Server Error' });
  });

  return app;
}

/**
 * Start listening; the port defaults to $PORT, then 3001
 */
export function startBookstoreServer(
  controller: BookController,
  port: number = Number(process.env.PORT) || DEFAULT_PORT
): Server {
  return createBookstoreApp(controller).listen(port, () => {
    console.log(`${LOG_PREFIX.bookstore} Bookstore API running on port ${port}`);
  });
}
