import express, { Application, NextFunction, Request, Response } from 'express';
import morgan from 'morgan';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { RequestError } from './errors.js';
import { log } from './log.js';
import { createSearchRoutes, SearchDependencies } from './routes/search.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

// src/ when run from source, dist/src/ once built
const codeRoot = path.resolve(__dirname, path.basename(path.dirname(__dirname)) === 'dist' ? '../..' : '..');

export interface AppOptions extends SearchDependencies {
  /** Log each request through morgan (default: true) */
  requestLogging?: boolean;
  /** Directory of static files for the search page (default: public/) */
  publicDir?: string;
}

/**
 * Respond to errors raised by the routes: request errors with their status
 * and message, anything else with a 500.
 */
export function errorHandler(err: unknown, _req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }
  if (err instanceof RequestError) {
    res.status(err.statusCode).type('text/plain').send(err.message);
    return;
  }
  log.error('Request failed', err);
  res.status(500).type('text/plain').send('Internal server error');
}

/**
 * Create and configure the Express application
 */
export function createApp(options: AppOptions): Application {
  const app = express();

  // Middleware
  if (options.requestLogging ?? true) {
    app.use(morgan('dev'));
  }
  app.use(express.urlencoded({ extended: true, limit: '10mb' }));
  app.use(express.json({ limit: '10mb' }));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      databases: options.catalogue.byId.size
    });
  });

  app.use('/', createSearchRoutes(options));

  // Search page
  app.use(express.static(options.publicDir ?? path.join(codeRoot, 'public')));

  app.use(errorHandler);

  return app;
}
