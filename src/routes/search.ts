import { NextFunction, Request, Response, Router } from 'express';
import { AlignmentRunner, SequenceFetcher } from '../blast.js';
import { DatabaseCatalogue } from '../catalogue.js';
import { RequestError } from '../errors.js';
import { toFasta } from '../fasta.js';
import { HyperlinkResolver } from '../hyperlink.js';
import { log } from '../log.js';
import { renderReport } from '../renderer.js';
import { parseRetrievalRequest, renderRetrieval, retrieveSequences } from '../retrieval.js';
import { buildAlignmentOptions, validateSearchParams } from '../validation.js';
import { DatabaseEntry } from '../types.js';

/**
 * Everything the search routes need from the outside
 */
export interface SearchDependencies {
  catalogue: DatabaseCatalogue;
  runner: AlignmentRunner;
  fetcher: SequenceFetcher;
  resolver: HyperlinkResolver;
  /** Threads given to each alignment run */
  numThreads: number;
}

/**
 * Create routes for running searches and retrieving hit sequences
 */
export function createSearchRoutes(deps: SearchDependencies): Router {
  const router = Router();

  /**
   * GET /databases
   * Searchable databases, grouped by molecule type
   */
  router.get('/databases', (_req: Request, res: Response) => {
    const describe = ({ id, title, type }: DatabaseEntry) => ({ id, title, type });
    res.json({
      nucleotide: deps.catalogue.byType.nucleotide.map(describe),
      protein: deps.catalogue.byType.protein.map(describe)
    });
  });

  /**
   * POST /
   * Run an alignment and return the rendered report
   * Body: method, sequence, databases (ids), advanced
   */
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const params = validateSearchParams(req.body, deps.catalogue);
      log.debug(`method: ${params.method}`);
      log.debug(`sequence: ${params.sequence}`);
      log.debug(`databases: ${params.databases.map(db => db.id).join(', ')}`);
      log.debug(`advanced: ${params.advanced}`);

      const databases = params.databases.map(db => db.name);
      const run = await deps.runner.run({
        method: params.method,
        query: toFasta(params.sequence),
        databases,
        options: buildAlignmentOptions(params.method, params.advanced, deps.numThreads)
      });
      log.info(`Ran: ${run.command}`);

      if (!run.success) {
        res.status(run.status).type('text/plain').send(run.message);
        return;
      }

      const { html } = renderReport(run.lines, { databases, resolver: deps.resolver });
      res.type('html').send(html);
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /get_sequence/
   * Fetch hit sequences from the databases they may have come from
   * Query params: ?id=<space separated ids>&db=<space separated database names>
   */
  router.get('/get_sequence/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id, db } = req.query;
      if (typeof id !== 'string' || id.trim() === '') {
        throw new RequestError('Query parameter "id" is required');
      }
      if (typeof db !== 'string' || db.trim() === '') {
        throw new RequestError('Query parameter "db" is required');
      }

      const request = parseRetrievalRequest(id, db);
      const known = new Set(Array.from(deps.catalogue.byId.values(), entry => entry.name));
      const unknown = request.databases.find(name => !known.has(name));
      if (unknown !== undefined) {
        throw new RequestError(`Unknown BLAST database: ${unknown}.`);
      }
      const result = await retrieveSequences(request, deps.fetcher);
      res.type('html').send(renderRetrieval(request, result));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
