import express, { Request, Response, Router, NextFunction, RequestHandler } from 'express';
import { Server } from 'http';
import { RecordStore } from '../core/record_store';
import { PathEscapeError, RecordFormatError, TopicNotFoundError } from '../core/errors';
import { Logger, defaultLogger } from '../core/logger';

const NON_NEGATIVE_INTEGER = /^\d+$/;

/**
 * Create the read-only Agora API router.
 * Only ever reads from the store; the simulation loop is the sole writer.
 */
export function createApiRouter(store: RecordStore): Router {
  const router = Router();

  /**
   * GET /agora/topics
   * All topics as summaries, newest first. `?limit=n` keeps the n newest.
   */
  const listHandler: RequestHandler = async (
    req: Request,
    res: Response,
    next: NextFunction
  ): Promise<void> => {
    try {
      const raw = req.query.limit;
      if (raw !== undefined && (typeof raw !== 'string' || !NON_NEGATIVE_INTEGER.test(raw))) {
        res.status(400).json({
          error: 'Invalid limit',
          message: 'limit must be a non-negative integer',
        });
        return;
      }

      const limit = typeof raw === 'string' ? parseInt(raw, 10) : 0;
      const summaries = await store.listAll();
      const topics = limit > 0 ? summaries.slice(0, limit) : summaries;
      res.json({ topics, count: topics.length });
    } catch (error) {
      next(error);
    }
  };
  router.get('/topics', listHandler);

  /**
   * GET /agora/topics/<location>
   * One topic with all replies. The location is the store-relative path from
   * a listing, e.g. /agora/topics/sub/hello-1a2b3c4d.json
   */
  const topicHandler: RequestHandler = async (
    req: Request,
    res: Response,
    next: NextFunction
  ): Promise<void> => {
    // Express has already percent-decoded the wildcard segment
    const location = req.params[0];

    try {
      const topic = await store.getByLocation(location);
      res.json(topic);
    } catch (error) {
      if (error instanceof PathEscapeError) {
        res.status(400).json({ error: 'Invalid path', message: error.message });
      } else if (error instanceof TopicNotFoundError) {
        res.status(404).json({ error: 'Not found', message: error.message });
      } else if (error instanceof RecordFormatError) {
        res.status(422).json({ error: 'Unreadable topic', message: error.message });
      } else {
        next(error);
      }
    }
  };
  router.get('/topics/*', topicHandler);

  return router;
}

/**
 * Create a full Express application with the Agora API
 */
export function createApp(store: RecordStore, logger: Logger = defaultLogger): express.Application {
  const app = express();

  // Mount the API router
  app.use('/agora', createApiRouter(store));

  // Health check endpoint
  const healthHandler: RequestHandler = (_req: Request, res: Response): void => {
    res.json({ status: 'ok', service: 'agora' });
  };
  app.get('/health', healthHandler);

  // Root endpoint with info
  const rootHandler: RequestHandler = (_req: Request, res: Response): void => {
    res.json({
      name: 'Agora',
      version: '1.0.0',
      description: 'Simulated discussion community',
      endpoints: {
        topics: 'GET /agora/topics',
        topic: 'GET /agora/topics/<location>',
      },
    });
  };
  app.get('/', rootHandler);

  // Error handling middleware
  const errorHandler = (
    err: Error & { status?: number },
    _req: Request,
    res: Response,
    _next: NextFunction
  ): void => {
    // Undecodable URLs are rejected by the router before reaching a handler
    if (err.status === 400) {
      res.status(400).json({ error: 'Bad request', message: err.message });
      return;
    }
    logger.error(`Error: ${err.message}`);
    // In production, don't expose internal error details
    const isDevelopment = process.env.NODE_ENV !== 'production';
    res.status(500).json({
      error: 'Internal server error',
      message: isDevelopment ? err.message : 'An unexpected error occurred',
    });
  };
  app.use(errorHandler);

  return app;
}

/**
 * Start the Agora server
 */
export function startServer(
  store: RecordStore,
  port: number = 8080,
  logger: Logger = defaultLogger
): Promise<Server> {
  return new Promise((resolve, reject) => {
    const app = createApp(store, logger);
    const server = app.listen(port, () => {
      logger.log(`Server running at http://localhost:${port}`);
      logger.log(`API available at http://localhost:${port}/agora`);
      resolve(server);
    });
    // Listen failures such as EADDRINUSE
    server.once('error', reject);
  });
}
