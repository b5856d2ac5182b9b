import express, { Application, NextFunction, Response } from 'express';
import bodyParser from 'body-parser';
import cors from 'cors';
import { PostController } from './controllers/post.controller';
import { Database } from './db/database';
import { PostRepository } from './repositories/post.repository';
import { setupPostRoutes } from './routes/post.routes';
import { PostService } from './services/post.service';
import { HttpError, NotFoundError, errorMessage, internalErrorBody } from './utils/errors';
import logger, { assignCorrelationId, CORRELATION_ID_HEADER, logError, requestLogger, RequestWithId } from './utils/logger';

export interface AppOptions {
  corsOrigins?: string[];
}

// body-parser and other middleware tag their errors with an HTTP status.
const statusOf = (err: unknown): number => {
  if (err instanceof HttpError) return err.status;
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return 500;
};

export class App {
  public app: Application;

  constructor(database: Database, options: AppOptions = {}) {
    this.app = express();
    this.config(options.corsOrigins ?? []);
    this.routes(database);
    this.errorHandling();
  }

  private config(corsOrigins: string[]): void {
    this.app.use(assignCorrelationId);

    const corsOptions: cors.CorsOptions = corsOrigins.length > 0
      ? { origin: corsOrigins, exposedHeaders: [CORRELATION_ID_HEADER] }
      : { exposedHeaders: [CORRELATION_ID_HEADER] };
    this.app.use(cors(corsOptions));
    this.app.use(bodyParser.json());
    this.app.use(bodyParser.urlencoded({ extended: false }));
    this.app.use(requestLogger);
  }

  private routes(database: Database): void {
    const postRepository = new PostRepository(database, logger);
    const postService = new PostService(database, postRepository, logger);
    const postController = new PostController(postService, logger);
    this.app.use('/', setupPostRoutes(postController));
  }

  private errorHandling(): void {
    this.app.use((req: RequestWithId, res: Response, next: NextFunction) => {
      next(new NotFoundError('Not Found'));
    });

    this.app.use((err: unknown, req: RequestWithId, res: Response, _next: NextFunction) => {
      const status = statusOf(err);
      logError(err, req, 'Unhandled error in Express request lifecycle');
      if (status >= 500) {
        res.status(status).json(internalErrorBody(err, req.id));
        return;
      }
      res.status(status).json({ detail: errorMessage(err), correlationId: req.id });
    });
  }
}
