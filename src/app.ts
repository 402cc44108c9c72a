import express, { type Express, type Request, type Response, type NextFunction, type RequestHandler } from 'express';
import { UserStore } from './data/users';
import { ApiError, MethodNotAllowedError } from './errors';
import { corsPolicy } from './middleware/cors';
import { errorHandler } from './middleware/errors';
import { requestLogger, type LogSink } from './middleware/logging';
import { healthRouter } from './routes/health';
import { usersRouter } from './routes/users';

export interface AppOptions {
  store?: UserStore;
  log?: LogSink;
  startedAt?: Date;
  now?: () => Date;
}

// Methods served per path, used for 405 answers
const ROUTE_METHODS: Array<[path: string, methods: string[]]> = [
  ['/health', ['GET']],
  ['/api/users', ['GET', 'POST']],
  ['/api/users/:id', ['GET', 'PUT', 'DELETE']],
];

function methodNotAllowed(methods: string[]): RequestHandler {
  return (_req: Request, _res: Response, next: NextFunction) => {
    next(new MethodNotAllowedError(methods));
  };
}

export function createApp(options: AppOptions = {}): Express {
  const store = options.store ?? new UserStore();
  const now = options.now ?? (() => new Date());
  const startedAt = options.startedAt ?? now();

  const app = express();

  // Interceptors, applied in order before any route; each may end the request
  const interceptors: RequestHandler[] = [
    requestLogger(options.log),
    corsPolicy(),
    // Decode every body as JSON, whatever its Content-Type
    express.json({ type: () => true }),
  ];
  app.use(interceptors);

  // Routes
  app.use('/health', healthRouter({ startedAt, now }));
  app.use('/api/users', usersRouter(store));

  for (const [path, methods] of ROUTE_METHODS) {
    app.all(path, methodNotAllowed(methods));
  }

  app.use((_req: Request, _res: Response, next: NextFunction) => {
    next(new ApiError(404, 'Route not found'));
  });

  app.use(errorHandler);

  return app;
}
