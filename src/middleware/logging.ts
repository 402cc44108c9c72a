import type { Request, Response, NextFunction, RequestHandler } from 'express';

export type LogSink = (message: string) => void;

// Logs each request when it starts and again once the response is done, whatever the outcome
export function requestLogger(log: LogSink = console.log): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    const { method, path } = req;
    let completed = false;

    log(`Started ${method} ${path}`);

    const complete = () => {
      if (completed) return;
      completed = true;
      log(`Completed ${method} ${path} ${res.statusCode} in ${Date.now() - start}ms`);
    };
    res.on('finish', complete);
    res.on('close', complete);

    next();
  };
}
