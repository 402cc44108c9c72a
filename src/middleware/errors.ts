import type { Request, Response, NextFunction } from 'express';
import { ApiError, DecodeError, MethodNotAllowedError } from '../errors';
import { sendError } from '../response';

// Body parser failures are tagged with a type such as entity.parse.failed or charset.unsupported
const BODY_ERROR_PREFIXES = ['entity.', 'encoding.', 'charset.'];

// Express and body-parser attach a 4xx status to errors caused by the request itself
function clientStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null || !('status' in err)) {
    return undefined;
  }
  const { status } = err;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

function toApiError(err: unknown): unknown {
  const status = clientStatus(err);
  if (status === undefined || err instanceof ApiError) {
    return err;
  }
  // Router failed to decode a path parameter
  if (err instanceof URIError) {
    return new DecodeError('Invalid user ID');
  }
  const type = typeof err === 'object' && err !== null && 'type' in err ? err.type : undefined;
  if (typeof type === 'string' && BODY_ERROR_PREFIXES.some((prefix) => type.startsWith(prefix))) {
    return new DecodeError();
  }
  return new ApiError(status, 'Bad request');
}

export function errorHandler(err: unknown, _req: Request, res: Response, next: NextFunction) {
  if (res.headersSent) {
    return next(err);
  }

  const apiError = toApiError(err);

  if (apiError instanceof MethodNotAllowedError) {
    res.setHeader('Allow', apiError.allowed.join(', '));
  }
  if (apiError instanceof ApiError) {
    return sendError(res, apiError.statusCode, apiError.message);
  }

  console.error('Unhandled error:', err);
  sendError(res, 500, 'Internal server error');
}
