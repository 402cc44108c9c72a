import cors from 'cors';
import type { RequestHandler } from 'express';

const ALLOWED_METHODS = ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'];

// Any origin; preflight ends here with an empty 200
export function corsPolicy(): RequestHandler {
  return cors({
    origin: '*',
    methods: ALLOWED_METHODS,
    allowedHeaders: ['Content-Type'],
    optionsSuccessStatus: 200,
    preflightContinue: false,
  });
}
