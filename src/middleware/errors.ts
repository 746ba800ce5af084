import type { NextFunction, Request, Response } from 'express';

import { AppError, ValidationError } from '../errors';
import logger from '../logger';

const log = logger.child({ component: 'http' });

type ExposedHttpError = { status: number; message: string };

// Client errors raised by body-parser and other http-errors producers.
const asExposedClientError = (error: unknown): ExposedHttpError | undefined => {
  if (!(error instanceof Error) || !('expose' in error) || error.expose !== true) {
    return undefined;
  }

  let status: unknown;
  if ('status' in error) {
    status = error.status;
  } else if ('statusCode' in error) {
    status = error.statusCode;
  }

  if (typeof status !== 'number' || status < 400 || status >= 500) {
    return undefined;
  }

  return { status, message: error.message };
};

export const notFoundHandler = (_req: Request, res: Response): void => {
  res.status(404).json({ error: 'Route not found' });
};

export const errorHandler = (
  error: unknown,
  req: Request,
  res: Response,
  // Express only treats four-argument middleware as an error handler.
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  _next: NextFunction,
): void => {
  if (error instanceof ValidationError) {
    res.status(error.status).json({ error: error.message, errors: error.issues });
    return;
  }

  if (error instanceof AppError && error.status < 500) {
    res.status(error.status).json({ error: error.message });
    return;
  }

  // Malformed JSON bodies are reported by express.json() with a 400 status.
  if (error instanceof SyntaxError && 'status' in error && error.status === 400) {
    res.status(400).json({ error: 'Request body is not valid JSON.' });
    return;
  }

  const clientError = asExposedClientError(error);
  if (clientError) {
    log.warn({ err: error, method: req.method, path: req.path }, 'Rejected request');
    res.status(clientError.status).json({ error: clientError.message });
    return;
  }

  log.error({ err: error, method: req.method, path: req.path }, 'Unhandled request error');
  res.status(500).json({ error: 'Internal server error' });
};
