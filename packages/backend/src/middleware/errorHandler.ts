import { NextFunction, Request, Response } from 'express';
import { HttpError, ValidationError } from '../utils/errors';

export interface ErrorHandlerOptions {
  debug: boolean;
}

function isMalformedJson(err: unknown): err is SyntaxError {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

// Our HttpErrors and body-parser's http-errors (413 for an oversized body, ...)
function isClientError(err: unknown): err is Error & { status: number } {
  return (
    err instanceof Error &&
    'status' in err &&
    typeof err.status === 'number' &&
    err.status >= 400 &&
    err.status < 500
  );
}

/**
 * Final error middleware. Internal error detail only leaves the process
 * when debug is on.
 */
export function errorHandler(options: ErrorHandlerOptions) {
  return (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof ValidationError) {
      return res.status(err.status).json({ error: err.message, details: err.details });
    }
    if (isMalformedJson(err)) {
      return res.status(422).json({
        error: 'Validation failed',
        details: [{ location: 'body', field: '', message: 'Malformed JSON body', code: 'invalid_json' }],
      });
    }
    if (isClientError(err)) {
      return res.status(err.status).json({ error: err.message });
    }

    console.error(`[Error] ${req.method} ${req.originalUrl}:`, err);
    const status = err instanceof HttpError ? err.status : 500;
    if (!options.debug) {
      return res.status(status).json({ error: 'Internal server error' });
    }
    if (err instanceof Error) {
      return res.status(status).json({
        error: err.message,
        name: err.name,
        stack: err.stack?.split('\n').map((line) => line.trim()),
      });
    }
    res.status(status).json({ error: String(err) });
  };
}
