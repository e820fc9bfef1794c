// =============================================================================
// Global Error Handler — the single place errors become HTTP responses
// =============================================================================
//   GatewayError      → its status + toJSON()  ({ error, status?, detail? })
//   ZodError          → 400 { error: 'Validation failed', detail: issues }
//   bad JSON body     → 400 { error: 'Malformed JSON body' }
//   other body-parser → its 4xx, e.g. 413 for entity.too.large
//   anything else     → 500, logged in full, message sanitized
// =============================================================================
import { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';
import { GatewayError } from './GatewayError';
import logger from './logger';
import { toSafeError } from './sanitizeError';

export interface ErrorBody {
  status: number;
  body: Record<string, unknown>;
}

interface BodyParserError {
  type: string;
  status: number;
}

/** body-parser tags its errors with a `type` and the 4xx status it means */
function isBodyParserError(err: unknown): err is BodyParserError {
  return (
    typeof err === 'object' &&
    err !== null &&
    'type' in err &&
    typeof err.type === 'string' &&
    'status' in err &&
    typeof err.status === 'number' &&
    err.status >= 400 &&
    err.status < 500
  );
}

export function zodIssues(err: ZodError): Array<{ path: string; message: string }> {
  return err.issues.map((i) => ({ path: i.path.join('.'), message: i.message }));
}

/** Maps any thrown value to the status + JSON body the API returns for it */
export function toErrorBody(err: unknown): ErrorBody {
  if (err instanceof GatewayError) {
    return { status: err.status, body: { ...err.toJSON() } };
  }
  if (err instanceof ZodError) {
    return { status: 400, body: { error: 'Validation failed', detail: zodIssues(err) } };
  }
  if (isBodyParserError(err)) {
    if (err.type === 'entity.parse.failed') {
      return { status: 400, body: { error: 'Malformed JSON body' } };
    }
    return { status: err.status, body: { error: 'Invalid request body', detail: err.type } };
  }
  return {
    status: 500,
    body: { error: 'Internal server error', detail: toSafeError(err).message },
  };
}

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({ error: 'Not found', detail: `${req.method} ${req.path}` });
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const { status, body } = toErrorBody(err);

  if (status >= 500) {
    logger.error('Request failed', {
      method: req.method,
      path: req.path,
      status,
      error: err instanceof Error ? err.message : String(err),
      stack: err instanceof Error ? err.stack : undefined,
    });
  } else {
    logger.warn('Request rejected', { method: req.method, path: req.path, status, error: body.error });
  }

  res.status(status).json(body);
}
