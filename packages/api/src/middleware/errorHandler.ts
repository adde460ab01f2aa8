import { Request, Response, NextFunction } from 'express';
import { EngineError } from '@cadence/bot';

// ---------------------------------------------------------------------------
// HttpError
//
// For failures that belong to the HTTP layer rather than the engine (no
// session for a guild, a missing route parameter). Engine errors already
// carry their own status.
// ---------------------------------------------------------------------------
export class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
    readonly code?: string,
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

// ---------------------------------------------------------------------------
// errorHandler
//
// Registered last in createApp. Engine errors and HttpErrors respond with
// their own status and `{ error, code }`; body-parser failures carry a
// `status` of their own (400 for malformed JSON); anything else is a 500 and
// gets logged.
// ---------------------------------------------------------------------------

function statusOf(err: unknown): number {
  if (err instanceof EngineError || err instanceof HttpError) return err.status;
  const status: unknown = typeof err === 'object' && err !== null ? Reflect.get(err, 'status') : undefined;
  return typeof status === 'number' && status >= 400 && status < 600 ? status : 500;
}

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  const status = statusOf(err);
  const message = err instanceof Error && err.message ? err.message : 'Internal server error';
  const code = err instanceof EngineError || err instanceof HttpError ? err.code : undefined;

  if (status >= 500) {
    console.error('Unhandled error:', err);
  }

  res.status(status).json(code ? { error: message, code } : { error: message });
}

// ---------------------------------------------------------------------------
// asyncHandler
//
// Wraps an async route handler so that any thrown error is forwarded to
// next() automatically. Without this, unhandled promise rejections in async
// route handlers silently fail in Express 4.
//
// Usage:
//   router.get('/path', asyncHandler(async (req, res) => { ... }));
// ---------------------------------------------------------------------------
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) {
  return (req: Request, res: Response, next: NextFunction): void => {
    fn(req, res, next).catch(next);
  };
}
