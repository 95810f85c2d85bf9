import type { ErrorRequestHandler, NextFunction, Request, Response } from 'express';

interface HttpClientError {
  readonly status: number;
  readonly type?: string;
  readonly message: string;
}

function isHttpClientError(error: unknown): error is HttpClientError {
  if (!(error instanceof Error) || !('status' in error)) {
    return false;
  }
  const { status } = error;
  return typeof status === 'number' && status >= 400 && status < 500;
}

/**
 * Final JSON error handler. Body-parser rejections become `InvalidPayload`
 * with their own status; anything else is a 500.
 */
export function createJsonErrorHandler(): ErrorRequestHandler {
  return (error: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    if (isHttpClientError(error)) {
      res.status(error.status).json({
        error: 'InvalidPayload',
        message:
          error.type === 'entity.parse.failed'
            ? 'Request body is not valid JSON'
            : error.message,
      });
      return;
    }

    console.error('[http] unhandled error', error);
    res.status(500).json({ error: 'internal_error' });
  };
}
