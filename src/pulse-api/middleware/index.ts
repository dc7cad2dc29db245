import type { Request, Response, NextFunction } from 'express';
import morgan from 'morgan';
import type { AppConfig } from '../config';

export const requestLogger = morgan('dev');

export function notFoundHandler(_req: Request, res: Response) {
  res.status(404).json({ success: false, error: 'Resource not found' });
}

/** Errors raised by body-parser and friends carry their HTTP status. */
export interface HttpError extends Error {
  status?: number;
}

function clientErrorStatus(err: HttpError): number | null {
  const { status } = err;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

export function createErrorHandler(cfg: Pick<AppConfig, 'isProd'>) {
  return (err: HttpError, _req: Request, res: Response, _next: NextFunction) => {
    const clientStatus = clientErrorStatus(err);
    if (clientStatus !== null) {
      res.status(clientStatus).json({ success: false, error: err.message });
      return;
    }

    console.error('[ERROR]', err.message);
    const error = cfg.isProd ? 'Internal server error' : err.message;
    res.status(500).json({ success: false, error });
  };
}

type AsyncRoute = (req: Request, res: Response, next: NextFunction) => Promise<unknown>;

/** Express 4 does not catch rejected handlers; forward them to the error middleware. */
export function asyncHandler(fn: AsyncRoute) {
  return (req: Request, res: Response, next: NextFunction) => {
    void fn(req, res, next).catch(next);
  };
}
